/**
 * Resume command for txdl CLI.
 *
 * Continues an interrupted download from its control file.
 *
 * @module cli/commands/resume
 */

import * as path from 'path';
import { controlFileExists, controlPathFor } from '../../engine/control/control-file.js';
import { ARIA2_CONTROL_SUFFIX, CONTROL_FILE_SUFFIX } from '../../shared/constants.js';
import { InputError, ResumeError } from '../../engine/types.js';
import { runEngineDownload, type CommandContext } from './download.js';

/**
 * Strips a control file suffix, so `-r file.zip.txdl` works like `-r file.zip`.
 */
export function partialFileName(file: string): string {
  return file.endsWith(CONTROL_FILE_SUFFIX) ? file.slice(0, -CONTROL_FILE_SUFFIX.length) : file;
}

/**
 * Execute the resume command (`-r <file>`).
 *
 * @param file - Incomplete file name, relative to the download directory
 * @param ctx - Command context
 * @throws {InputError} When no control file exists for the file
 * @throws {ResumeError} When only an aria2c control file exists, or the
 *   partial download cannot be continued
 */
export async function executeResume(file: string, ctx: CommandContext): Promise<void> {
  const { logger } = ctx;
  const name = partialFileName(file);
  const filePath = path.resolve(ctx.dir, name);
  const controlPath = controlPathFor(filePath);

  if (await controlFileExists(controlPath)) {
    logger.info(`Resuming download: ${name}`);
    await runEngineDownload(ctx, name, (download) => download.resume(controlPath));
    return;
  }

  if (await controlFileExists(`${filePath}${ARIA2_CONTROL_SUFFIX}`)) {
    throw new ResumeError(
      `${name} was started by aria2c, whose control file does not record the source. ` +
        'Re-run the original -l command to continue it'
    );
  }

  throw new InputError(
    `Control file not found: ${controlPath}. Cannot resume download without control file`
  );
}

export default executeResume;
