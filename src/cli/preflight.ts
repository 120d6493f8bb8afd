/**
 * Environment checks run before a download starts.
 *
 * @module cli/preflight
 */

import { constants as fsConstants, promises as fs } from 'fs';
import { getAvailableSpace } from '../engine/disk/io.js';
import type { SourceKind } from '../engine/source.js';
import {
  DependencyError,
  DiskFullError,
  PermissionError,
  type EngineConfig,
} from '../engine/types.js';
import { findExecutable } from '../utils/platform.js';
import type { Logger } from '../utils/logger.js';
import { formatBytes } from '../ui/utils/format.js';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Creates the download directory if needed and checks it can be written.
 *
 * @throws {PermissionError} When the directory cannot be created or written
 */
export async function ensureWritableDirectory(dir: string, logger: Logger): Promise<void> {
  let created: string | undefined;
  try {
    created = await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new PermissionError(`Cannot create directory: ${dir} (${errorMessage(err)})`, dir);
  }
  if (created !== undefined) {
    logger.info(`Created directory: ${dir}`);
  }

  try {
    await fs.access(dir, fsConstants.W_OK);
  } catch {
    throw new PermissionError(`No write permission for directory: ${dir}`, dir);
  }
}

/**
 * Checks that the directory's file system has at least `minBytes` free.
 *
 * @returns The available space in bytes
 * @throws {DiskFullError} When less space is available
 */
export async function checkDiskSpace(
  dir: string,
  minBytes: number,
  logger: Logger
): Promise<number> {
  const available = await getAvailableSpace(dir);
  if (available < minBytes) {
    throw new DiskFullError(
      `Insufficient disk space. At least ${formatBytes(minBytes)} required in ${dir}`,
      dir,
      minBytes,
      available
    );
  }
  logger.info(`Available disk space: ${formatBytes(available)}`);
  return available;
}

/**
 * Resolves the external tools a kind of source needs.
 *
 * HTTP(S) sources need nothing; magnet links and .torrent files need
 * aria2c.
 *
 * @returns The aria2c path, or null when no external tool is needed
 * @throws {DependencyError} When aria2c cannot be found
 */
export async function checkDependencies(
  kind: SourceKind,
  config: EngineConfig,
  env: NodeJS.ProcessEnv
): Promise<string | null> {
  if (kind === 'http') {
    return null;
  }

  const executable = await findExecutable(config.aria2Path, env);
  if (!executable) {
    throw new DependencyError(
      `aria2c not found (looked for "${config.aria2Path}"). Install aria2 or set TXDL_ARIA2C`,
      config.aria2Path
    );
  }
  return executable;
}
