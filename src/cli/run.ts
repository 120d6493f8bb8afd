/**
 * txdl process contract.
 *
 * `run()` parses arguments, runs the preflight checks and the selected
 * command, and maps every outcome to an exit code. It never calls
 * `process.exit` itself.
 *
 * @module cli/run
 */

import * as path from 'path';
import type { SpawnFunction } from '../engine/aria2/command.js';
import { loadConfigFromEnv } from '../engine/config/index.js';
import { classifySource, findRecentTorrent, type DownloadSource } from '../engine/source.js';
import { exitCodeFor, InterruptedError, UsageError } from '../engine/types.js';
import { APP_NAME, ExitCode, VERSION } from '../shared/constants.js';
import { Logger, type OutputStream } from '../utils/logger.js';
import { parseArgs, type ParsedCommand } from './args.js';
import {
  executeDownload,
  executeRecentTorrent,
  executeResume,
  type CommandContext,
} from './commands/index.js';
import { HELP_TEXT } from './help.js';
import { checkDependencies, checkDiskSpace, ensureWritableDirectory } from './preflight.js';

// =============================================================================
// Types
// =============================================================================

export interface RunContext {
  /** Environment for configuration and PATH lookups (default: process.env) */
  env?: NodeJS.ProcessEnv;

  stdout?: OutputStream;
  stderr?: OutputStream;

  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;

  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;

  /** Process factory for aria2c */
  spawn?: SpawnFunction;

  /** Terminal for the live progress view; omitted means plain log lines */
  progressStream?: NodeJS.WriteStream;
}

// =============================================================================
// Helpers
// =============================================================================

function report(error: unknown, logger: Logger): ExitCode {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof InterruptedError) {
    logger.warn(message);
  } else {
    logger.error(message);
  }
  if (error instanceof UsageError) {
    logger.print(HELP_TEXT);
  }

  return exitCodeFor(error);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new InterruptedError();
  }
}

// =============================================================================
// Run
// =============================================================================

/**
 * Runs txdl with the given arguments.
 *
 * @param argv - Arguments without the node binary and script path
 * @param context - Streams, environment and hooks (defaults to the process)
 * @returns The process exit code
 */
export async function run(argv: readonly string[], context: RunContext = {}): Promise<ExitCode> {
  const env = context.env ?? process.env;
  const cwd = context.cwd ?? process.cwd();
  const streams = { stdout: context.stdout, stderr: context.stderr };
  let logger = new Logger(streams);

  let command: ParsedCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    return report(error, logger);
  }

  if (command.mode === 'help') {
    logger.print(HELP_TEXT);
    return ExitCode.SUCCESS;
  }
  if (command.mode === 'version') {
    logger.print(`${APP_NAME} ${VERSION}`);
    return ExitCode.SUCCESS;
  }

  try {
    const config = loadConfigFromEnv(env);
    logger = new Logger({ ...streams, level: config.logLevel, logFile: config.logFile });

    let source: DownloadSource | null =
      command.mode === 'link' ? await classifySource(command.input, cwd) : null;

    const dir = path.resolve(cwd, command.dir ?? config.downloadDir);
    await ensureWritableDirectory(dir, logger);
    if (command.mode === 'torrent') {
      source = { kind: 'torrent', value: await findRecentTorrent(dir) };
    }

    const aria2Path = source ? await checkDependencies(source.kind, config, env) : null;
    await checkDiskSpace(dir, config.minFreeSpace, logger);
    throwIfAborted(context.signal);

    const ctx: CommandContext = {
      config,
      dir,
      logger,
      aria2Path,
      signal: context.signal,
      spawn: context.spawn,
      progressStream: context.progressStream,
    };

    switch (command.mode) {
      case 'link':
        if (source) {
          await executeDownload(source, ctx);
        }
        break;
      case 'torrent':
        if (source) {
          await executeRecentTorrent(source.value, ctx);
        }
        break;
      case 'resume':
        await executeResume(command.file, ctx);
        break;
    }

    throwIfAborted(context.signal);
    logger.success('Operation completed successfully!');
    return ExitCode.SUCCESS;
  } catch (error) {
    return report(error, logger);
  }
}
