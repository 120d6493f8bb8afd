/**
 * Download command for txdl CLI.
 *
 * Routes a `-l` input to the built-in segmented engine (HTTP/HTTPS) or
 * to aria2c (magnet links and .torrent files), and reports progress.
 *
 * @module cli/commands/download
 */

import React from 'react';
import { render } from 'ink';
import * as path from 'path';
import {
  cleanupControlFiles,
  buildAria2Args,
  runAria2,
  type SpawnFunction,
} from '../../engine/aria2/command.js';
import { controlPathFor, deleteControlFile } from '../../engine/control/control-file.js';
import { SegmentedDownload, type DownloadResult } from '../../engine/download.js';
import type { DownloadEvents } from '../../engine/events.js';
import { ARIA2_CONTROL_SUFFIX } from '../../shared/constants.js';
import type { DownloadSource } from '../../engine/source.js';
import {
  DependencyError,
  DownloadError,
  InterruptedError,
  type DownloadProgress,
  type EngineConfig,
} from '../../engine/types.js';
import type { Logger } from '../../utils/logger.js';
import { DownloadView } from '../../ui/views/DownloadView.js';
import {
  formatBytes,
  formatDuration,
  formatEta,
  formatProgress,
  formatSpeed,
} from '../../ui/utils/format.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Everything a command needs once preflight checks have passed.
 */
export interface CommandContext {
  config: EngineConfig;

  /** Absolute download directory */
  dir: string;

  logger: Logger;

  /** Resolved aria2c path, when the command needs it */
  aria2Path: string | null;

  /** Aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;

  /** Process factory for aria2c (replaced in tests) */
  spawn?: SpawnFunction;

  /** Terminal to draw the live progress view on; plain log lines otherwise */
  progressStream?: NodeJS.WriteStream;
}

// =============================================================================
// Progress Reporting
// =============================================================================

/**
 * One-line progress summary for non-interactive output.
 *
 * @example "Progress: 40% (4.0 MiB / 10.0 MiB) at 1.0 MiB/s, ETA 6s, 4 connections"
 */
export function formatSummary(progress: DownloadProgress): string {
  const amount =
    progress.totalBytes === null
      ? formatBytes(progress.downloadedBytes)
      : `${formatProgress(progress.progress ?? 0)} (${formatBytes(progress.downloadedBytes)} / ${formatBytes(progress.totalBytes)})`;
  const connections = `${progress.activeConnections} connection${progress.activeConnections === 1 ? '' : 's'}`;
  return `Progress: ${amount} at ${formatSpeed(progress.speed)}, ETA ${formatEta(progress.eta)}, ${connections}`;
}

/**
 * Logs download events as plain lines, with a summary every
 * `summaryInterval` seconds.
 *
 * @returns Detaches the listeners and stops the summary timer
 */
function attachLogReporter(
  download: SegmentedDownload,
  logger: Logger,
  summaryInterval: number
): () => void {
  let latest: DownloadProgress | null = null;

  const onStart = ({ outputPath, resource, segments, resumed }: DownloadEvents['download:start']) => {
    const size = resource.totalSize === null ? 'unknown size' : formatBytes(resource.totalSize);
    const plan = `${segments.length} segment${segments.length === 1 ? '' : 's'}`;
    logger.info(`${resumed ? 'Resuming' : 'Saving to'} ${outputPath} (${size}, ${plan})`);
  };
  const onProgress = (progress: DownloadProgress) => {
    latest = progress;
  };
  const onRetry = ({ segment, attempt, error }: DownloadEvents['segment:retry']) => {
    logger.warn(`Segment ${segment.index} attempt ${attempt} failed: ${error.message}; retrying`);
  };
  const onFallback = ({ reason }: DownloadEvents['download:fallback']) => logger.warn(reason);
  const onWarning = ({ message }: DownloadEvents['download:warning']) => logger.warn(message);

  download.on('download:start', onStart);
  download.on('download:progress', onProgress);
  download.on('segment:retry', onRetry);
  download.on('download:fallback', onFallback);
  download.on('download:warning', onWarning);

  const timer =
    summaryInterval > 0
      ? setInterval(() => {
          if (latest) {
            logger.info(formatSummary(latest));
          }
        }, summaryInterval * 1000)
      : null;
  timer?.unref();

  return () => {
    if (timer) {
      clearInterval(timer);
    }
    download.off('download:start', onStart);
    download.off('download:progress', onProgress);
    download.off('segment:retry', onRetry);
    download.off('download:fallback', onFallback);
    download.off('download:warning', onWarning);
  };
}

/**
 * Draws the live ink view until the download settles.
 *
 * @returns Unmounts the view after its final frame
 */
function attachViewReporter(
  download: SegmentedDownload,
  label: string,
  stream: NodeJS.WriteStream
): () => Promise<void> {
  const instance = render(<DownloadView download={download} label={label} />, {
    stdout: stream,
    exitOnCtrlC: false,
    patchConsole: false,
  });

  return async () => {
    // Let the last state update render before tearing down
    await new Promise<void>((resolve) => setImmediate(resolve));
    instance.unmount();
    await instance.waitUntilExit();
  };
}

// =============================================================================
// Engine Downloads
// =============================================================================

/**
 * Runs a segmented download with progress reporting and failure cleanup.
 *
 * @param ctx - Command context
 * @param label - Shown until the output file is known
 * @param action - Starts or resumes the download
 */
export async function runEngineDownload(
  ctx: CommandContext,
  label: string,
  action: (download: SegmentedDownload) => Promise<DownloadResult>
): Promise<DownloadResult> {
  const { logger } = ctx;
  const download = new SegmentedDownload({ dir: ctx.dir, config: ctx.config, signal: ctx.signal });

  const started: { outputPath?: string } = {};
  download.on('download:start', (event) => {
    started.outputPath = event.outputPath;
  });

  const detachLog = ctx.progressStream
    ? null
    : attachLogReporter(download, logger, ctx.config.summaryInterval);
  const detachView = ctx.progressStream
    ? attachViewReporter(download, label, ctx.progressStream)
    : null;

  try {
    const result = await action(download);
    await detachView?.();
    logger.success(
      `Download completed successfully! ${result.outputPath} (${formatBytes(result.totalBytes)} in ${formatDuration(result.elapsedMs)})`
    );
    return result;
  } catch (error) {
    await detachView?.();
    const { outputPath } = started;
    if (outputPath !== undefined) {
      if (error instanceof InterruptedError) {
        logger.info(`Progress saved. Resume with: -r ${path.basename(outputPath)}`);
      } else {
        logger.info(`Cleaning up control file for ${outputPath}`);
        await deleteControlFile(controlPathFor(outputPath));
      }
    }
    throw error;
  } finally {
    detachLog?.();
  }
}

// =============================================================================
// aria2c Downloads
// =============================================================================

/**
 * Hands a magnet link or .torrent file to aria2c.
 *
 * A non-zero exit removes aria2c's `*.aria2` control files and fails
 * with a DownloadError.
 */
export async function runAria2Download(
  source: DownloadSource,
  ctx: CommandContext
): Promise<void> {
  const { logger } = ctx;
  if (!ctx.aria2Path) {
    throw new DependencyError('aria2c is required for magnet links and .torrent files', ctx.config.aria2Path);
  }

  const args = buildAria2Args(source, ctx.dir, ctx.config);
  logger.info('Executing: aria2c with optimized settings');
  logger.debug(`${ctx.aria2Path} ${args.join(' ')}`);

  const code = await runAria2(ctx.aria2Path, args, { signal: ctx.signal, spawn: ctx.spawn });
  if (code !== 0) {
    logger.info(`Cleaning up temporary files matching: *${ARIA2_CONTROL_SUFFIX}`);
    const removed = await cleanupControlFiles(ctx.dir);
    for (const name of removed) {
      logger.debug(`Removed ${name}`);
    }
    throw new DownloadError(`Download failed with exit code: ${code}`);
  }
  logger.success('Download completed successfully!');
}

// =============================================================================
// Main Download Function
// =============================================================================

/**
 * Execute the download command (`-l`).
 *
 * @param source - Classified input
 * @param ctx - Command context
 */
export async function executeDownload(source: DownloadSource, ctx: CommandContext): Promise<void> {
  const { logger } = ctx;
  logger.info('Starting download...');
  logger.info(`Input: ${source.value}`);
  logger.info(`Download directory: ${ctx.dir}`);

  if (source.kind === 'http') {
    await runEngineDownload(ctx, source.value, (download) => download.start(source.value));
    return;
  }
  await runAria2Download(source, ctx);
}

export default executeDownload;
