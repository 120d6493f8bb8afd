/**
 * aria2c backend for BitTorrent inputs
 *
 * Magnet links and .torrent files are handed to the external aria2c
 * binary. Arguments are passed as a vector, never through a shell.
 *
 * @module engine/aria2/command
 */

import { spawn as spawnProcess } from 'child_process';
import { promises as fs } from 'fs';
import * as path from 'path';
import { ARIA2_CONTROL_SUFFIX } from '../../shared/constants.js';
import type { DownloadSource } from '../source.js';
import { isBitTorrentSource } from '../source.js';
import {
  DependencyError,
  DownloadError,
  InterruptedError,
  type EngineConfig,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The parts of a child process runAria2 relies on
 */
export interface Aria2Process {
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFunction = (
  command: string,
  args: string[],
  options: { stdio: 'inherit' }
) => Aria2Process;

export interface RunAria2Options {
  /** Forwarded to aria2c as SIGINT */
  signal?: AbortSignal;

  /** Process factory (replaced in tests) */
  spawn?: SpawnFunction;
}

/** BitTorrent tuning passed for magnet and .torrent inputs */
const BITTORRENT_ARGS = [
  '--seed-time=0',
  '--bt-max-peers=100',
  '--bt-request-peer-speed-limit=100K',
  '--max-upload-limit=1K',
  '--listen-port=6881-6999',
  '--enable-dht=true',
  '--bt-enable-lpd=true',
  '--bt-enable-hook-after-hash-check=true',
];

// =============================================================================
// Arguments
// =============================================================================

/**
 * Formats a byte count the way aria2c reads sizes (`1M`, `512K`).
 */
export function formatAria2Size(bytes: number): string {
  const units: Array<[string, number]> = [
    ['G', 1024 ** 3],
    ['M', 1024 ** 2],
    ['K', 1024],
  ];
  for (const [suffix, factor] of units) {
    if (bytes >= factor && bytes % factor === 0) {
      return `${bytes / factor}${suffix}`;
    }
  }
  return String(bytes);
}

/**
 * Builds the aria2c argument vector for one input.
 *
 * @param source - Classified input; the value is passed as the last argument
 * @param dir - Download directory
 * @param config - Engine configuration
 */
export function buildAria2Args(
  source: DownloadSource,
  dir: string,
  config: EngineConfig
): string[] {
  const args = [
    `--dir=${dir}`,
    `--max-connection-per-server=${config.maxConnections}`,
    `--min-split-size=${formatAria2Size(config.minSplitSize)}`,
    `--max-concurrent-downloads=${config.maxConcurrentDownloads}`,
    `--timeout=${config.timeout}`,
    `--retry-wait=${config.retryWait}`,
    `--max-tries=${config.maxTries}`,
    '--continue=true',
    '--auto-file-renaming=true',
    `--split=${config.split}`,
    `--file-allocation=${config.fileAllocation}`,
    `--check-certificate=${config.checkCertificate}`,
  ];

  if (isBitTorrentSource(source)) {
    args.push(...BITTORRENT_ARGS);
  }

  args.push(
    `--summary-interval=${config.summaryInterval}`,
    '--console-log-level=notice',
    source.value
  );
  return args;
}

// =============================================================================
// Process
// =============================================================================

/**
 * Runs aria2c with inherited stdio until it exits.
 *
 * @param executable - Resolved aria2c path
 * @param args - Arguments from buildAria2Args
 * @returns The exit code (0 on success)
 * @throws {DependencyError} When the binary cannot be started
 * @throws {InterruptedError} When the signal aborted the run
 */
export function runAria2(
  executable: string,
  args: string[],
  options: RunAria2Options = {}
): Promise<number> {
  const spawn: SpawnFunction = options.spawn ?? spawnProcess;
  const { signal } = options;

  return new Promise<number>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedError());
      return;
    }

    const child = spawn(executable, args, { stdio: 'inherit' });
    const onAbort = () => {
      child.kill('SIGINT');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.once('error', (error) => {
      signal?.removeEventListener('abort', onAbort);
      reject(new DependencyError(`Failed to start ${executable}: ${error.message}`, executable));
    });

    child.once('exit', (code, exitSignal) => {
      signal?.removeEventListener('abort', onAbort);
      if (signal?.aborted) {
        reject(new InterruptedError());
        return;
      }
      if (code === null) {
        reject(new DownloadError(`aria2c was terminated by ${exitSignal ?? 'a signal'}`));
        return;
      }
      resolve(code);
    });
  });
}

/**
 * Deletes aria2c control files (`*.aria2`) directly inside `dir`.
 *
 * @returns Names of the deleted files
 */
export async function cleanupControlFiles(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw err;
  }

  const removed: string[] = [];
  for (const name of entries) {
    if (name.endsWith(ARIA2_CONTROL_SUFFIX)) {
      await fs.rm(path.join(dir, name), { force: true });
      removed.push(name);
    }
  }
  return removed;
}
