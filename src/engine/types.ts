/**
 * Core type definitions for the txdl engine.
 *
 * These types define the fundamental data structures used throughout the
 * download engine: download state, byte-range segments, progress snapshots,
 * engine configuration and the error hierarchy.
 *
 * @module engine/types
 */

import { ExitCode } from '../shared/constants.js';

// =============================================================================
// Enums
// =============================================================================

/**
 * Represents the current state of a download in its lifecycle.
 *
 * State transitions:
 *   (new) -> PROBING -> DOWNLOADING -> COMPLETED
 *               |            |
 *             ERROR <--------+--> INTERRUPTED
 */
export enum DownloadState {
  /** Asking the server for size, range support and validators */
  PROBING = 'probing',

  /** Segment workers are transferring data */
  DOWNLOADING = 'downloading',

  /** All bytes written and the control file removed */
  COMPLETED = 'completed',

  /** Aborted by the user; the control file was kept */
  INTERRUPTED = 'interrupted',

  /** Failed after exhausting retries or on a fatal response */
  ERROR = 'error',
}

/**
 * How the output file is allocated before data arrives.
 *
 * Names follow aria2c's `--file-allocation` values so the same setting
 * drives both backends.
 */
export enum FileAllocation {
  /** Create the file empty and let it grow */
  NONE = 'none',

  /** Truncate to the final size (sparse where the file system allows) */
  TRUNC = 'trunc',

  /** Write zeros for the full size up front */
  PREALLOC = 'prealloc',

  /** Reserve space; falls back to a sparse truncate */
  FALLOC = 'falloc',
}

/** Log verbosity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

// =============================================================================
// Segments and Progress
// =============================================================================

/**
 * A contiguous byte range of the output file fetched by one connection.
 */
export interface Segment {
  /** Position in the segment table */
  index: number;

  /** First byte offset (inclusive) */
  start: number;

  /**
   * Last byte offset (inclusive), or -1 when the total size is unknown
   * and the segment runs until the server closes the stream
   */
  end: number;

  /** Bytes already written from `start` */
  downloaded: number;
}

/**
 * Snapshot emitted while a download runs.
 */
export interface DownloadProgress {
  /** Total bytes, or null when the server did not announce a size */
  totalBytes: number | null;

  /** Bytes written so far, including bytes restored from a control file */
  downloadedBytes: number;

  /** Ratio 0-1, or null when the total is unknown */
  progress: number | null;

  /** Bytes per second over the recent window */
  speed: number;

  /** Seconds remaining, or null when it cannot be estimated */
  eta: number | null;

  /** Segments with a request in flight */
  activeConnections: number;

  /** Segments still missing bytes */
  remainingSegments: number;
}

/**
 * Facts about a remote resource learned from a probe request.
 */
export interface ResourceInfo {
  /** URL after redirects */
  url: string;

  /** Size in bytes, or null if unknown */
  totalSize: number | null;

  /** Whether the server honours `Range: bytes=` requests */
  acceptRanges: boolean;

  /** Strong or weak entity tag */
  etag?: string;

  /** `Last-Modified` header value */
  lastModified?: string;

  /** File name suggested by the server or derived from the URL */
  fileName: string;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Engine configuration.
 *
 * Time values are in seconds and sizes in bytes, matching the units the
 * environment variables use.
 */
export interface EngineConfig {
  /** Default directory for downloaded files */
  downloadDir: string;

  /** Maximum simultaneous connections to one server */
  maxConnections: number;

  /** Never split a file into segments smaller than this */
  minSplitSize: number;

  /** Upper bound on the number of segments per file */
  split: number;

  /** Parallel downloads inside aria2c */
  maxConcurrentDownloads: number;

  /** Seconds without data before a connection is dropped */
  timeout: number;

  /** Seconds to wait between retries */
  retryWait: number;

  /** Attempts per segment (0 = unlimited) */
  maxTries: number;

  /** Output file allocation strategy */
  fileAllocation: FileAllocation;

  /** Refuse to start with less free space than this (bytes) */
  minFreeSpace: number;

  /** aria2c executable name or path */
  aria2Path: string;

  /** Whether aria2c verifies TLS certificates */
  checkCertificate: boolean;

  /** User-Agent header for engine requests */
  userAgent: string;

  /** Seconds between plain-text progress summaries */
  summaryInterval: number;

  /** Milliseconds between control file saves while downloading */
  autoSaveInterval: number;

  /** Log verbosity */
  logLevel: LogLevel;

  /** Append log lines to this file as well */
  logFile?: string;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for all txdl errors.
 *
 * `exitCode` is the process exit status the CLI reports for the error.
 */
export class TxdlError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCode.GENERAL) {
    super(message);
    this.name = 'TxdlError';
    this.exitCode = exitCode;
  }
}

/**
 * Error thrown for malformed command lines.
 */
export class UsageError extends TxdlError {
  constructor(message: string) {
    super(message, ExitCode.GENERAL);
    this.name = 'UsageError';
  }
}

/**
 * Error thrown when an input (URL, file, directory content) is unusable.
 */
export class InputError extends TxdlError {
  constructor(message: string) {
    super(message, ExitCode.GENERAL);
    this.name = 'InputError';
  }
}

/**
 * Error thrown when an environment variable holds an invalid value.
 */
export class ConfigError extends TxdlError {
  /** Name of the offending variable */
  readonly variable: string;

  constructor(message: string, variable: string) {
    super(message, ExitCode.GENERAL);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

/**
 * Error thrown when a required external binary cannot be found.
 */
export class DependencyError extends TxdlError {
  /** The missing executable */
  readonly executable: string;

  constructor(message: string, executable: string) {
    super(message, ExitCode.DEPENDENCY);
    this.name = 'DependencyError';
    this.executable = executable;
  }
}

/**
 * Error thrown when disk I/O operations fail.
 */
export class DiskError extends TxdlError {
  /** The file path that caused the error */
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message, ExitCode.DISK);
    this.name = 'DiskError';
    this.filePath = filePath;
  }
}

/**
 * Error thrown when a directory cannot be created or written to.
 */
export class PermissionError extends DiskError {
  constructor(message: string, filePath: string) {
    super(message, filePath);
    this.name = 'PermissionError';
  }
}

/**
 * Error thrown when there is not enough free space (or on ENOSPC).
 */
export class DiskFullError extends DiskError {
  /** Required space in bytes */
  readonly requiredBytes: number;

  /** Available space in bytes (if known) */
  readonly availableBytes?: number;

  constructor(
    message: string,
    filePath: string,
    requiredBytes: number,
    availableBytes?: number
  ) {
    super(message, filePath);
    this.name = 'DiskFullError';
    this.requiredBytes = requiredBytes;
    this.availableBytes = availableBytes;
  }
}

/**
 * Error thrown when a transfer fails.
 *
 * `retryable` tells the segment worker whether another attempt may succeed.
 */
export class DownloadError extends TxdlError {
  readonly retryable: boolean;

  constructor(message: string, retryable = false) {
    super(message, ExitCode.DOWNLOAD);
    this.name = 'DownloadError';
    this.retryable = retryable;
  }
}

/**
 * Error thrown for an unexpected HTTP status.
 */
export class HttpError extends DownloadError {
  /** HTTP status code */
  readonly status: number;

  /** Request URL */
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP error ${status}${statusText ? `: ${statusText}` : ''}`, isRetryableStatus(status));
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}

/**
 * Error thrown when a connection fails or stalls.
 */
export class NetworkError extends DownloadError {
  constructor(message: string) {
    super(message, true);
    this.name = 'NetworkError';
  }
}

/**
 * Error thrown when a partial download cannot be continued.
 */
export class ResumeError extends DownloadError {
  constructor(message: string) {
    super(message, false);
    this.name = 'ResumeError';
  }
}

/**
 * Error thrown when the user interrupts a download.
 */
export class InterruptedError extends TxdlError {
  constructor(message = 'Download interrupted by user') {
    super(message, ExitCode.INTERRUPTED);
    this.name = 'InterruptedError';
  }
}

/**
 * Whether an HTTP status is worth another attempt.
 *
 * Request timeouts, "too early", rate limiting and server errors are
 * transient; every other client error is final.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/**
 * Exit code for any thrown value.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof TxdlError) {
    return error.exitCode;
  }
  return ExitCode.GENERAL;
}
