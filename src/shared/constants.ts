/**
 * Shared constants for txdl.
 *
 * @module shared/constants
 */

/** Application name, used in help output and the default User-Agent */
export const APP_NAME = 'txdl';

/** Current version */
export const VERSION = '0.1.0';

/**
 * Process exit codes.
 *
 * Every error class carries one of these; `run()` returns it and the
 * entry point hands it to `process.exit`.
 */
export const ExitCode = {
  /** Operation completed */
  SUCCESS: 0,

  /** Usage, input or configuration error */
  GENERAL: 1,

  /** A required external binary is missing */
  DEPENDENCY: 2,

  /** Directory, permission or free-space failure */
  DISK: 3,

  /** Download or resume failed */
  DOWNLOAD: 4,

  /** Interrupted by SIGINT/SIGTERM */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Suffix of the engine's resume sidecar file */
export const CONTROL_FILE_SUFFIX = '.txdl';

/** Suffix of aria2c's own control files */
export const ARIA2_CONTROL_SUFFIX = '.aria2';
