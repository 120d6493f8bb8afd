/**
 * Default configuration values for the txdl engine.
 *
 * The transfer settings match aria2c's tuned values so that the built-in
 * engine and the aria2c backend behave alike.
 *
 * @module engine/config/defaults
 */

import { APP_NAME, VERSION } from '../../shared/constants.js';
import { getDefaultDownloadDir } from '../../utils/platform.js';
import { FileAllocation, type EngineConfig } from '../types.js';

/** One mebibyte */
const MiB = 1024 * 1024;

/**
 * Default engine configuration.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  /** ~/Downloads */
  downloadDir: getDefaultDownloadDir(),

  /** Connections per server */
  maxConnections: 16,

  /** Segments are never smaller than 1 MiB */
  minSplitSize: MiB,

  /** At most 16 segments per file */
  split: 16,

  /** aria2c queue width */
  maxConcurrentDownloads: 3,

  /** Seconds of silence before a connection is dropped */
  timeout: 60,

  /** Seconds between attempts */
  retryWait: 3,

  /** Attempts per segment */
  maxTries: 5,

  fileAllocation: FileAllocation.FALLOC,

  /** Refuse to start with less than 100 MiB free */
  minFreeSpace: 100 * MiB,

  aria2Path: 'aria2c',

  checkCertificate: false,

  userAgent: `${APP_NAME}/${VERSION}`,

  /** Plain-text progress summary every 5 seconds */
  summaryInterval: 5,

  /** Persist segment progress every 2 seconds */
  autoSaveInterval: 2000,

  logLevel: 'info',
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(
  partialConfig?: Partial<EngineConfig>
): EngineConfig {
  if (!partialConfig) {
    return { ...DEFAULT_CONFIG };
  }
  return { ...DEFAULT_CONFIG, ...partialConfig };
}
