/**
 * Environment-based configuration.
 *
 * Reads the `ARIA2_*` tuning variables and the `TXDL_*` settings,
 * validates them with zod and merges them over the defaults.
 *
 * @module engine/config/env
 */

import { z } from 'zod';
import { expandPath } from '../../utils/platform.js';
import { ConfigError, FileAllocation, type EngineConfig } from '../types.js';
import { mergeWithDefaults } from './defaults.js';

// =============================================================================
// Size Parsing
// =============================================================================

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  K: 1024,
  M: 1024 * 1024,
  G: 1024 * 1024 * 1024,
};

/**
 * Parses a size such as `1M`, `512K`, `2G` or `1048576`.
 *
 * Units are binary (K = 1024) and case-insensitive, as in aria2c.
 *
 * @returns Size in bytes, or null if the text is not a size
 */
export function parseSize(text: string): number | null {
  const match = /^(\d+(?:\.\d+)?)\s*([KMG]?)(?:i?B)?$/i.exec(text.trim());
  if (!match) {
    return null;
  }
  const value = Number.parseFloat(match[1]);
  const unit = SIZE_UNITS[match[2].toUpperCase()];
  return Math.floor(value * unit);
}

// =============================================================================
// Schemas
// =============================================================================

const nonNegativeInt = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((value) => Number.parseInt(value, 10));

const positiveInt = nonNegativeInt.refine((value) => value > 0, 'must be greater than 0');

const size = z.string().transform((value, ctx) => {
  const bytes = parseSize(value);
  if (bytes === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'must be a size such as 1M, 512K or 1048576',
    });
    return z.NEVER;
  }
  return bytes;
});

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const text = z.string().min(1, 'must not be empty');

/** Treat empty variables as unset */
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

const envSchema = z.object({
  ARIA2_MAX_CONNECTIONS: optional(positiveInt),
  ARIA2_MIN_SPLIT_SIZE: optional(size.refine((value) => value > 0, 'must be greater than 0')),
  ARIA2_MAX_CONCURRENT_DOWNLOADS: optional(positiveInt),
  ARIA2_TIMEOUT: optional(positiveInt),
  ARIA2_RETRY_WAIT: optional(nonNegativeInt),
  ARIA2_MAX_TRIES: optional(nonNegativeInt),
  ARIA2_SPLIT: optional(positiveInt),
  ARIA2_CHECK_CERTIFICATE: optional(flag),
  TXDL_DOWNLOAD_DIR: optional(text.transform(expandPath)),
  TXDL_ARIA2C: optional(text),
  TXDL_MIN_FREE_SPACE: optional(size),
  TXDL_FILE_ALLOCATION: optional(z.nativeEnum(FileAllocation)),
  TXDL_USER_AGENT: optional(text),
  TXDL_LOG_FILE: optional(text.transform(expandPath)),
  TXDL_LOG_LEVEL: optional(z.enum(['debug', 'info', 'warn', 'error'])),
});

// =============================================================================
// Loading
// =============================================================================

function setIfDefined<K extends keyof EngineConfig>(
  target: Partial<EngineConfig>,
  key: K,
  value: EngineConfig[K] | undefined
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Builds the engine configuration from environment variables.
 *
 * Unset or empty variables keep their default.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws {ConfigError} Naming the first invalid variable
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = String(issue.path[0]);
    throw new ConfigError(`Invalid ${name}="${env[name] ?? ''}": ${issue.message}`, name);
  }

  const vars = result.data;
  const overrides: Partial<EngineConfig> = {};
  setIfDefined(overrides, 'maxConnections', vars.ARIA2_MAX_CONNECTIONS);
  setIfDefined(overrides, 'minSplitSize', vars.ARIA2_MIN_SPLIT_SIZE);
  setIfDefined(overrides, 'maxConcurrentDownloads', vars.ARIA2_MAX_CONCURRENT_DOWNLOADS);
  setIfDefined(overrides, 'timeout', vars.ARIA2_TIMEOUT);
  setIfDefined(overrides, 'retryWait', vars.ARIA2_RETRY_WAIT);
  setIfDefined(overrides, 'maxTries', vars.ARIA2_MAX_TRIES);
  setIfDefined(overrides, 'split', vars.ARIA2_SPLIT);
  setIfDefined(overrides, 'checkCertificate', vars.ARIA2_CHECK_CERTIFICATE);
  setIfDefined(overrides, 'downloadDir', vars.TXDL_DOWNLOAD_DIR);
  setIfDefined(overrides, 'aria2Path', vars.TXDL_ARIA2C);
  setIfDefined(overrides, 'minFreeSpace', vars.TXDL_MIN_FREE_SPACE);
  setIfDefined(overrides, 'fileAllocation', vars.TXDL_FILE_ALLOCATION);
  setIfDefined(overrides, 'userAgent', vars.TXDL_USER_AGENT);
  setIfDefined(overrides, 'logFile', vars.TXDL_LOG_FILE);
  setIfDefined(overrides, 'logLevel', vars.TXDL_LOG_LEVEL);

  return mergeWithDefaults(overrides);
}
