import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFromEnv, parseSize } from '../../../src/engine/config/index.js';
import { ConfigError, FileAllocation } from '../../../src/engine/types.js';

describe('parseSize', () => {
  it('should parse binary units', () => {
    expect(parseSize('1M')).toBe(1048576);
    expect(parseSize('512k')).toBe(524288);
    expect(parseSize('2G')).toBe(2147483648);
    expect(parseSize('1MiB')).toBe(1048576);
  });

  it('should parse plain byte counts and fractions', () => {
    expect(parseSize('1048576')).toBe(1048576);
    expect(parseSize('1.5M')).toBe(1572864);
  });

  it('should reject text that is not a size', () => {
    expect(parseSize('abc')).toBeNull();
    expect(parseSize('-1')).toBeNull();
    expect(parseSize('')).toBeNull();
  });
});

describe('loadConfigFromEnv', () => {
  it('should return the defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it('should apply the tuning variables', () => {
    const config = loadConfigFromEnv({
      ARIA2_MAX_CONNECTIONS: '8',
      ARIA2_MIN_SPLIT_SIZE: '2M',
      ARIA2_MAX_CONCURRENT_DOWNLOADS: '1',
      ARIA2_TIMEOUT: '30',
      ARIA2_RETRY_WAIT: '0',
      ARIA2_MAX_TRIES: '0',
      ARIA2_SPLIT: '4',
      ARIA2_CHECK_CERTIFICATE: ' TRUE ',
    });

    expect(config).toMatchObject({
      maxConnections: 8,
      minSplitSize: 2097152,
      maxConcurrentDownloads: 1,
      timeout: 30,
      retryWait: 0,
      maxTries: 0,
      split: 4,
      checkCertificate: true,
    });
  });

  it('should apply the txdl settings', () => {
    const config = loadConfigFromEnv({
      TXDL_DOWNLOAD_DIR: '/srv/downloads',
      TXDL_ARIA2C: '/opt/aria2/bin/aria2c',
      TXDL_MIN_FREE_SPACE: '0',
      TXDL_FILE_ALLOCATION: 'prealloc',
      TXDL_USER_AGENT: 'custom/2.0',
      TXDL_LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      downloadDir: '/srv/downloads',
      aria2Path: '/opt/aria2/bin/aria2c',
      minFreeSpace: 0,
      fileAllocation: FileAllocation.PREALLOC,
      userAgent: 'custom/2.0',
      logLevel: 'debug',
    });
  });

  it('should treat empty variables as unset', () => {
    const config = loadConfigFromEnv({ ARIA2_SPLIT: '', TXDL_USER_AGENT: '' });

    expect(config.split).toBe(16);
    expect(config.userAgent).toBe(DEFAULT_CONFIG.userAgent);
  });

  it('should ignore unrelated variables', () => {
    expect(loadConfigFromEnv({ PATH: '/usr/bin', HOME: '/home/user' })).toEqual(DEFAULT_CONFIG);
  });

  it('should reject zero where a positive number is required', () => {
    expect(() => loadConfigFromEnv({ ARIA2_MAX_CONNECTIONS: '0' })).toThrow(
      'Invalid ARIA2_MAX_CONNECTIONS="0": must be greater than 0'
    );
  });

  it('should reject non-numeric values', () => {
    expect(() => loadConfigFromEnv({ ARIA2_TIMEOUT: 'soon' })).toThrow(
      'Invalid ARIA2_TIMEOUT="soon": must be a non-negative integer'
    );
  });

  it('should reject malformed sizes', () => {
    expect(() => loadConfigFromEnv({ ARIA2_MIN_SPLIT_SIZE: 'lots' })).toThrow(
      'Invalid ARIA2_MIN_SPLIT_SIZE="lots": must be a size such as 1M, 512K or 1048576'
    );
  });

  it('should name the offending variable', () => {
    try {
      loadConfigFromEnv({ TXDL_LOG_LEVEL: 'verbose' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('variable', 'TXDL_LOG_LEVEL');
    }
  });
});
