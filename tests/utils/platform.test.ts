import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { expandPath, findExecutable, getDefaultDownloadDir } from '../../src/utils/platform.js';

describe('expandPath', () => {
  it('should expand a leading tilde', () => {
    expect(expandPath('~/Downloads/iso')).toBe(path.join(os.homedir(), 'Downloads', 'iso'));
    expect(expandPath('~')).toBe(os.homedir());
  });

  it('should leave other paths untouched', () => {
    expect(expandPath('/tmp/x')).toBe('/tmp/x');
    expect(expandPath('relative/~')).toBe('relative/~');
  });
});

describe('getDefaultDownloadDir', () => {
  it('should point at the Downloads folder in the home directory', () => {
    expect(getDefaultDownloadDir()).toBe(path.join(os.homedir(), 'Downloads'));
  });
});

describe.skipIf(process.platform === 'win32')('findExecutable', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'txdl-platform-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('should search PATH for a bare name', async () => {
    const binary = path.join(testDir, 'fake-tool');
    await fs.writeFile(binary, '#!/bin/sh\n', { mode: 0o755 });

    expect(await findExecutable('fake-tool', { PATH: `/nonexistent${path.delimiter}${testDir}` })).toBe(
      binary
    );
  });

  it('should skip files without execute permission', async () => {
    await fs.writeFile(path.join(testDir, 'plain-file'), 'x', { mode: 0o644 });

    expect(await findExecutable('plain-file', { PATH: testDir })).toBeNull();
  });

  it('should check a path as given', async () => {
    const binary = path.join(testDir, 'tool');
    await fs.writeFile(binary, '#!/bin/sh\n', { mode: 0o755 });

    expect(await findExecutable(binary, { PATH: '' })).toBe(binary);
    expect(await findExecutable(path.join(testDir, 'missing'), { PATH: '' })).toBeNull();
  });

  it('should return null when PATH is empty', async () => {
    expect(await findExecutable('fake-tool', {})).toBeNull();
  });
});
