import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { SegmentedDownload, pickValidator } from '../../src/engine/download.js';
import { mergeWithDefaults } from '../../src/engine/config/index.js';
import {
  controlFileExists,
  loadControlFile,
} from '../../src/engine/control/control-file.js';
import { OutputFile } from '../../src/engine/disk/io.js';
import {
  DiskFullError,
  DownloadError,
  DownloadState,
  FileAllocation,
  HttpError,
  InterruptedError,
  ResumeError,
  exitCodeFor,
  type Segment,
} from '../../src/engine/types.js';
import {
  createRangeServer,
  makePayload,
  type RangeServerOptions,
} from '../helpers/range-server.js';

// =============================================================================
// Test Helpers
// =============================================================================

const URL_A = 'https://files.example.com/data.bin';
const KiB = 1024;

const config = mergeWithDefaults({
  split: 4,
  maxConnections: 4,
  minSplitSize: 16 * KiB,
  retryWait: 0,
  maxTries: 3,
  timeout: 5,
  autoSaveInterval: 60_000,
  minFreeSpace: 0,
  fileAllocation: FileAllocation.TRUNC,
  userAgent: 'txdl-test/1.0',
});

let testDir: string;

async function createTestDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'txdl-download-test-'));
}

/**
 * Starts a 64 KiB download whose responses stall after 4 KiB each, and
 * aborts it once all four segments have stalled.
 */
async function interruptMidway(
  body: Uint8Array,
  options: Partial<RangeServerOptions> = {},
  url = URL_A
): Promise<string> {
  const controller = new AbortController();
  let stalls = 0;
  const server = createRangeServer({
    body,
    etag: '"v1"',
    stallAfter: 4 * KiB,
    onStall: () => {
      stalls++;
      if (stalls === 4) {
        controller.abort();
      }
    },
    ...options,
  });
  vi.stubGlobal('fetch', server.fetch);

  const download = new SegmentedDownload({ dir: testDir, config, signal: controller.signal });
  await expect(download.start(url)).rejects.toBeInstanceOf(InterruptedError);
  expect(download.state).toBe(DownloadState.INTERRUPTED);

  return path.join(testDir, 'data.bin.txdl');
}

function sortedRanges(ranges: Array<string | null>): Array<string | null> {
  return [...ranges].sort();
}

// =============================================================================
// Tests
// =============================================================================

describe('SegmentedDownload', () => {
  beforeEach(async () => {
    testDir = await createTestDir();
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('start', () => {
    it('should download a file over four range requests', async () => {
      const body = makePayload(64 * KiB);
      const server = createRangeServer({ body, etag: '"v1"' });
      vi.stubGlobal('fetch', server.fetch);

      const download = new SegmentedDownload({ dir: testDir, config });
      const result = await download.start(URL_A);

      expect(result.outputPath).toBe(path.join(testDir, 'data.bin'));
      expect(result.totalBytes).toBe(65536);
      expect(result.transferredBytes).toBe(65536);
      expect(result.segmentCount).toBe(4);
      expect(result.resumed).toBe(false);
      expect(download.state).toBe(DownloadState.COMPLETED);

      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
      expect(sortedRanges(server.dataRequests().map((r) => r.range))).toEqual([
        'bytes=0-16383',
        'bytes=16384-32767',
        'bytes=32768-49151',
        'bytes=49152-65535',
      ]);
    });

    it('should send the configured User-Agent and the ETag as If-Range', async () => {
      const server = createRangeServer({ body: makePayload(32 * KiB), etag: '"v1"' });
      vi.stubGlobal('fetch', server.fetch);

      await new SegmentedDownload({ dir: testDir, config }).start(URL_A);

      for (const request of server.dataRequests()) {
        expect(request.userAgent).toBe('txdl-test/1.0');
        expect(request.ifRange).toBe('"v1"');
      }
    });

    it('should remove the control file after completion', async () => {
      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(64 * KiB) }).fetch);

      await new SegmentedDownload({ dir: testDir, config }).start(URL_A);

      expect(await controlFileExists(path.join(testDir, 'data.bin.txdl'))).toBe(false);
    });

    it('should emit start, segment and completion events', async () => {
      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(64 * KiB) }).fetch);
      const download = new SegmentedDownload({ dir: testDir, config });
      const starts: number[] = [];
      const completed: number[] = [];
      const totals: number[] = [];

      download.on('download:start', ({ segments }) => starts.push(segments.length));
      download.on('segment:complete', ({ segment }) => completed.push(segment.index));
      download.on('download:complete', ({ totalBytes }) => totals.push(totalBytes));

      await download.start(URL_A);

      expect(starts).toEqual([4]);
      expect([...completed].sort()).toEqual([0, 1, 2, 3]);
      expect(totals).toEqual([65536]);
    });

    it('should name the file from Content-Disposition', async () => {
      vi.stubGlobal(
        'fetch',
        createRangeServer({
          body: makePayload(20 * KiB),
          contentDisposition: 'attachment; filename="report.pdf"',
        }).fetch
      );

      const result = await new SegmentedDownload({ dir: testDir, config }).start(URL_A);

      expect(result.outputPath).toBe(path.join(testDir, 'report.pdf'));
    });

    it('should pick a numbered name when the file already exists', async () => {
      await fs.writeFile(path.join(testDir, 'data.bin'), 'old');
      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(20 * KiB) }).fetch);

      const result = await new SegmentedDownload({ dir: testDir, config }).start(URL_A);

      expect(result.outputPath).toBe(path.join(testDir, 'data.1.bin'));
      expect(await fs.readFile(path.join(testDir, 'data.bin'), 'utf-8')).toBe('old');
    });

    it('should create an empty file for a zero-byte resource', async () => {
      vi.stubGlobal('fetch', createRangeServer({ body: new Uint8Array(0) }).fetch);

      const result = await new SegmentedDownload({ dir: testDir, config }).start(URL_A);

      expect(result.totalBytes).toBe(0);
      expect(result.segmentCount).toBe(0);
      const stats = await fs.stat(result.outputPath);
      expect(stats.size).toBe(0);
    });
  });

  describe('fallback to one connection', () => {
    it('should use a single request when the server ignores ranges', async () => {
      const body = makePayload(40_000);
      const server = createRangeServer({ body, acceptRanges: false });
      vi.stubGlobal('fetch', server.fetch);
      const download = new SegmentedDownload({ dir: testDir, config });
      const reasons: string[] = [];
      download.on('download:fallback', ({ reason }) => reasons.push(reason));

      const result = await download.start(URL_A);

      expect(result.segmentCount).toBe(1);
      expect(reasons).toEqual(['Server does not support byte ranges; using a single connection']);
      expect(server.dataRequests().map((r) => r.range)).toEqual([null]);
      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
    });

    it('should download a resource of unknown size', async () => {
      const body = makePayload(40_000);
      vi.stubGlobal(
        'fetch',
        createRangeServer({ body, acceptRanges: false, sendLength: false }).fetch
      );

      const result = await new SegmentedDownload({ dir: testDir, config }).start(URL_A);

      expect(result.totalBytes).toBe(40_000);
      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
    });

    it('should not write a control file without range support', async () => {
      const controller = new AbortController();
      vi.stubGlobal(
        'fetch',
        createRangeServer({
          body: makePayload(40_000),
          acceptRanges: false,
          stallAfter: 4 * KiB,
          onStall: () => controller.abort(),
        }).fetch
      );

      const download = new SegmentedDownload({ dir: testDir, config, signal: controller.signal });
      await expect(download.start(URL_A)).rejects.toBeInstanceOf(InterruptedError);

      expect(await controlFileExists(path.join(testDir, 'data.bin.txdl'))).toBe(false);
    });
  });

  describe('retries', () => {
    it('should retry a segment after a 503', async () => {
      const body = makePayload(64 * KiB);
      let failed = false;
      const server = createRangeServer({
        body,
        intercept: (request) => {
          if (!failed && request.range === 'bytes=16384-32767') {
            failed = true;
            return new Response(null, { status: 503, statusText: 'Service Unavailable' });
          }
          return undefined;
        },
      });
      vi.stubGlobal('fetch', server.fetch);
      const download = new SegmentedDownload({ dir: testDir, config });
      const retries: Array<{ index: number; attempt: number; message: string }> = [];
      download.on('segment:retry', ({ segment, attempt, error }) =>
        retries.push({ index: segment.index, attempt, message: error.message })
      );

      const result = await download.start(URL_A);

      expect(retries).toEqual([
        { index: 1, attempt: 1, message: 'HTTP error 503: Service Unavailable' },
      ]);
      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
    });

    it('should give up after maxTries attempts', async () => {
      vi.stubGlobal(
        'fetch',
        createRangeServer({
          body: makePayload(64 * KiB),
          intercept: (request) =>
            request.range === 'bytes=32768-49151'
              ? new Response(null, { status: 500, statusText: 'Internal Server Error' })
              : undefined,
        }).fetch
      );
      const download = new SegmentedDownload({
        dir: testDir,
        config: { ...config, maxTries: 2 },
      });

      const error = await download.start(URL_A).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DownloadError);
      expect(error).toHaveProperty(
        'message',
        'Segment 2 failed after 2 attempts: HTTP error 500: Internal Server Error'
      );
      expect(download.state).toBe(DownloadState.ERROR);
    });

    it('should not retry a 404', async () => {
      const server = createRangeServer({
        body: makePayload(64 * KiB),
        intercept: (request) =>
          request.range === 'bytes=0-16383'
            ? new Response(null, { status: 404, statusText: 'Not Found' })
            : undefined,
      });
      vi.stubGlobal('fetch', server.fetch);

      const error = await new SegmentedDownload({ dir: testDir, config })
        .start(URL_A)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toHaveProperty('status', 404);
      expect(server.requests.filter((r) => r.range === 'bytes=0-16383')).toHaveLength(1);
    });
  });

  describe('stalls and failures', () => {
    it('should retry a stalled connection from the bytes already written', async () => {
      const body = makePayload(40_000);
      const server = createRangeServer({ body, stallAfter: 8 * KiB });
      vi.stubGlobal('fetch', server.fetch);
      const download = new SegmentedDownload({
        dir: testDir,
        config: { ...config, split: 1, maxConnections: 1, maxTries: 0, timeout: 0.2 },
      });
      const retries: Array<{ attempt: number; message: string }> = [];
      download.on('segment:retry', ({ attempt, error }) =>
        retries.push({ attempt, message: error.message })
      );

      const result = await download.start(URL_A);

      // maxTries 0 lets the segment take five attempts
      expect(server.dataRequests().map((r) => r.range)).toEqual([
        'bytes=0-39999',
        'bytes=8192-39999',
        'bytes=16384-39999',
        'bytes=24576-39999',
        'bytes=32768-39999',
      ]);
      expect(retries).toEqual(
        [1, 2, 3, 4].map((attempt) => ({ attempt, message: 'No data received for 0.2s' }))
      );
      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
    });

    it('should stop without retrying when the disk is full', async () => {
      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(64 * KiB) }).fetch);
      const outputPath = path.join(testDir, 'data.bin');
      const write = vi
        .spyOn(OutputFile.prototype, 'write')
        .mockRejectedValue(
          new DiskFullError(`Disk full: cannot write 4096 bytes in ${outputPath}`, outputPath, 4096)
        );
      const download = new SegmentedDownload({ dir: testDir, config });
      const retries: number[] = [];
      download.on('segment:retry', ({ attempt }) => retries.push(attempt));

      const error = await download.start(URL_A).catch((err: unknown) => err);
      write.mockRestore();

      expect(error).toBeInstanceOf(DiskFullError);
      expect(error).toHaveProperty('message', `Disk full: cannot write 4096 bytes in ${outputPath}`);
      expect(exitCodeFor(error)).toBe(3);
      expect(retries).toEqual([]);
      expect(download.state).toBe(DownloadState.ERROR);
    });

    it('should retry the first request after a 503', async () => {
      const body = makePayload(64 * KiB);
      let heads = 0;
      const server = createRangeServer({
        body,
        intercept: (request) => {
          if (request.method === 'HEAD' && heads++ === 0) {
            return new Response(null, { status: 503, statusText: 'Service Unavailable' });
          }
          return undefined;
        },
      });
      vi.stubGlobal('fetch', server.fetch);
      const download = new SegmentedDownload({ dir: testDir, config });
      const warnings: string[] = [];
      download.on('download:warning', ({ message }) => warnings.push(message));

      const result = await download.start(URL_A);

      expect(warnings).toEqual([
        `Request for ${URL_A} failed (attempt 1): HTTP error 503: Service Unavailable; retrying`,
      ]);
      expect(server.requests.filter((r) => r.method === 'HEAD')).toHaveLength(2);
      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
    });

    it('should give up on the first request after maxTries attempts', async () => {
      const server = createRangeServer({
        body: makePayload(KiB),
        intercept: () => new Response(null, { status: 503, statusText: 'Service Unavailable' }),
      });
      vi.stubGlobal('fetch', server.fetch);
      const download = new SegmentedDownload({
        dir: testDir,
        config: { ...config, maxTries: 2 },
      });

      const error = await download.start(URL_A).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toHaveProperty('message', 'HTTP error 503: Service Unavailable');
      expect(server.requests.map((r) => r.method)).toEqual(['HEAD', 'HEAD']);
      expect(download.state).toBe(DownloadState.ERROR);
    });
  });

  describe('interrupt and resume', () => {
    it('should save segment progress when interrupted', async () => {
      const controlPath = await interruptMidway(makePayload(64 * KiB));

      const control = await loadControlFile(controlPath);
      expect(control?.sourceUrl).toBe(URL_A);
      expect(control?.totalSize).toBe(65536);
      expect(control?.etag).toBe('"v1"');
      expect(control?.segments.map((s: Segment) => s.downloaded)).toEqual([4096, 4096, 4096, 4096]);
    });

    it('should fetch only the missing ranges when resumed', async () => {
      const body = makePayload(64 * KiB);
      const controlPath = await interruptMidway(body);

      const server = createRangeServer({ body, etag: '"v1"' });
      vi.stubGlobal('fetch', server.fetch);
      const result = await new SegmentedDownload({ dir: testDir, config }).resume(controlPath);

      expect(result.resumed).toBe(true);
      expect(result.transferredBytes).toBe(65536 - 16384);
      expect(sortedRanges(server.dataRequests().map((r) => r.range))).toEqual([
        'bytes=20480-32767',
        'bytes=36864-49151',
        'bytes=4096-16383',
        'bytes=53248-65535',
      ]);
      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
      expect(await controlFileExists(controlPath)).toBe(false);
    });

    it('should continue a partial download when started again with the same URL', async () => {
      const body = makePayload(64 * KiB);
      await interruptMidway(body);

      vi.stubGlobal('fetch', createRangeServer({ body, etag: '"v1"' }).fetch);
      const result = await new SegmentedDownload({ dir: testDir, config }).start(URL_A);

      expect(result.resumed).toBe(true);
      expect(result.outputPath).toBe(path.join(testDir, 'data.bin'));
      const written = await fs.readFile(result.outputPath);
      expect(Buffer.compare(written, Buffer.from(body))).toBe(0);
    });

    it('should refuse a partial download that belongs to another URL', async () => {
      await interruptMidway(makePayload(64 * KiB));

      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(64 * KiB) }).fetch);
      const download = new SegmentedDownload({ dir: testDir, config });

      await expect(download.start('https://mirror.example.com/data.bin')).rejects.toBeInstanceOf(
        ResumeError
      );
    });

    it('should refuse to resume when the ETag changed', async () => {
      const controlPath = await interruptMidway(makePayload(64 * KiB));

      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(64 * KiB), etag: '"v2"' }).fetch);
      const error = await new SegmentedDownload({ dir: testDir, config })
        .resume(controlPath)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ResumeError);
      expect(error).toHaveProperty(
        'message',
        'Remote file changed: ETag differs from the partial download'
      );
    });

    it('should refuse to resume when the size changed', async () => {
      const controlPath = await interruptMidway(makePayload(64 * KiB));

      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(80 * KiB), etag: '"v1"' }).fetch);
      const error = await new SegmentedDownload({ dir: testDir, config })
        .resume(controlPath)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ResumeError);
      expect(error).toHaveProperty(
        'message',
        'Remote file changed: size is 81920, expected 65536'
      );
    });

    it('should fail when the partial file is gone', async () => {
      const controlPath = await interruptMidway(makePayload(64 * KiB));
      await fs.rm(path.join(testDir, 'data.bin'));

      vi.stubGlobal('fetch', createRangeServer({ body: makePayload(64 * KiB), etag: '"v1"' }).fetch);
      const error = await new SegmentedDownload({ dir: testDir, config })
        .resume(controlPath)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ResumeError);
      expect(error).toHaveProperty(
        'message',
        `Partial file is missing: ${path.join(testDir, 'data.bin')}`
      );
    });
  });
});

describe('pickValidator', () => {
  it('should prefer a strong ETag', () => {
    expect(pickValidator({ etag: '"abc"', lastModified: 'Tue, 01 Oct 2024 10:00:00 GMT' })).toBe('"abc"');
  });

  it('should fall back to Last-Modified for a weak ETag', () => {
    expect(pickValidator({ etag: 'W/"abc"', lastModified: 'Tue, 01 Oct 2024 10:00:00 GMT' })).toBe(
      'Tue, 01 Oct 2024 10:00:00 GMT'
    );
  });

  it('should return undefined without validators', () => {
    expect(pickValidator({})).toBeUndefined();
  });
});
