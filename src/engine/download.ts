/**
 * Segmented Download for txdl
 *
 * Downloads one HTTP(S) resource over several connections at once:
 * - Probes size, range support and validators
 * - Splits the file into byte-range segments
 * - Runs segment workers with a connection limit, writing at offsets
 * - Retries failed segments from the byte they reached
 * - Persists progress to a control file so the download can be resumed
 *
 * @module engine/download
 */

import * as path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import pLimit from 'p-limit';
import { CONTROL_FILE_SUFFIX } from '../shared/constants.js';
import {
  ControlFileAutoSaver,
  CONTROL_VERSION,
  controlPathFor,
  deleteControlFile,
  loadControlFile,
  type ControlFileData,
} from './control/control-file.js';
import { getAvailableSpace, OutputFile, resolveOutputPath } from './disk/io.js';
import { TypedEventEmitter, type DownloadEvents } from './events.js';
import { openRange, probeResource, type RequestOptions } from './http/client.js';
import {
  isSegmentComplete,
  planSegments,
  segmentLength,
  totalDownloaded,
} from './segment/planner.js';
import { SpeedTracker } from './segment/speed.js';
import {
  DiskFullError,
  DownloadError,
  DownloadState,
  InputError,
  InterruptedError,
  NetworkError,
  ResumeError,
  type DownloadProgress,
  type EngineConfig,
  type ResourceInfo,
  type Segment,
} from './types.js';

// =============================================================================
// Constants
// =============================================================================

/** Progress event throttle interval in milliseconds */
const PROGRESS_INTERVAL_MS = 250;

// =============================================================================
// Types
// =============================================================================

export interface SegmentedDownloadOptions {
  /** Download directory */
  dir: string;

  /** Engine configuration */
  config: EngineConfig;

  /** Aborts the download; the control file is kept for resuming */
  signal?: AbortSignal;
}

/**
 * Outcome of a completed download
 */
export interface DownloadResult {
  /** Absolute path of the written file */
  outputPath: string;

  /** File size in bytes */
  totalBytes: number;

  /** Bytes transferred during this run (excludes restored progress) */
  transferredBytes: number;

  /** Whether the run continued an earlier partial download */
  resumed: boolean;

  /** Number of segments the file was split into */
  segmentCount: number;

  /** Wall-clock duration of this run */
  elapsedMs: number;
}

/**
 * Picks the validator sent as If-Range: a strong ETag, else Last-Modified.
 */
export function pickValidator(resource: Pick<ResourceInfo, 'etag' | 'lastModified'>): string | undefined {
  if (resource.etag && !resource.etag.startsWith('W/')) {
    return resource.etag;
  }
  return resource.lastModified;
}

// =============================================================================
// SegmentedDownload Class
// =============================================================================

/**
 * A single multi-connection download.
 *
 * @example
 * ```typescript
 * const download = new SegmentedDownload({ dir: '/downloads', config });
 * download.on('download:progress', (p) => console.log(p.downloadedBytes));
 * const result = await download.start('https://example.com/file.zip');
 * ```
 */
export class SegmentedDownload extends TypedEventEmitter<DownloadEvents> {
  private readonly dir: string;
  private readonly config: EngineConfig;
  private readonly outerSignal?: AbortSignal;

  private currentState: DownloadState = DownloadState.PROBING;
  private segments: Segment[] = [];
  private resource: ResourceInfo | null = null;
  private sourceUrl = '';
  private createdAt = new Date().toISOString();
  private file: OutputFile | null = null;
  private rangeCapable = false;
  private activeConnections = 0;
  private restoredBytes = 0;
  private speed = new SpeedTracker();

  constructor(options: SegmentedDownloadOptions) {
    super();
    this.dir = options.dir;
    this.config = options.config;
    this.outerSignal = options.signal;
  }

  /** Current lifecycle state */
  get state(): DownloadState {
    return this.currentState;
  }

  /**
   * Start a new download of `url` into the download directory.
   *
   * If a partial download of the same URL already sits under the chosen
   * file name, it is continued instead.
   *
   * @throws {InterruptedError} When aborted (control file kept)
   * @throws {DownloadError} When the transfer fails
   * @throws {DiskError} On file system failures
   */
  async start(url: string): Promise<DownloadResult> {
    this.sourceUrl = url;
    this.currentState = DownloadState.PROBING;

    try {
      const resource = await this.probe(url);
      const { filePath, hasControlFile } = await resolveOutputPath(
        this.dir,
        resource.fileName,
        CONTROL_FILE_SUFFIX
      );

      if (hasControlFile) {
        const control = await loadControlFile(controlPathFor(filePath));
        if (control && control.sourceUrl !== url) {
          throw new ResumeError(
            `A partial download of ${control.sourceUrl} already uses ${path.basename(filePath)}`
          );
        }
        if (control) {
          return await this.continueFrom(filePath, control, resource);
        }
      }

      this.resource = resource;
      this.rangeCapable = resource.acceptRanges && resource.totalSize !== null;
      this.segments = planSegments(resource.totalSize, resource.acceptRanges, this.config);
      await this.ensureSpace(resource.totalSize ?? 0);

      this.file = new OutputFile(filePath, { allocation: this.config.fileAllocation });
      await this.file.create(resource.totalSize);

      if (!resource.acceptRanges) {
        this.emit('download:fallback', {
          reason: 'Server does not support byte ranges; using a single connection',
        });
      }

      return await this.run(false);
    } catch (error) {
      throw this.fail(error);
    }
  }

  /**
   * Continue a download from its control file.
   *
   * @param controlPath - Path of the `.txdl` control file
   * @throws {InputError} When the control file does not exist
   * @throws {ResumeError} When the partial data cannot be continued
   */
  async resume(controlPath: string): Promise<DownloadResult> {
    this.currentState = DownloadState.PROBING;

    try {
      const control = await loadControlFile(controlPath);
      if (!control) {
        throw new InputError(`Control file not found: ${controlPath}`);
      }

      const filePath = controlPath.endsWith(CONTROL_FILE_SUFFIX)
        ? controlPath.slice(0, -CONTROL_FILE_SUFFIX.length)
        : path.join(path.dirname(controlPath), control.fileName);

      this.sourceUrl = control.sourceUrl;
      const resource = await this.probe(control.sourceUrl);
      return await this.continueFrom(filePath, control, resource);
    } catch (error) {
      throw this.fail(error);
    }
  }

  // ===========================================================================
  // Private Methods - Lifecycle
  // ===========================================================================

  private async continueFrom(
    filePath: string,
    control: ControlFileData,
    resource: ResourceInfo
  ): Promise<DownloadResult> {
    assertUnchanged(control, resource);

    this.resource = resource;
    this.rangeCapable = true;
    this.createdAt = control.createdAt;
    this.segments = control.segments.map((segment) => ({ ...segment }));
    this.restoredBytes = totalDownloaded(this.segments);

    this.file = new OutputFile(filePath, { allocation: this.config.fileAllocation });
    try {
      await this.file.openExisting();
    } catch {
      throw new ResumeError(`Partial file is missing: ${filePath}`);
    }

    await this.ensureSpace(control.totalSize - this.restoredBytes);
    return this.run(true);
  }

  private async run(resumed: boolean): Promise<DownloadResult> {
    const file = this.requireFile();
    const resource = this.requireResource();
    const startedAt = Date.now();
    this.speed = new SpeedTracker();
    this.currentState = DownloadState.DOWNLOADING;

    this.emit('download:start', {
      resource,
      outputPath: file.filePath,
      segments: this.segments,
      resumed,
    });

    const controlPath = controlPathFor(file.filePath);
    const autoSaver = this.rangeCapable && (resource.totalSize ?? 0) > 0
      ? new ControlFileAutoSaver(
          controlPath,
          () => this.controlState(),
          (error) => this.warn(`Could not save control file: ${error.message}`),
          this.config.autoSaveInterval
        )
      : null;

    const controller = new AbortController();
    const onOuterAbort = () => controller.abort();
    this.outerSignal?.addEventListener('abort', onOuterAbort, { once: true });
    if (this.outerSignal?.aborted) {
      controller.abort();
    }

    const progressTimer = setInterval(() => this.emitProgress(), PROGRESS_INTERVAL_MS);
    progressTimer.unref();

    try {
      if (autoSaver) {
        await autoSaver.saveNow();
        autoSaver.start();
      }

      await this.runSegments(controller);

      clearInterval(progressTimer);
      await autoSaver?.stop();
      await this.verifyComplete(file);
      await file.close();
      await deleteControlFile(controlPath);

      this.emitProgress();
      this.currentState = DownloadState.COMPLETED;
      const totalBytes = totalDownloaded(this.segments);
      const elapsedMs = Date.now() - startedAt;
      this.emit('download:complete', { outputPath: file.filePath, totalBytes, elapsedMs });

      return {
        outputPath: file.filePath,
        totalBytes,
        transferredBytes: totalBytes - this.restoredBytes,
        resumed,
        segmentCount: this.segments.length,
        elapsedMs,
      };
    } catch (error) {
      clearInterval(progressTimer);
      await autoSaver?.stop();
      // Keep whatever progress was made so the download can be resumed
      if (autoSaver) {
        await autoSaver.saveNow().catch((saveError: unknown) => {
          this.warn(`Could not save control file: ${toError(saveError).message}`);
        });
      }
      await file.close().catch((closeError: unknown) => {
        this.warn(`Could not close ${file.filePath}: ${toError(closeError).message}`);
      });
      throw error;
    } finally {
      this.outerSignal?.removeEventListener('abort', onOuterAbort);
    }
  }

  /**
   * Runs every unfinished segment; the first fatal error stops the rest.
   */
  private async runSegments(controller: AbortController): Promise<void> {
    const pending = this.segments.filter((segment) => !isSegmentComplete(segment));
    if (pending.length === 0) {
      return;
    }

    const limit = pLimit(Math.max(1, Math.min(this.config.maxConnections, pending.length)));
    const errors: Error[] = [];

    await Promise.all(
      pending.map((segment) =>
        limit(async () => {
          if (controller.signal.aborted) {
            return;
          }
          try {
            await this.runSegment(segment, controller.signal);
            this.emit('segment:complete', { segment });
          } catch (error) {
            errors.push(toError(error));
            controller.abort();
          }
        })
      )
    );

    if (this.outerSignal?.aborted) {
      throw new InterruptedError();
    }
    if (errors.length > 0) {
      throw errors[0];
    }
  }

  /**
   * Asks the server about the resource, retrying transient failures with
   * the same limits as a segment.
   */
  private async probe(url: string): Promise<ResourceInfo> {
    const maxTries = this.config.maxTries;
    let attempt = 0;

    while (true) {
      attempt++;
      try {
        return await probeResource(url, this.requestOptions());
      } catch (error) {
        const retryable = error instanceof DownloadError && error.retryable;
        if (!retryable || (maxTries > 0 && attempt >= maxTries)) {
          throw toError(error);
        }

        this.emit('download:warning', {
          message: `Request for ${url} failed (attempt ${attempt}): ${toError(error).message}; retrying`,
        });
        try {
          await sleep(this.config.retryWait * 1000, undefined, { signal: this.outerSignal });
        } catch {
          throw new InterruptedError();
        }
      }
    }
  }

  /**
   * Downloads one segment, retrying transient failures.
   */
  private async runSegment(segment: Segment, signal: AbortSignal): Promise<void> {
    const maxTries = this.config.maxTries;
    let attempt = 0;

    while (true) {
      attempt++;
      try {
        const finished = await this.transferSegment(segment, signal);
        if (finished) {
          return;
        }
        throw new NetworkError(
          `Connection closed early at byte ${segment.start + segment.downloaded}`
        );
      } catch (error) {
        if (signal.aborted) {
          throw this.outerSignal?.aborted ? new InterruptedError() : toError(error);
        }
        const retryable = error instanceof DownloadError && error.retryable;
        if (!retryable) {
          throw toError(error);
        }
        if (maxTries > 0 && attempt >= maxTries) {
          throw new DownloadError(
            `Segment ${segment.index} failed after ${attempt} attempts: ${toError(error).message}`
          );
        }

        this.emit('segment:retry', { segment, attempt, error: toError(error) });
        try {
          await sleep(this.config.retryWait * 1000, undefined, { signal });
        } catch {
          throw this.outerSignal?.aborted ? new InterruptedError() : toError(error);
        }
      }
    }
  }

  /**
   * One request for the rest of a segment.
   *
   * @returns true when the segment is complete (or, for an unknown size,
   *   when the server ended the stream)
   */
  private async transferSegment(segment: Segment, signal: AbortSignal): Promise<boolean> {
    const file = this.requireFile();
    const resource = this.requireResource();

    if (!this.rangeCapable) {
      // Without ranges a retry starts over
      segment.downloaded = 0;
    }

    const { response, abort } = await openRange(
      resource.url,
      {
        start: segment.start + segment.downloaded,
        end: this.rangeCapable ? segment.end : -1,
        validator: this.rangeCapable ? pickValidator(resource) : undefined,
      },
      { ...this.requestOptions(), signal }
    );

    if (!response.body) {
      abort();
      throw new NetworkError('Response has no body');
    }

    const length = segmentLength(segment);
    const reader = response.body.getReader();
    const idleMs = this.config.timeout * 1000;
    let idleTimedOut = false;
    let idleTimer = setTimeout(onIdle, idleMs);
    function onIdle(): void {
      idleTimedOut = true;
      abort();
    }

    this.activeConnections++;
    try {
      while (true) {
        const chunk = await reader.read().catch((error: unknown) => {
          if (idleTimedOut) {
            throw new NetworkError(`No data received for ${this.config.timeout}s`);
          }
          if (signal.aborted) {
            throw toError(error);
          }
          throw new NetworkError(`Connection error: ${toError(error).message}`);
        });

        clearTimeout(idleTimer);
        if (chunk.done) {
          return length === null || segment.downloaded >= length;
        }
        idleTimer = setTimeout(onIdle, idleMs);

        let data: Uint8Array = chunk.value;
        if (length !== null) {
          const remaining = length - segment.downloaded;
          if (data.length > remaining) {
            data = data.subarray(0, remaining);
          }
        }

        if (data.length > 0) {
          await file.write(segment.start + segment.downloaded, data);
          segment.downloaded += data.length;
          this.speed.record(data.length);
        }

        if (length !== null && segment.downloaded >= length) {
          // Servers that ignore the end of the range keep sending
          abort();
          return true;
        }
      }
    } finally {
      clearTimeout(idleTimer);
      this.activeConnections--;
      reader.releaseLock();
    }
  }

  // ===========================================================================
  // Private Methods - Helpers
  // ===========================================================================

  private requestOptions(): RequestOptions {
    return {
      userAgent: this.config.userAgent,
      timeoutMs: this.config.timeout * 1000,
      signal: this.outerSignal,
    };
  }

  private requireFile(): OutputFile {
    if (!this.file) {
      throw new DownloadError('Download has no output file');
    }
    return this.file;
  }

  private requireResource(): ResourceInfo {
    if (!this.resource) {
      throw new DownloadError('Download has not been probed');
    }
    return this.resource;
  }

  private async ensureSpace(requiredBytes: number): Promise<void> {
    if (requiredBytes <= 0) {
      return;
    }
    const available = await getAvailableSpace(this.dir);
    if (available < requiredBytes) {
      throw new DiskFullError(
        `Not enough disk space in ${this.dir}: need ${requiredBytes} bytes, ${available} available`,
        this.dir,
        requiredBytes,
        available
      );
    }
  }

  private async verifyComplete(file: OutputFile): Promise<void> {
    const expected = this.resource?.totalSize ?? null;
    if (expected === null) {
      return;
    }
    const downloaded = totalDownloaded(this.segments);
    if (downloaded !== expected) {
      throw new DownloadError(`Incomplete download: ${downloaded} of ${expected} bytes`);
    }
    await file.sync();
    const onDisk = await file.size();
    if (onDisk !== expected) {
      throw new DownloadError(`File size mismatch: ${onDisk} bytes on disk, expected ${expected}`);
    }
  }

  private controlState(): ControlFileData {
    const resource = this.requireResource();
    return {
      version: CONTROL_VERSION,
      sourceUrl: this.sourceUrl,
      resolvedUrl: resource.url,
      fileName: path.basename(this.requireFile().filePath),
      totalSize: resource.totalSize ?? 0,
      etag: resource.etag,
      lastModified: resource.lastModified,
      segments: this.segments,
      createdAt: this.createdAt,
      savedAt: new Date().toISOString(),
    };
  }

  private progress(): DownloadProgress {
    const totalBytes = this.resource?.totalSize ?? null;
    const downloadedBytes = totalDownloaded(this.segments);
    return {
      totalBytes,
      downloadedBytes,
      progress: totalBytes ? downloadedBytes / totalBytes : totalBytes === 0 ? 1 : null,
      speed: this.speed.speed(),
      eta: totalBytes === null ? null : this.speed.eta(totalBytes - downloadedBytes),
      activeConnections: this.activeConnections,
      remainingSegments: this.segments.filter((segment) => !isSegmentComplete(segment)).length,
    };
  }

  private warn(message: string): void {
    this.emit('download:warning', { message });
  }

  private emitProgress(): void {
    this.emit('download:progress', this.progress());
  }

  private fail(error: unknown): Error {
    const err = this.outerSignal?.aborted && !(error instanceof InterruptedError)
      ? new InterruptedError()
      : toError(error);
    this.currentState = err instanceof InterruptedError
      ? DownloadState.INTERRUPTED
      : DownloadState.ERROR;
    this.emit('download:error', { error: err });
    return err;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Refuses to continue when the remote file differs from the one the
 * control file describes.
 */
function assertUnchanged(control: ControlFileData, resource: ResourceInfo): void {
  if (!resource.acceptRanges) {
    throw new ResumeError('Server no longer supports byte ranges; cannot resume');
  }
  if (resource.totalSize !== control.totalSize) {
    throw new ResumeError(
      `Remote file changed: size is ${resource.totalSize ?? 'unknown'}, expected ${control.totalSize}`
    );
  }
  if (control.etag && resource.etag && control.etag !== resource.etag) {
    throw new ResumeError('Remote file changed: ETag differs from the partial download');
  }
  if (
    !(control.etag && resource.etag) &&
    control.lastModified &&
    resource.lastModified &&
    control.lastModified !== resource.lastModified
  ) {
    throw new ResumeError('Remote file changed: Last-Modified differs from the partial download');
  }
}
