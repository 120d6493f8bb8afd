/**
 * Disk I/O Layer for txdl
 *
 * Handles low-level file operations for downloaded data:
 * - Output file allocation strategies
 * - Positional writes from concurrent segments
 * - Free-space queries
 * - Output path selection with automatic renaming
 *
 * @module engine/disk/io
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { DiskError, DiskFullError, FileAllocation } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface OutputFileOptions {
  /** File allocation strategy */
  allocation?: FileAllocation;
}

/** Chunk size used when zero-filling (1 MiB) */
const ZERO_FILL_CHUNK = 1024 * 1024;

// =============================================================================
// OutputFile Class
// =============================================================================

/**
 * The file a download writes into.
 *
 * Segments write concurrently at their own offsets through a single
 * file handle.
 *
 * @example
 * ```typescript
 * const file = new OutputFile('/downloads/file.zip', {
 *   allocation: FileAllocation.TRUNC,
 * });
 * await file.create(totalSize);
 * await file.write(segment.start, chunk);
 * await file.close();
 * ```
 */
export class OutputFile {
  readonly filePath: string;

  private readonly allocation: FileAllocation;

  private handle: fs.FileHandle | null = null;

  constructor(filePath: string, options: OutputFileOptions = {}) {
    this.filePath = filePath;
    this.allocation = options.allocation ?? FileAllocation.TRUNC;
  }

  /**
   * Create (or truncate) the file and allocate it.
   *
   * @param totalSize - Final size, or null when unknown (no allocation)
   * @throws DiskError if the file cannot be created
   */
  async create(totalSize: number | null): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    try {
      this.handle = await fs.open(this.filePath, 'w');
    } catch (err) {
      throw this.toDiskError(err, 'create', 0);
    }

    if (totalSize !== null && totalSize > 0) {
      await this.allocate(totalSize);
    }
  }

  /**
   * Open an existing partial file for resuming.
   *
   * @throws DiskError if the file does not exist or cannot be opened
   */
  async openExisting(): Promise<void> {
    try {
      this.handle = await fs.open(this.filePath, 'r+');
    } catch (err) {
      throw this.toDiskError(err, 'open', 0);
    }
  }

  /**
   * Write data at an absolute file offset.
   *
   * @throws DiskFullError on ENOSPC, DiskError otherwise
   */
  async write(offset: number, data: Uint8Array): Promise<void> {
    const handle = this.requireHandle();
    let written = 0;

    try {
      while (written < data.length) {
        const { bytesWritten } = await handle.write(
          data,
          written,
          data.length - written,
          offset + written
        );
        written += bytesWritten;
      }
    } catch (err) {
      throw this.toDiskError(err, 'write', data.length - written);
    }
  }

  /**
   * Flush file data to the storage device.
   */
  async sync(): Promise<void> {
    if (!this.handle) {
      return;
    }
    try {
      await this.handle.datasync();
    } catch (err) {
      throw this.toDiskError(err, 'sync', 0);
    }
  }

  /**
   * Current size of the file on disk.
   */
  async size(): Promise<number> {
    const stats = await fs.stat(this.filePath);
    return stats.size;
  }

  /**
   * Close the file handle. Safe to call more than once.
   */
  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private requireHandle(): fs.FileHandle {
    if (!this.handle) {
      throw new DiskError('Output file is not open', this.filePath);
    }
    return this.handle;
  }

  private async allocate(totalSize: number): Promise<void> {
    const handle = this.requireHandle();

    try {
      switch (this.allocation) {
        case FileAllocation.NONE:
          return;
        case FileAllocation.PREALLOC: {
          const zeroChunk = Buffer.alloc(Math.min(ZERO_FILL_CHUNK, totalSize));
          let offset = 0;
          while (offset < totalSize) {
            const length = Math.min(zeroChunk.length, totalSize - offset);
            await handle.write(zeroChunk, 0, length, offset);
            offset += length;
          }
          return;
        }
        case FileAllocation.TRUNC:
        case FileAllocation.FALLOC:
        default:
          // Node has no fallocate(2); a sparse truncate reserves the size
          await handle.truncate(totalSize);
          return;
      }
    } catch (err) {
      throw this.toDiskError(err, 'allocate', totalSize);
    }
  }

  private toDiskError(err: unknown, operation: string, requiredBytes: number): DiskError {
    const nodeErr = err as NodeJS.ErrnoException;
    if (nodeErr.code === 'ENOSPC') {
      return new DiskFullError(
        `Disk full: cannot ${operation} ${requiredBytes} bytes in ${this.filePath}`,
        this.filePath,
        requiredBytes
      );
    }
    return new DiskError(
      `Failed to ${operation} ${this.filePath}: ${nodeErr.message}`,
      this.filePath
    );
  }
}

// =============================================================================
// Free Space
// =============================================================================

/**
 * Get available disk space for unprivileged users on the file system
 * holding `dir`.
 *
 * @returns Available space in bytes
 * @throws DiskError if space cannot be determined
 */
export async function getAvailableSpace(dir: string): Promise<number> {
  try {
    const stats = await fs.statfs(dir);
    return stats.bavail * stats.bsize;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DiskError(`Failed to get available space: ${message}`, dir);
  }
}

// =============================================================================
// Output Path Selection
// =============================================================================

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Inserts a counter before the extension: `file.zip` -> `file.1.zip`.
 */
export function numberedName(fileName: string, counter: number): string {
  const ext = path.extname(fileName);
  const stem = ext ? fileName.slice(0, -ext.length) : fileName;
  return `${stem}.${counter}${ext}`;
}

/**
 * Picks the path a new download writes to.
 *
 * The plain name is used when it is free, or when it is a partial
 * download (its control file exists) that the caller may continue.
 * Otherwise `name.1.ext`, `name.2.ext`, ... is tried.
 *
 * @param dir - Download directory
 * @param fileName - Desired file name
 * @param controlSuffix - Suffix of the resume sidecar
 * @returns The chosen path and whether it has a control file to continue
 */
export async function resolveOutputPath(
  dir: string,
  fileName: string,
  controlSuffix: string
): Promise<{ filePath: string; hasControlFile: boolean }> {
  const maxAttempts = 10000;

  for (let counter = 0; counter < maxAttempts; counter++) {
    const name = counter === 0 ? fileName : numberedName(fileName, counter);
    const filePath = path.join(dir, name);

    if (await exists(`${filePath}${controlSuffix}`)) {
      if (counter === 0) {
        return { filePath, hasControlFile: true };
      }
      continue;
    }

    if (!(await exists(filePath))) {
      return { filePath, hasControlFile: false };
    }
  }

  throw new DiskError(`No free file name for ${fileName}`, path.join(dir, fileName));
}
