/**
 * Control file persistence for txdl
 *
 * A control file sits beside a partial download (`<file>.txdl`) and
 * records everything needed to continue it: where it came from, the
 * validators that prove the remote file has not changed, and how many
 * bytes each segment has written.
 *
 * Format: JSON, written atomically through a temp file and rename.
 *
 * @module engine/control/control-file
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { CONTROL_FILE_SUFFIX } from '../../shared/constants.js';
import { ResumeError } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

/** Current control file format version */
export const CONTROL_VERSION = 1;

/** Default auto-save interval in milliseconds */
export const DEFAULT_AUTO_SAVE_INTERVAL = 2000;

// =============================================================================
// Types
// =============================================================================

const segmentSchema = z.object({
  index: z.number().int().nonnegative(),
  start: z.number().int().nonnegative(),
  end: z.number().int().min(-1),
  downloaded: z.number().int().nonnegative(),
});

const controlSchema = z.object({
  /** Format version for future migrations */
  version: z.literal(CONTROL_VERSION),

  /** URL given on the command line */
  sourceUrl: z.string().url(),

  /** URL after redirects, used for range requests */
  resolvedUrl: z.string().url(),

  /** Output file name (no directory) */
  fileName: z.string().min(1),

  /** Total size in bytes */
  totalSize: z.number().int().nonnegative(),

  etag: z.string().optional(),
  lastModified: z.string().optional(),

  segments: z.array(segmentSchema).min(1),

  /** Timestamp when the download started */
  createdAt: z.string(),

  /** Timestamp of this save */
  savedAt: z.string(),
});

/**
 * Persisted download state stored on disk
 */
export type ControlFileData = z.infer<typeof controlSchema>;

// =============================================================================
// Persistence Functions
// =============================================================================

/**
 * Gets the control file path for an output file.
 */
export function controlPathFor(filePath: string): string {
  return `${filePath}${CONTROL_FILE_SUFFIX}`;
}

/**
 * Saves download state next to the output file.
 *
 * @param controlPath - Control file path
 * @param data - State to persist
 */
export async function saveControlFile(
  controlPath: string,
  data: ControlFileData
): Promise<void> {
  const tempPath = `${controlPath}.tmp`;
  const payload: ControlFileData = {
    ...data,
    segments: data.segments.map((segment) => ({ ...segment })),
    savedAt: new Date().toISOString(),
  };

  try {
    // Write to temp file first for atomic operation
    await fs.writeFile(tempPath, JSON.stringify(payload, null, 2), 'utf-8');
    await fs.rename(tempPath, controlPath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to save control file: ${message}`);
  }
}

/**
 * Loads and validates a control file.
 *
 * @param controlPath - Control file path
 * @returns The stored state, or null if the file does not exist
 * @throws {ResumeError} When the file is unreadable or not a valid control file
 */
export async function loadControlFile(
  controlPath: string
): Promise<ControlFileData | null> {
  let raw: string;
  try {
    raw = await fs.readFile(controlPath, 'utf-8');
  } catch (err) {
    const error = err as NodeJS.ErrnoException;
    if (error.code === 'ENOENT') {
      return null;
    }
    throw new ResumeError(`Cannot read control file ${controlPath}: ${error.message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ResumeError(
      `Control file ${controlPath} may be corrupted or incompatible: not valid JSON`
    );
  }

  const result = controlSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    throw new ResumeError(
      `Control file ${controlPath} may be corrupted or incompatible: ${issue.message}${where}`
    );
  }

  validateSegments(controlPath, result.data);
  return result.data;
}

/**
 * Checks that the stored segments tile the file and stay within bounds.
 */
function validateSegments(controlPath: string, data: ControlFileData): void {
  let expectedStart = 0;

  for (const segment of data.segments) {
    const end = segment.end < 0 ? data.totalSize - 1 : segment.end;
    const length = end - segment.start + 1;
    if (segment.start !== expectedStart || length < 0 || segment.downloaded > length) {
      throw new ResumeError(
        `Control file ${controlPath} may be corrupted or incompatible: segment ${segment.index} is out of range`
      );
    }
    expectedStart = end + 1;
  }

  if (expectedStart !== data.totalSize) {
    throw new ResumeError(
      `Control file ${controlPath} may be corrupted or incompatible: segments do not cover ${data.totalSize} bytes`
    );
  }
}

/**
 * Deletes a control file. Missing files are ignored.
 */
export async function deleteControlFile(controlPath: string): Promise<void> {
  await fs.rm(controlPath, { force: true });
  await fs.rm(`${controlPath}.tmp`, { force: true });
}

/**
 * Checks if a control file exists on disk.
 */
export async function controlFileExists(controlPath: string): Promise<boolean> {
  try {
    await fs.access(controlPath);
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// Auto-Save Manager
// =============================================================================

/**
 * Callback for getting the current download state
 */
export type GetControlStateCallback = () => ControlFileData;

/**
 * Periodically persists download state while segments are running.
 *
 * Saves are serialised; a tick that arrives during a save is skipped.
 */
export class ControlFileAutoSaver {
  private readonly controlPath: string;
  private readonly interval: number;
  private readonly getState: GetControlStateCallback;
  private readonly onError: (error: Error) => void;
  private timer: ReturnType<typeof setInterval> | null = null;
  private pending: Promise<void> | null = null;
  private lastSavedBytes = -1;

  /**
   * @param controlPath - Control file path
   * @param getState - Callback returning the state to save
   * @param onError - Receives auto-save failures (they do not stop the download)
   * @param interval - Auto-save interval in milliseconds
   */
  constructor(
    controlPath: string,
    getState: GetControlStateCallback,
    onError: (error: Error) => void,
    interval: number = DEFAULT_AUTO_SAVE_INTERVAL
  ) {
    this.controlPath = controlPath;
    this.getState = getState;
    this.onError = onError;
    this.interval = interval;
  }

  /**
   * Starts the auto-save timer
   */
  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      if (this.pending) {
        return;
      }
      this.pending = this.saveIfChanged()
        .catch((err: unknown) =>
          this.onError(err instanceof Error ? err : new Error(String(err)))
        )
        .finally(() => {
          this.pending = null;
        });
    }, this.interval);
    this.timer.unref();
  }

  /**
   * Stops the timer and waits for a save in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.pending) {
      await this.pending;
    }
  }

  /**
   * Saves immediately, regardless of progress since the last save
   */
  async saveNow(): Promise<void> {
    if (this.pending) {
      await this.pending;
    }
    const state = this.getState();
    await saveControlFile(this.controlPath, state);
    this.lastSavedBytes = bytesIn(state);
  }

  private async saveIfChanged(): Promise<void> {
    const state = this.getState();
    const bytes = bytesIn(state);
    if (bytes === this.lastSavedBytes) {
      return;
    }
    await saveControlFile(this.controlPath, state);
    this.lastSavedBytes = bytes;
  }
}

function bytesIn(state: ControlFileData): number {
  return state.segments.reduce((sum, segment) => sum + segment.downloaded, 0);
}

