/**
 * Download source classification.
 *
 * Decides which backend handles an input: HTTP(S) URLs go to the
 * segmented engine, magnet links and .torrent files to aria2c.
 *
 * @module engine/source
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { InputError } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type SourceKind = 'http' | 'magnet' | 'torrent';

/**
 * A validated download source.
 */
export interface DownloadSource {
  kind: SourceKind;

  /** URL, magnet URI, or absolute path of a .torrent file */
  value: string;
}

// =============================================================================
// Constants
// =============================================================================

const HTTP_PATTERN = /^https?:\/\//i;
const MAGNET_PATTERN = /^magnet:/i;
const TORRENT_EXT = '.torrent';

// =============================================================================
// Classification
// =============================================================================

/**
 * Whether the input is a magnet URI.
 */
export function isMagnetUri(input: string): boolean {
  return MAGNET_PATTERN.test(input);
}

/**
 * Whether the source is handled by aria2c rather than the built-in engine.
 */
export function isBitTorrentSource(source: DownloadSource): boolean {
  return source.kind === 'magnet' || source.kind === 'torrent';
}

/**
 * Classifies and validates a `-l` input.
 *
 * @param input - URL, magnet link or .torrent file path
 * @param cwd - Directory relative file paths are resolved against
 * @throws {InputError} When the input is none of the accepted forms
 */
export async function classifySource(
  input: string,
  cwd: string = process.cwd()
): Promise<DownloadSource> {
  const trimmed = input.trim();

  if (HTTP_PATTERN.test(trimmed)) {
    try {
      new URL(trimmed);
    } catch {
      throw new InputError(`Invalid URL or file: ${input}`);
    }
    return { kind: 'http', value: trimmed };
  }

  if (isMagnetUri(trimmed)) {
    return { kind: 'magnet', value: trimmed };
  }

  if (trimmed.toLowerCase().endsWith(TORRENT_EXT)) {
    const filePath = path.resolve(cwd, trimmed);
    try {
      const stats = await fs.stat(filePath);
      if (stats.isFile()) {
        return { kind: 'torrent', value: filePath };
      }
    } catch {
      // Missing file falls through to the generic error
    }
  }

  throw new InputError(`Invalid URL or file: ${input}`);
}

// =============================================================================
// Torrent Discovery
// =============================================================================

async function collectTorrentFiles(
  dir: string,
  found: Array<{ filePath: string; mtimeMs: number }>
): Promise<void> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    // Unreadable subdirectories are skipped, like `find` does
    return;
  }

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectTorrentFiles(entryPath, found);
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(TORRENT_EXT)) {
      const stats = await fs.stat(entryPath);
      found.push({ filePath: entryPath, mtimeMs: stats.mtimeMs });
    }
  }
}

/**
 * Finds the most recently modified .torrent file under a directory.
 *
 * @param dir - Directory to search recursively
 * @returns Absolute path of the newest .torrent file
 * @throws {InputError} When no .torrent file exists
 */
export async function findRecentTorrent(dir: string): Promise<string> {
  const found: Array<{ filePath: string; mtimeMs: number }> = [];
  await collectTorrentFiles(path.resolve(dir), found);

  if (found.length === 0) {
    throw new InputError(`No .torrent files found in ${dir}`);
  }

  found.sort((a, b) => b.mtimeMs - a.mtimeMs);
  return found[0].filePath;
}
