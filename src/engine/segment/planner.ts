/**
 * Segment planning.
 *
 * Splits a file of known size into contiguous byte ranges, one per
 * connection, the way aria2c applies `--split`,
 * `--max-connection-per-server` and `--min-split-size`.
 *
 * @module engine/segment/planner
 */

import type { Segment } from '../types.js';

export interface PlanOptions {
  /** Upper bound on segments per file */
  split: number;

  /** Connections allowed to one server */
  maxConnections: number;

  /** Smallest segment worth a connection of its own */
  minSplitSize: number;
}

/**
 * Number of segments for a file of `totalSize` bytes.
 *
 * Never more than `split` or `maxConnections`, never so many that a
 * segment drops below `minSplitSize`, and at least one.
 */
export function segmentCount(totalSize: number, options: PlanOptions): number {
  const cap = Math.max(1, Math.min(options.split, options.maxConnections));
  const bySize = Math.floor(totalSize / Math.max(1, options.minSplitSize));
  return Math.max(1, Math.min(cap, bySize));
}

/**
 * Plans the segment table for a download.
 *
 * Segments are contiguous, do not overlap and together cover
 * `[0, totalSize)`; leftover bytes of an uneven split go to the last one.
 *
 * @param totalSize - File size in bytes, or null when unknown
 * @param acceptRanges - Whether the server honours byte ranges
 * @param options - Split limits
 */
export function planSegments(
  totalSize: number | null,
  acceptRanges: boolean,
  options: PlanOptions
): Segment[] {
  if (totalSize === null) {
    return [{ index: 0, start: 0, end: -1, downloaded: 0 }];
  }
  if (totalSize === 0) {
    return [];
  }
  if (!acceptRanges) {
    return [{ index: 0, start: 0, end: totalSize - 1, downloaded: 0 }];
  }

  const count = segmentCount(totalSize, options);
  const baseLength = Math.floor(totalSize / count);
  const segments: Segment[] = [];

  for (let index = 0; index < count; index++) {
    const start = index * baseLength;
    const end = index === count - 1 ? totalSize - 1 : start + baseLength - 1;
    segments.push({ index, start, end, downloaded: 0 });
  }

  return segments;
}

/**
 * Byte length of a segment, or null when it runs to an unknown end.
 */
export function segmentLength(segment: Segment): number | null {
  return segment.end < 0 ? null : segment.end - segment.start + 1;
}

/**
 * Whether every byte of the segment has been written.
 */
export function isSegmentComplete(segment: Segment): boolean {
  const length = segmentLength(segment);
  return length !== null && segment.downloaded >= length;
}

/**
 * Bytes written across all segments.
 */
export function totalDownloaded(segments: readonly Segment[]): number {
  return segments.reduce((sum, segment) => sum + segment.downloaded, 0);
}
