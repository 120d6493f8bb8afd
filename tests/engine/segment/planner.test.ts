import { describe, it, expect } from 'vitest';
import {
  isSegmentComplete,
  planSegments,
  segmentCount,
  segmentLength,
  totalDownloaded,
  type PlanOptions,
} from '../../../src/engine/segment/planner.js';

const MiB = 1024 * 1024;

const options: PlanOptions = {
  split: 16,
  maxConnections: 16,
  minSplitSize: MiB,
};

describe('segmentCount', () => {
  it('should cap at split and maxConnections', () => {
    expect(segmentCount(100 * MiB, options)).toBe(16);
    expect(segmentCount(100 * MiB, { ...options, split: 4 })).toBe(4);
    expect(segmentCount(100 * MiB, { ...options, maxConnections: 2 })).toBe(2);
  });

  it('should keep segments at least minSplitSize long', () => {
    expect(segmentCount(3 * MiB + 10, options)).toBe(3);
    expect(segmentCount(MiB - 1, options)).toBe(1);
  });

  it('should return at least one segment', () => {
    expect(segmentCount(1, options)).toBe(1);
    expect(segmentCount(100, { split: 0, maxConnections: 0, minSplitSize: 0 })).toBe(1);
  });
});

describe('planSegments', () => {
  it('should cover the file with contiguous segments', () => {
    const segments = planSegments(10 * MiB + 3, true, { ...options, split: 4 });

    expect(segments).toHaveLength(4);
    const base = Math.floor((10 * MiB + 3) / 4);
    expect(segments[0]).toEqual({ index: 0, start: 0, end: base - 1, downloaded: 0 });
    for (let i = 1; i < segments.length; i++) {
      expect(segments[i].start).toBe(segments[i - 1].end + 1);
    }
    expect(segments[3].end).toBe(10 * MiB + 2);
  });

  it('should give the remainder to the last segment', () => {
    const segments = planSegments(10, true, { split: 3, maxConnections: 3, minSplitSize: 1 });

    expect(segments).toEqual([
      { index: 0, start: 0, end: 2, downloaded: 0 },
      { index: 1, start: 3, end: 5, downloaded: 0 },
      { index: 2, start: 6, end: 9, downloaded: 0 },
    ]);
  });

  it('should use one segment when ranges are not supported', () => {
    expect(planSegments(50 * MiB, false, options)).toEqual([
      { index: 0, start: 0, end: 50 * MiB - 1, downloaded: 0 },
    ]);
  });

  it('should use one open-ended segment for an unknown size', () => {
    expect(planSegments(null, true, options)).toEqual([
      { index: 0, start: 0, end: -1, downloaded: 0 },
    ]);
  });

  it('should plan nothing for an empty file', () => {
    expect(planSegments(0, true, options)).toEqual([]);
  });
});

describe('segment helpers', () => {
  it('should measure segment length', () => {
    expect(segmentLength({ index: 0, start: 10, end: 19, downloaded: 0 })).toBe(10);
    expect(segmentLength({ index: 0, start: 0, end: -1, downloaded: 5 })).toBeNull();
  });

  it('should detect completion', () => {
    expect(isSegmentComplete({ index: 0, start: 10, end: 19, downloaded: 10 })).toBe(true);
    expect(isSegmentComplete({ index: 0, start: 10, end: 19, downloaded: 9 })).toBe(false);
    expect(isSegmentComplete({ index: 0, start: 0, end: -1, downloaded: 100 })).toBe(false);
  });

  it('should sum downloaded bytes', () => {
    expect(
      totalDownloaded([
        { index: 0, start: 0, end: 9, downloaded: 4 },
        { index: 1, start: 10, end: 19, downloaded: 10 },
      ])
    ).toBe(14);
  });
});
