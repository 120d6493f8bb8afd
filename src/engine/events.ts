/**
 * Typed Event Emitter for the txdl engine
 *
 * Wraps Node's EventEmitter so event names and payloads are checked at
 * compile time.
 *
 * @module engine/events
 */

import { EventEmitter } from 'events';
import type { DownloadProgress, ResourceInfo, Segment } from './types.js';

// ============================================================================
// Event Map
// ============================================================================

/**
 * Events emitted by a SegmentedDownload.
 */
export interface DownloadEvents {
  /** Probe finished and segment workers are about to start */
  'download:start': {
    resource: ResourceInfo;
    outputPath: string;
    segments: readonly Segment[];
    resumed: boolean;
  };

  /** Throttled progress snapshot */
  'download:progress': DownloadProgress;

  /** One segment has all of its bytes */
  'segment:complete': { segment: Segment };

  /** A segment attempt failed and will be retried */
  'segment:retry': { segment: Segment; attempt: number; error: Error };

  /** The server ignored the range request; continuing on one connection */
  'download:fallback': { reason: string };

  /** A non-fatal problem, such as a failed control file save */
  'download:warning': { message: string };

  /** All bytes written and the control file removed */
  'download:complete': { outputPath: string; totalBytes: number; elapsedMs: number };

  /** The download stopped with an error (including interruption) */
  'download:error': { error: Error };
}

// ============================================================================
// TypedEventEmitter Implementation
// ============================================================================

type Listener<P> = P extends void ? () => void : (payload: P) => void;

/**
 * Type-safe event emitter that wraps Node's EventEmitter
 *
 * @template T - Event map type defining event names and their payload types
 *
 * @example
 * ```typescript
 * const emitter = new TypedEventEmitter<DownloadEvents>();
 *
 * emitter.on('segment:complete', ({ segment }) => {
 *   console.log(`Segment ${segment.index} done`);
 * });
 * ```
 */
export class TypedEventEmitter<T extends { [K in keyof T]: unknown }> {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
  }

  /**
   * Subscribe to an event
   */
  on<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.on(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Unsubscribe from an event
   */
  off<K extends keyof T>(event: K, listener: Listener<T[K]>): this {
    this.emitter.off(event as string, listener as (...args: unknown[]) => void);
    return this;
  }

  /**
   * Emit an event with payload
   *
   * @returns true if event had listeners, false otherwise
   */
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends void ? [] : [payload: T[K]]
  ): boolean {
    return this.emitter.emit(event as string, ...args);
  }

  /**
   * Get the number of listeners for a specific event
   */
  listenerCount<K extends keyof T>(event: K): number {
    return this.emitter.listenerCount(event as string);
  }
}
