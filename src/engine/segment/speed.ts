/**
 * Transfer speed estimation over a sliding window.
 *
 * @module engine/segment/speed
 */

/** Speed calculation window in milliseconds */
export const SPEED_WINDOW_MS = 5000;

interface SpeedSample {
  bytes: number;
  timestamp: number;
}

/**
 * Tracks bytes received and reports a smoothed bytes-per-second rate.
 *
 * When no data has arrived for a full window, the last rate decays
 * linearly to zero over a second window instead of dropping at once.
 */
export class SpeedTracker {
  private readonly samples: SpeedSample[] = [];
  private readonly now: () => number;
  private readonly startedAt: number;

  /**
   * @param now - Clock in milliseconds (injectable for tests)
   */
  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
  }

  /**
   * Record received bytes
   */
  record(bytes: number): void {
    if (bytes <= 0) {
      return;
    }
    this.samples.push({ bytes, timestamp: this.now() });
    this.prune();
  }

  /**
   * Current speed in bytes per second
   */
  speed(): number {
    if (this.samples.length === 0) {
      return 0;
    }

    const now = this.now();
    const cutoff = now - SPEED_WINDOW_MS;
    const recent = this.samples.filter((s) => s.timestamp >= cutoff);

    if (recent.length === 0) {
      const lastSample = this.samples[this.samples.length - 1];
      const staleFor = now - lastSample.timestamp;
      if (staleFor > SPEED_WINDOW_MS * 2) {
        return 0;
      }
      const span = Math.max(now - this.samples[0].timestamp, 1);
      const total = this.samples.reduce((sum, s) => sum + s.bytes, 0);
      const decayFactor = Math.max(0, 1 - (staleFor - SPEED_WINDOW_MS) / SPEED_WINDOW_MS);
      return Math.round((total * 1000 * decayFactor) / span);
    }

    const total = recent.reduce((sum, s) => sum + s.bytes, 0);
    // Measure from the window start (or from when tracking began)
    const windowStart = Math.max(cutoff, this.startedAt);
    const span = Math.max(now - windowStart, 1);
    return Math.round((total * 1000) / span);
  }

  /**
   * Estimated seconds until `remainingBytes` arrive, or null if stalled
   */
  eta(remainingBytes: number): number | null {
    const speed = this.speed();
    if (speed <= 0) {
      return null;
    }
    return Math.ceil(remainingBytes / speed);
  }

  private prune(): void {
    const cutoff = this.now() - SPEED_WINDOW_MS * 2;
    while (this.samples.length > 0 && this.samples[0].timestamp < cutoff) {
      this.samples.shift();
    }
  }
}
