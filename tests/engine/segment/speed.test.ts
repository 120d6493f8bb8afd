import { describe, it, expect } from 'vitest';
import { SpeedTracker } from '../../../src/engine/segment/speed.js';

function fakeClock(): { now: () => number; set: (t: number) => void } {
  let time = 0;
  return {
    now: () => time,
    set: (t: number) => {
      time = t;
    },
  };
}

describe('SpeedTracker', () => {
  it('should report zero before any data arrives', () => {
    const clock = fakeClock();
    const tracker = new SpeedTracker(clock.now);

    expect(tracker.speed()).toBe(0);
    expect(tracker.eta(1000)).toBeNull();
  });

  it('should ignore empty records', () => {
    const clock = fakeClock();
    const tracker = new SpeedTracker(clock.now);

    tracker.record(0);
    clock.set(1000);

    expect(tracker.speed()).toBe(0);
  });

  it('should average bytes since tracking began', () => {
    const clock = fakeClock();
    const tracker = new SpeedTracker(clock.now);

    clock.set(1000);
    tracker.record(1000);
    clock.set(2000);
    tracker.record(1000);

    expect(tracker.speed()).toBe(1000);
    expect(tracker.eta(2500)).toBe(3);
  });

  it('should only count samples inside the window', () => {
    const clock = fakeClock();
    const tracker = new SpeedTracker(clock.now);

    clock.set(1000);
    tracker.record(5000);
    clock.set(20000);
    tracker.record(1000);

    expect(tracker.speed()).toBe(200);
  });

  it('should decay a stale rate and then drop to zero', () => {
    const clock = fakeClock();
    const tracker = new SpeedTracker(clock.now);

    clock.set(1000);
    tracker.record(1000);
    clock.set(2000);
    tracker.record(1000);

    clock.set(10000);
    expect(tracker.speed()).toBe(89);

    clock.set(13000);
    expect(tracker.speed()).toBe(0);
  });
});
