/**
 * Time Sources
 *
 * The controller reads its timestamp once per call through an injectable
 * source. Timestamps are real-valued seconds on an arbitrary epoch; only
 * differences between successive readings matter.
 */

import { performance } from 'node:perf_hooks';
import { ControllerError } from '../api/errors.js';

/**
 * Returns the current time in seconds.
 */
export type TimeSource = () => number;

/**
 * Default source: monotonic, unaffected by wall-clock adjustments.
 */
export const monotonicClock: TimeSource = () => performance.now() / 1000;

/**
 * Manually driven clock for tests and replays
 */
export interface ManualClock {
  now: TimeSource;
  advance(seconds: number): number;
  set(seconds: number): void;
}

export function createManualClock(start = 0): ManualClock {
  let current = start;

  return {
    now: () => current,
    advance(seconds: number): number {
      current += seconds;
      return current;
    },
    set(seconds: number): void {
      current = seconds;
    },
  };
}

/**
 * Clock that replays a fixed list of timestamps, one per reading.
 *
 * Throws once every timestamp has been consumed.
 */
export function createSequenceClock(timestamps: readonly number[]): TimeSource {
  let index = 0;

  return () => {
    if (index >= timestamps.length) {
      throw new ControllerError('ClockExhausted', `Sequence clock drained after ${timestamps.length} readings`, {
        readings: timestamps.length,
      });
    }
    const value = timestamps[index];
    index++;
    return value;
  };
}
