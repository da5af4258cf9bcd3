/**
 * Differentiator
 *
 * First-order secant estimate of a signal's rate of change over
 * irregular timestamps.
 */

import type { Sample } from './pidTypes.js';

export class Differentiator {
  private readonly initialValue: number;
  private lastValue: number;
  private lastTimestamp?: number;

  constructor(initialValue = 0) {
    this.initialValue = initialValue;
    this.lastValue = initialValue;
  }

  /**
   * Feed one sample and return the slope since the previous one.
   *
   * With no previous sample the stored value is returned (the initial value
   * on a fresh instance), not the new argument. A zero-length interval is
   * not guarded: the result is Infinity, -Infinity or NaN.
   */
  public compute(value: number, timestamp: number): number {
    if (this.lastTimestamp === undefined) {
      const baseline = this.lastValue;
      this.lastValue = value;
      this.lastTimestamp = timestamp;
      return baseline;
    }

    const slope = (value - this.lastValue) / (timestamp - this.lastTimestamp);
    this.lastValue = value;
    this.lastTimestamp = timestamp;
    return slope;
  }

  public get lastSample(): Readonly<Sample> | undefined {
    if (this.lastTimestamp === undefined) {
      return undefined;
    }
    return { value: this.lastValue, timestamp: this.lastTimestamp };
  }

  public reset(): void {
    this.lastValue = this.initialValue;
    this.lastTimestamp = undefined;
  }
}
