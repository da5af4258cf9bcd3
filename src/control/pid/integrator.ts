/**
 * Integrator
 *
 * Running numerical integral of a signal sampled at irregular timestamps.
 * The approximation rule is a strategy so additional rules can be added
 * without touching compute().
 */

import type { Sample } from './pidTypes.js';

/**
 * Supported approximation rules
 */
export type IntegrationSchemeKind = 'midpoint';

/**
 * Approximation rule: area contributed between two successive samples
 */
export interface IntegrationScheme {
  readonly kind: IntegrationSchemeKind;
  increment(previous: Sample, current: Sample): number;
}

/**
 * Midpoint (trapezoidal) Riemann sum: average of the two samples times dt.
 */
export const midpointScheme: IntegrationScheme = {
  kind: 'midpoint',
  increment(previous: Sample, current: Sample): number {
    const average = 0.5 * (current.value + previous.value);
    const dt = current.timestamp - previous.timestamp;
    return average * dt;
  },
};

export class Integrator {
  private readonly initialValue: number;
  private readonly _scheme: IntegrationScheme;
  private accumulated: number;
  private last?: Sample;

  constructor(initialValue = 0, scheme: IntegrationScheme = midpointScheme) {
    this.initialValue = initialValue;
    this._scheme = scheme;
    this.accumulated = initialValue;
  }

  /**
   * Feed one sample and return the accumulated value.
   *
   * The first sample only primes the history. Timestamps are expected to be
   * non-decreasing; a decreasing timestamp yields a negative interval and is
   * applied as-is.
   */
  public compute(integrand: number, timestamp: number): number {
    const current: Sample = { value: integrand, timestamp };

    if (this.last !== undefined) {
      this.accumulated += this._scheme.increment(this.last, current);
    }

    this.last = current;
    return this.accumulated;
  }

  public get value(): number {
    return this.accumulated;
  }

  public get lastSample(): Readonly<Sample> | undefined {
    return this.last;
  }

  public get scheme(): IntegrationSchemeKind {
    return this._scheme.kind;
  }

  /**
   * Back to cold start
   */
  public reset(): void {
    this.accumulated = this.initialValue;
    this.last = undefined;
  }
}
