/**
 * PID Controller Implementation
 *
 * Combines proportional, integral and derivative terms into one control
 * output per measured process value. The integral is a midpoint Riemann sum
 * and the derivative a secant slope, both over the irregular intervals
 * between calls. No anti-windup, no output clamping.
 */

import type { Logger } from 'pino';
import { Ok, type Result } from 'ts-results';
import { GainsValidationError, UnsetSetpointError } from '../../api/errors.js';
import { monotonicClock, type TimeSource } from '../clock.js';
import { Differentiator } from './differentiator.js';
import { Integrator } from './integrator.js';
import { createGains, type Gains, type PidOutput, type PidTerms } from './pidTypes.js';

export interface PidControllerOptions {
  pGain: number;
  iGain: number;
  dGain: number;
  /** Target value; getOutput() refuses to run while unset */
  setpoint?: number;
  /** Timestamp source in seconds (default: monotonic clock) */
  clock?: TimeSource;
  logger?: Logger;
}

export class PidController {
  private _gains: Gains;
  private _setpoint?: number;
  private readonly clock: TimeSource;
  private readonly logger?: Logger;
  private readonly integrator = new Integrator(0);
  private readonly differentiator = new Differentiator(0);

  /**
   * @throws GainsValidationError when any gain is outside [0, 100]
   */
  constructor(options: PidControllerOptions) {
    const gains = createGains({ p: options.pGain, i: options.iGain, d: options.dGain });
    if (gains.err) {
      throw gains.val;
    }

    this._gains = gains.val;
    this._setpoint = options.setpoint;
    this.clock = options.clock ?? monotonicClock;
    this.logger = options.logger;
  }

  /**
   * Non-throwing construction
   */
  public static create(options: PidControllerOptions): Result<PidController, GainsValidationError> {
    const gains = createGains({ p: options.pGain, i: options.iGain, d: options.dGain });
    if (gains.err) {
      return gains;
    }
    return Ok(new PidController(options));
  }

  public get gains(): Gains {
    return this._gains;
  }

  /**
   * Replace all three gains at once.
   *
   * On failure the current gains are kept.
   */
  public replaceGains(input: { p: number; i: number; d: number }): Result<Gains, GainsValidationError> {
    const gains = createGains(input);
    if (gains.ok) {
      this._gains = gains.val;
      this.logger?.debug({ gains: gains.val }, 'PID gains replaced');
    } else {
      this.logger?.warn({ issues: gains.val.issues }, 'Rejected PID gains');
    }
    return gains;
  }

  public get setpoint(): number | undefined {
    return this._setpoint;
  }

  public setSetpoint(value: number): void {
    this._setpoint = value;
  }

  public clearSetpoint(): void {
    this._setpoint = undefined;
  }

  /**
   * Compute the control output for one measured process value.
   *
   * @throws UnsetSetpointError when no setpoint is configured
   */
  public getOutput(measuredValue: number): PidOutput {
    const { output, error } = this.getTerms(measuredValue);
    return { output, error };
  }

  /**
   * Same as getOutput(), with the individual terms.
   *
   * Advances both accumulators by exactly one sample.
   */
  public getTerms(measuredValue: number): PidTerms {
    if (this._setpoint === undefined) {
      throw new UnsetSetpointError();
    }

    const timestamp = this.clock();
    const error = this._setpoint - measuredValue;

    const proportional = this._gains.p * error;
    const integral = this._gains.i * this.integrator.compute(error, timestamp);
    const derivative = this._gains.d * this.differentiator.compute(error, timestamp);
    const output = proportional + integral + derivative;

    if (!Number.isFinite(output)) {
      this.logger?.warn({ proportional, integral, derivative, error, timestamp }, 'PID output is NaN/Inf');
    }

    return { output, error, proportional, integral, derivative, timestamp };
  }

  /**
   * Return both accumulators to cold start. Gains and setpoint are kept.
   */
  public reset(): void {
    this.integrator.reset();
    this.differentiator.reset();
  }
}
