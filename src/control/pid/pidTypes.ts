/**
 * PID Controller Types
 *
 * Type definitions shared by the controller and its accumulators,
 * plus gain validation.
 */

import { z } from 'zod';
import { Ok, Err, type Result } from 'ts-results';
import { GainsValidationError, type GainIssue } from '../../api/errors.js';

export const GAIN_MIN = 0;
export const GAIN_MAX = 100;

/**
 * A timestamped sample held by an accumulator
 */
export interface Sample {
  /** Sampled signal value */
  value: number;
  /** Timestamp in seconds */
  timestamp: number;
}

/**
 * Proportional, integral and derivative gains.
 *
 * Immutable once validated; replace the whole triple to change it.
 */
export type Gains = Readonly<{
  p: number;
  i: number;
  d: number;
}>;

const gainSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .finite('must be finite')
  .min(GAIN_MIN, `must be >= ${GAIN_MIN}`)
  .max(GAIN_MAX, `must be <= ${GAIN_MAX}`);

export const GainsSchema = z.object({
  p: gainSchema,
  i: gainSchema,
  d: gainSchema,
});

/**
 * Validate a gain triple.
 *
 * Every out-of-range coefficient is reported, not just the first.
 */
export function createGains(input: { p: unknown; i: unknown; d: unknown }): Result<Gains, GainsValidationError> {
  const parsed = GainsSchema.safeParse(input);
  if (!parsed.success) {
    const issues: GainIssue[] = parsed.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      const key = issue.path[0];
      const value = key === 'p' || key === 'i' || key === 'd' ? input[key] : undefined;
      return { field, value, message: issue.message };
    });
    return Err(new GainsValidationError(issues));
  }

  return Ok(Object.freeze({ p: parsed.data.p, i: parsed.data.i, d: parsed.data.d }));
}

/**
 * Per-call breakdown of the controller output
 */
export interface PidTerms {
  /** Combined control output */
  output: number;
  /** Setpoint minus measured value */
  error: number;
  proportional: number;
  integral: number;
  derivative: number;
  /** Timestamp read for this call, in seconds */
  timestamp: number;
}

/**
 * Value returned by getOutput()
 */
export interface PidOutput {
  output: number;
  error: number;
}
