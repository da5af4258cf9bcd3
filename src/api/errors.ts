/**
 * Controller error utilities.
 *
 * Provides a consistent error type for the controller core and the
 * simulation harness, plus a helper to convert arbitrary thrown values
 * into ControllerError instances that callers can reason about.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to API consumers.
 */
export type ControllerErrorCode =
  | 'ValidationError'
  | 'UnsetSetpoint'
  | 'ConfigError'
  | 'ClockExhausted'
  | 'UnknownError';

/**
 * Plain error shape (for JSON output and logging).
 */
export interface ControllerErrorShape {
  code: ControllerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class ControllerError extends Error implements ControllerErrorShape {
  public readonly code: ControllerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ControllerErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ControllerError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): ControllerErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * A single rejected gain coefficient.
 */
export interface GainIssue {
  field: string;
  value: unknown;
  message: string;
}

/**
 * Raised when a gain triple has a coefficient outside [0, 100].
 */
export class GainsValidationError extends ControllerError {
  public readonly issues: readonly GainIssue[];

  constructor(issues: readonly GainIssue[]) {
    const summary = issues.map((issue) => `${issue.field}=${String(issue.value)} ${issue.message}`);
    super('ValidationError', `Invalid gains: ${summary.join(', ')}`, { issues });
    this.name = 'GainsValidationError';
    this.issues = issues;
  }
}

/**
 * Raised by getOutput() when no setpoint is configured.
 */
export class UnsetSetpointError extends ControllerError {
  constructor() {
    super('UnsetSetpoint', 'Setpoint not set');
    this.name = 'UnsetSetpointError';
  }
}

/**
 * Raised when simulation settings cannot be loaded or fail validation.
 */
export class ConfigError extends ControllerError {
  public readonly path?: string;

  constructor(message: string, path?: string, details?: Record<string, unknown>) {
    super('ConfigError', message, { ...details, path });
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * Format zod issues as `field message` lines.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
    return `${field} ${issue.message}`;
  });
}

/**
 * Map unknown errors into ControllerError instances.
 *
 * @param error - Error thrown by the core or the harness
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toControllerError(
  error: unknown,
  fallbackCode: ControllerErrorCode = 'UnknownError'
): ControllerError {
  if (error instanceof ControllerError) {
    return error;
  }

  if (error instanceof Error) {
    return new ControllerError(fallbackCode, error.message);
  }

  return new ControllerError(fallbackCode, `Unknown error: ${String(error)}`);
}
