/**
 * Default Simulation Settings
 *
 * Used when no settings file is given, and as the base that a partial
 * settings file is merged over.
 */

export const SIMULATION_DEFAULTS = {
  /** Proportional gain */
  'p-gain': 10,

  /** Integral gain */
  'i-gain': 100,

  /** Derivative gain */
  'd-gain': 0.1,

  /** Target process value */
  setpoint: 1.0,

  'initial-process-variable': 0,

  /** Run length (s) */
  'total-duration-s': 5,

  /** Pause between controller calls (s) */
  'output-interval-s': 0.001, // 1ms
} as const;

/**
 * Default actuator model
 */
export const ACTUATOR_DEFAULTS = {
  /** Fraction of the controller output applied per step */
  OUTPUT_SCALE: 0.01,

  /** Upper bound of the multiplicative noise per step */
  NOISE_AMPLITUDE: 0.001,
} as const;

/**
 * Settling band as a fraction of the initial step size
 */
export const SETTLING_BAND_FRACTION = 0.02;
