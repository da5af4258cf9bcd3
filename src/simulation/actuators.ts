/**
 * Actuator models
 *
 * An actuator maps the current process variable and the controller output
 * to the next process variable. The runner accepts any function with this
 * shape.
 */

import { ACTUATOR_DEFAULTS } from '../config/defaults.js';

export type Actuator = (processVariable: number, controllerOutput: number) => number;

export interface NoisyActuatorOptions {
  outputScale?: number;
  noiseAmplitude?: number;
  /** Uniform [0, 1) source (default: Math.random) */
  random?: () => number;
}

/**
 * Applies a scaled share of the output, then a small positive
 * multiplicative disturbance.
 */
export function createNoisyActuator(options: NoisyActuatorOptions = {}): Actuator {
  const outputScale = options.outputScale ?? ACTUATOR_DEFAULTS.OUTPUT_SCALE;
  const noiseAmplitude = options.noiseAmplitude ?? ACTUATOR_DEFAULTS.NOISE_AMPLITUDE;
  const random = options.random ?? Math.random;

  return (processVariable, controllerOutput) => {
    const output = outputScale * controllerOutput;
    const fluctuation = noiseAmplitude * random();
    return (processVariable + output) * (1.0 + fluctuation);
  };
}

/**
 * Noise-free variant
 */
export function createLinearActuator(outputScale: number = ACTUATOR_DEFAULTS.OUTPUT_SCALE): Actuator {
  return (processVariable, controllerOutput) => processVariable + outputScale * controllerOutput;
}
