/**
 * Run Summary
 *
 * Headline step-response figures computed from recorded samples. The
 * tracking error here is setpoint minus the process variable after
 * actuation, so it describes where the process ended up at each step.
 */

import { SETTLING_BAND_FRACTION } from '../config/defaults.js';
import type { RunSummary, SimulationSample } from './types.js';

export interface SummaryOptions {
  /** Absolute settling band; default is 2% of the initial step */
  settlingBand?: number;
}

export function summarizeRun(
  samples: readonly SimulationSample[],
  setpoint: number,
  options: SummaryOptions = {}
): RunSummary {
  if (samples.length === 0) {
    throw new RangeError('Cannot summarize a run without samples');
  }

  const first = samples[0];
  const last = samples[samples.length - 1];
  const step = setpoint - first.processVariable;
  const band = options.settlingBand ?? SETTLING_BAND_FRACTION * Math.abs(step);

  let absErrorSum = 0;
  let overshoot = 0;
  let lastOutsideBand = -1;

  samples.forEach((sample, index) => {
    const trackingError = setpoint - sample.processVariable;
    absErrorSum += Math.abs(trackingError);

    // Overshoot is measured past the setpoint in the direction of travel
    const excursion = step > 0 ? -trackingError : step < 0 ? trackingError : Math.abs(trackingError);
    if (excursion > overshoot) {
      overshoot = excursion;
    }

    if (!(Math.abs(trackingError) <= band)) {
      lastOutsideBand = index;
    }
  });

  let settlingTimeS: number | null;
  if (lastOutsideBand === samples.length - 1) {
    settlingTimeS = null;
  } else {
    settlingTimeS = samples[lastOutsideBand + 1].elapsedS;
  }

  return {
    sampleCount: samples.length,
    finalProcessVariable: last.processVariable,
    finalError: setpoint - last.processVariable,
    meanAbsoluteError: absErrorSum / samples.length,
    overshoot,
    settlingTimeS,
  };
}
