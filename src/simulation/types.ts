/**
 * Simulation Types
 */

/**
 * One recorded step of a run
 */
export interface SimulationSample {
  /** Seconds since the run started */
  elapsedS: number;
  processVariable: number;
  controllerOutput: number;
  error: number;
}

export interface SimulationResult {
  setpoint: number;
  initialProcessVariable: number;
  startedAt: Date;
  finishedAt: Date;
  /** Elapsed time measured on the run clock */
  wallDurationS: number;
  samples: SimulationSample[];
}

export interface SimulationEvents {
  sample: (sample: SimulationSample) => void;
  completed: (result: SimulationResult) => void;
}

/**
 * Headline figures for a finished run
 */
export interface RunSummary {
  sampleCount: number;
  finalProcessVariable: number;
  finalError: number;
  meanAbsoluteError: number;
  /** Largest excursion past the setpoint, 0 when none */
  overshoot: number;
  /** First time after which |error| stays inside the band, null if never */
  settlingTimeS: number | null;
}
