/**
 * pid-sim
 *
 * PID controller over irregular time steps, plus a harness that drives it
 * against a simulated noisy process.
 */

// Controller core
export { PidController, type PidControllerOptions } from './control/pid/pidController.js';
export { Integrator, midpointScheme, type IntegrationScheme, type IntegrationSchemeKind } from './control/pid/integrator.js';
export { Differentiator } from './control/pid/differentiator.js';
export {
  createGains,
  GainsSchema,
  GAIN_MIN,
  GAIN_MAX,
  type Gains,
  type PidOutput,
  type PidTerms,
  type Sample,
} from './control/pid/pidTypes.js';
export {
  monotonicClock,
  createManualClock,
  createSequenceClock,
  type TimeSource,
  type ManualClock,
} from './control/clock.js';

// Errors
export {
  ControllerError,
  GainsValidationError,
  UnsetSetpointError,
  ConfigError,
  toControllerError,
  type ControllerErrorCode,
  type ControllerErrorShape,
  type GainIssue,
} from './api/errors.js';

// Settings
export { loadSettings, parseSettings, getDefaultSettings, toRunConfig, type SimulationConfig } from './config/loader.js';
export { SimulationSettingsSchema, type SimulationSettings } from './config/schema.js';
export { SIMULATION_DEFAULTS } from './config/defaults.js';

// Simulation harness
export { SimulationRunner, type SimulationRunnerOptions, type RunParameters } from './simulation/runner.js';
export { createNoisyActuator, createLinearActuator, type Actuator, type NoisyActuatorOptions } from './simulation/actuators.js';
export { summarizeRun, type SummaryOptions } from './simulation/summary.js';
export { formatSimulationHeader, formatSummary } from './simulation/report.js';
export { renderPlotSvg, type PlotOptions } from './simulation/plot.js';
export { saveRun, savePlot, formatRunPrefix, toRunDocument, type SavedRunDocument, type SavedRunPaths } from './simulation/persistence.js';
export type { SimulationSample, SimulationResult, SimulationEvents, RunSummary } from './simulation/types.js';

// Logging
export { createLogger, type LoggerOptions } from './utils/logger.js';
