#!/usr/bin/env tsx
/**
 * First-Order Plant Example
 *
 * Drives the controller against a custom actuator (a first-order lag
 * instead of the built-in noisy actuator) and prints a sample every
 * 100 ms of simulated time.
 *
 * Usage:
 *   tsx examples/01-first-order-plant.ts
 */

import {
  PidController,
  SimulationRunner,
  createLogger,
  formatSummary,
  summarizeRun,
  type Actuator,
} from '../src/index.js';

const TIME_CONSTANT_S = 0.2;
const STEP_S = 0.002;

// dx/dt = (u - x) / tau, one Euler step per controller call
const firstOrderLag: Actuator = (processVariable, controllerOutput) =>
  processVariable + ((controllerOutput - processVariable) / TIME_CONSTANT_S) * STEP_S;

async function main() {
  const logger = createLogger({ name: 'first-order-plant', defaultLevel: 'warn' });
  const controller = new PidController({ pGain: 2, iGain: 4, dGain: 0.05, setpoint: 1.0, logger });
  const runner = new SimulationRunner({ logger });

  let nextReportS = 0;
  runner.on('sample', (sample) => {
    if (sample.elapsedS >= nextReportS) {
      console.log(
        `t=${sample.elapsedS.toFixed(3)}s pv=${sample.processVariable.toFixed(4)} u=${sample.controllerOutput.toFixed(4)}`
      );
      nextReportS += 0.1;
    }
  });

  const result = await runner.run(controller, firstOrderLag, {
    initialProcessVariable: 0,
    totalDurationS: 1,
    outputIntervalS: STEP_S,
  });

  console.log('\n' + formatSummary(summarizeRun(result.samples, result.setpoint)));
}

main().catch((error) => {
  console.error('Example failed:', error);
  process.exit(1);
});
