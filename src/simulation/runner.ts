/**
 * Simulation Runner
 *
 * Drives a PID controller against an actuator model until the duration
 * budget elapses, recording one sample per controller call.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { UnsetSetpointError } from '../api/errors.js';
import { monotonicClock, type TimeSource } from '../control/clock.js';
import type { PidController } from '../control/pid/pidController.js';
import { lazyLog } from '../utils/logger-helpers.js';
import type { Actuator } from './actuators.js';
import type { SimulationEvents, SimulationResult, SimulationSample } from './types.js';

export interface SimulationRunnerOptions {
  /** Elapsed-time source in seconds; share it with the controller for consistent timing */
  clock?: TimeSource;
  /** Pause between controller calls */
  sleep?: (seconds: number) => Promise<void>;
  /** Wall-clock time for run metadata */
  now?: () => Date;
  logger?: Logger;
}

export interface RunParameters {
  initialProcessVariable: number;
  totalDurationS: number;
  outputIntervalS: number;
}

const defaultSleep = async (seconds: number): Promise<void> => {
  await delay(seconds * 1000);
};

export class SimulationRunner extends EventEmitter<SimulationEvents> {
  private readonly clock: TimeSource;
  private readonly sleep: (seconds: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly logger?: Logger;

  constructor(options: SimulationRunnerOptions = {}) {
    super();
    this.clock = options.clock ?? monotonicClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  /**
   * Run one simulation.
   *
   * The first sample is the initial state (zero output). The loop checks
   * the budget before reading the clock, so the last sample may sit at or
   * just past totalDurationS.
   *
   * @throws UnsetSetpointError when the controller has no setpoint
   */
  public async run(controller: PidController, actuate: Actuator, params: RunParameters): Promise<SimulationResult> {
    const setpoint = controller.setpoint;
    if (setpoint === undefined) {
      throw new UnsetSetpointError();
    }

    let processVariable = params.initialProcessVariable;
    const samples: SimulationSample[] = [
      {
        elapsedS: 0,
        processVariable,
        controllerOutput: 0,
        error: setpoint - processVariable,
      },
    ];

    const startedAt = this.now();
    const start = this.clock();
    let elapsedS = 0;

    this.logger?.info(
      { setpoint, initialProcessVariable: processVariable, totalDurationS: params.totalDurationS, outputIntervalS: params.outputIntervalS },
      'Simulation started'
    );

    while (elapsedS < params.totalDurationS) {
      elapsedS = this.clock() - start;
      const terms = controller.getTerms(processVariable);
      processVariable = actuate(processVariable, terms.output);

      const sample: SimulationSample = {
        elapsedS,
        processVariable,
        controllerOutput: terms.output,
        error: terms.error,
      };
      samples.push(sample);

      lazyLog(this.logger, 'debug', () => ({ ...sample, terms }), 'Recorded sample');
      try {
        this.emit('sample', sample);
      } catch (err) {
        this.logger?.error({ err }, 'Error emitting sample event');
      }

      await this.sleep(params.outputIntervalS);
    }

    const result: SimulationResult = {
      setpoint,
      initialProcessVariable: params.initialProcessVariable,
      startedAt,
      finishedAt: this.now(),
      wallDurationS: this.clock() - start,
      samples,
    };

    this.logger?.info({ samples: samples.length, wallDurationS: result.wallDurationS }, 'Simulation finished');
    try {
      this.emit('completed', result);
    } catch (err) {
      this.logger?.error({ err }, 'Error emitting completed event');
    }

    return result;
  }
}
