/**
 * pid-simulate command
 *
 * Loads settings, runs one simulation with the noisy actuator, prints
 * the report and optionally saves results. Returns the process exit code.
 */

import type { Logger } from 'pino';
import { toControllerError } from '../api/errors.js';
import { loadSettings, toRunConfig } from '../config/loader.js';
import { monotonicClock, type TimeSource } from '../control/clock.js';
import { PidController } from '../control/pid/pidController.js';
import { createNoisyActuator } from '../simulation/actuators.js';
import { savePlot, saveRun } from '../simulation/persistence.js';
import { renderPlotSvg } from '../simulation/plot.js';
import { formatSimulationHeader, formatSummary } from '../simulation/report.js';
import { SimulationRunner } from '../simulation/runner.js';
import { summarizeRun } from '../simulation/summary.js';
import { USAGE, type CLIArgs } from './args.js';

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: Logger;
  clock?: TimeSource;
  sleep?: (seconds: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
}

export async function runSimulateCommand(args: CLIArgs, io: CommandIO): Promise<number> {
  if (args.help) {
    io.stdout(USAGE);
    return 0;
  }

  try {
    const settings = loadSettings(args._[0]);
    const config = toRunConfig(settings);
    const clock = io.clock ?? monotonicClock;

    if (!args.quiet) {
      io.stdout(formatSimulationHeader(settings));
    }

    const controller = new PidController({
      pGain: config.pGain,
      iGain: config.iGain,
      dGain: config.dGain,
      setpoint: config.setpoint,
      clock,
      logger: io.logger?.child({ component: 'pid' }),
    });

    const runner = new SimulationRunner({
      clock,
      sleep: io.sleep,
      now: io.now,
      logger: io.logger?.child({ component: 'runner' }),
    });

    const result = await runner.run(controller, createNoisyActuator({ random: io.random }), config);

    if (!args.quiet) {
      io.stdout(formatSummary(summarizeRun(result.samples, config.setpoint)));
    }

    if (args.out !== undefined) {
      // Data goes to disk before the plot is rendered
      const saved = await saveRun(args.out, settings, result, { logger: io.logger });
      if (!args.quiet) {
        io.stdout(`Saved ${saved.dataPath}`);
      }

      if (args.plot) {
        const svg = renderPlotSvg(result.samples, config.setpoint, config.initialProcessVariable);
        const plotPath = await savePlot(args.out, saved.prefix, svg, io.logger);
        if (!args.quiet) {
          io.stdout(`Saved ${plotPath}`);
        }
      }
    }

    return 0;
  } catch (error) {
    const err = toControllerError(error);
    io.stderr(`***ERROR: ${err.message}`);
    io.logger?.debug({ err: err.toObject() }, 'Simulation command failed');
    return 1;
  }
}
