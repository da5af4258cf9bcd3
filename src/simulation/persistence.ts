/**
 * Result Persistence
 *
 * Writes a finished run as timestamp-prefixed files:
 * `<prefix>-simulation.json` (settings, timing, data rows) and, separately,
 * `<prefix>-plot.svg` under the same prefix.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import type { SimulationSettings } from '../config/schema.js';
import type { SimulationResult } from './types.js';

/** [elapsedS, processVariable, controllerOutput, error]; non-finite values become null */
export type DataRow = [number | null, number | null, number | null, number | null];

export interface SavedRunDocument {
  settings: SimulationSettings;
  timing: {
    startedAt: string;
    finishedAt: string;
    wallDurationS: number;
    sampleCount: number;
  };
  data: DataRow[];
}

export interface SaveRunOptions {
  /** Time used for the file prefix (default: result.startedAt) */
  now?: Date;
  logger?: Logger;
}

export interface SavedRunPaths {
  prefix: string;
  dataPath: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD-HHmmss` in local time
 */
export function formatRunPrefix(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

export function toRunDocument(settings: SimulationSettings, result: SimulationResult): SavedRunDocument {
  return {
    settings,
    timing: {
      startedAt: result.startedAt.toISOString(),
      finishedAt: result.finishedAt.toISOString(),
      wallDurationS: result.wallDurationS,
      sampleCount: result.samples.length,
    },
    data: result.samples.map((sample): DataRow => [
      finiteOrNull(sample.elapsedS),
      finiteOrNull(sample.processVariable),
      finiteOrNull(sample.controllerOutput),
      finiteOrNull(sample.error),
    ]),
  };
}

export async function saveRun(
  outputDir: string,
  settings: SimulationSettings,
  result: SimulationResult,
  options: SaveRunOptions = {}
): Promise<SavedRunPaths> {
  await mkdir(outputDir, { recursive: true });

  const prefix = formatRunPrefix(options.now ?? result.startedAt);
  const dataPath = join(outputDir, `${prefix}-simulation.json`);
  await writeFile(dataPath, JSON.stringify(toRunDocument(settings, result), null, 2) + '\n', 'utf8');

  options.logger?.info({ dataPath }, 'Simulation results saved');
  return { prefix, dataPath };
}

/**
 * Writes `<prefix>-plot.svg` beside the data file saved under `prefix`.
 */
export async function savePlot(outputDir: string, prefix: string, svg: string, logger?: Logger): Promise<string> {
  await mkdir(outputDir, { recursive: true });

  const plotPath = join(outputDir, `${prefix}-plot.svg`);
  await writeFile(plotPath, svg, 'utf8');

  logger?.info({ plotPath }, 'Simulation plot saved');
  return plotPath;
}
