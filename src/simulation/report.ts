/**
 * Console report formatting. Returns strings only; the CLI prints them.
 */

import type { SimulationSettings } from '../config/schema.js';
import type { RunSummary } from './types.js';

const RULE = '='.repeat(80);

export function formatSimulationHeader(settings: SimulationSettings): string {
  const width = Math.max(...Object.keys(settings).map((key) => key.length));
  const lines = Object.entries(settings).map(([key, value]) => `  ${key.padEnd(width)}  ${String(value)}`);

  return [RULE, 'PID controller simulation', '', ...lines, RULE].join('\n');
}

function formatNumber(value: number, digits = 6): string {
  return Number.isFinite(value) ? value.toFixed(digits) : String(value);
}

export function formatSummary(summary: RunSummary): string {
  return [
    `Samples:                ${summary.sampleCount}`,
    `Final process variable: ${formatNumber(summary.finalProcessVariable)}`,
    `Final error:            ${formatNumber(summary.finalError)}`,
    `Mean absolute error:    ${formatNumber(summary.meanAbsoluteError)}`,
    `Overshoot:              ${formatNumber(summary.overshoot)}`,
    `Settling time [s]:      ${summary.settlingTimeS === null ? 'not settled' : formatNumber(summary.settlingTimeS, 3)}`,
  ].join('\n');
}
