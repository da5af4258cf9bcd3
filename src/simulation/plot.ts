/**
 * Plot Rendering
 *
 * Renders process variable against time as a standalone SVG document,
 * with the setpoint as a dashed horizontal line and the initial step as a
 * dashed vertical line at t = 0.
 */

import type { SimulationSample } from './types.js';

export interface PlotOptions {
  width?: number;
  height?: number;
  margin?: number;
}

interface Range {
  min: number;
  max: number;
}

// Single pass; long runs hold far more samples than a spread call accepts
function rangeOf(values: readonly number[]): Range {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of values) {
    if (!Number.isFinite(value)) {
      continue;
    }
    if (value < min) min = value;
    if (value > max) max = value;
  }
  if (min > max) {
    return { min: 0, max: 1 };
  }
  // Flat series still need a non-zero span
  return min === max ? { min: min - 0.5, max: max + 0.5 } : { min, max };
}

function round(value: number): string {
  return value.toFixed(2);
}

export function renderPlotSvg(
  samples: readonly SimulationSample[],
  setpoint: number,
  initialProcessVariable: number,
  options: PlotOptions = {}
): string {
  const width = options.width ?? 800;
  const height = options.height ?? 480;
  const margin = options.margin ?? 60;
  const plotWidth = width - 2 * margin;
  const plotHeight = height - 2 * margin;

  const time = rangeOf(samples.map((sample) => sample.elapsedS));
  const value = rangeOf([setpoint, initialProcessVariable, ...samples.map((sample) => sample.processVariable)]);

  const x = (t: number): number => margin + ((t - time.min) / (time.max - time.min)) * plotWidth;
  const y = (v: number): number => height - margin - ((v - value.min) / (value.max - value.min)) * plotHeight;

  const points = samples
    .filter((sample) => Number.isFinite(sample.elapsedS) && Number.isFinite(sample.processVariable))
    .map((sample) => `${round(x(sample.elapsedS))},${round(y(sample.processVariable))}`)
    .join(' ');

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect width="${width}" height="${height}" fill="white"/>`,
    `  <line x1="${margin}" y1="${height - margin}" x2="${width - margin}" y2="${height - margin}" stroke="black"/>`,
    `  <line x1="${margin}" y1="${margin}" x2="${margin}" y2="${height - margin}" stroke="black"/>`,
    `  <line class="setpoint" x1="${round(x(time.min))}" y1="${round(y(setpoint))}" x2="${round(x(time.max))}" y2="${round(y(setpoint))}" stroke="gray" stroke-dasharray="6,4"/>`,
    `  <line class="step" x1="${round(x(0))}" y1="${round(y(initialProcessVariable))}" x2="${round(x(0))}" y2="${round(y(setpoint))}" stroke="gray" stroke-dasharray="6,4"/>`,
    `  <polyline class="process-variable" points="${points}" fill="none" stroke="steelblue" stroke-width="1.5"/>`,
    `  <text x="${width / 2}" y="${height - margin / 3}" text-anchor="middle">Time [s]</text>`,
    `  <text x="${margin / 3}" y="${height / 2}" text-anchor="middle" transform="rotate(-90 ${margin / 3} ${height / 2})">Process Variable</text>`,
    '</svg>',
    '',
  ].join('\n');
}
