/**
 * Settings Loader
 *
 * Loads simulation settings from a JSON or YAML file (YAML parser, since
 * YAML is a superset of JSON) and merges them over the built-in defaults.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, formatZodIssues } from '../api/errors.js';
import { SIMULATION_DEFAULTS } from './defaults.js';
import { SettingsFileSchema, SimulationSettingsSchema, type SimulationSettings } from './schema.js';

/**
 * Settings in the shape the runner consumes
 */
export interface SimulationConfig {
  pGain: number;
  iGain: number;
  dGain: number;
  setpoint: number;
  initialProcessVariable: number;
  totalDurationS: number;
  outputIntervalS: number;
}

export function getDefaultSettings(): SimulationSettings {
  return { ...SIMULATION_DEFAULTS };
}

/**
 * Validate a settings object, merged over the defaults
 *
 * @throws ConfigError listing every invalid field
 */
export function parseSettings(raw: unknown, source?: string): SimulationSettings {
  const file = SettingsFileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigError(
      `Settings validation failed:\n${formatZodIssues(file.error).join('\n')}`,
      source
    );
  }

  const parsed = SimulationSettingsSchema.safeParse({ ...SIMULATION_DEFAULTS, ...file.data.simulation });
  if (!parsed.success) {
    throw new ConfigError(
      `Settings validation failed:\n${formatZodIssues(parsed.error).join('\n')}`,
      source
    );
  }

  return parsed.data;
}

/**
 * Load settings from a file, or return the defaults when no path is given
 */
export function loadSettings(settingsPath?: string): SimulationSettings {
  if (!settingsPath) {
    return getDefaultSettings();
  }

  const finalPath = resolve(settingsPath);
  let contents: string;
  try {
    contents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Settings file not found: ${finalPath}`, finalPath);
    }
    throw new ConfigError(`Failed to read settings: ${String(error)}`, finalPath);
  }

  let raw: unknown;
  try {
    raw = yaml.load(contents);
  } catch (error) {
    throw new ConfigError(`Failed to parse settings: ${String(error)}`, finalPath);
  }

  return parseSettings(raw, finalPath);
}

/**
 * Convert file-style (kebab-case) settings to the runner config
 */
export function toRunConfig(settings: SimulationSettings): SimulationConfig {
  return {
    pGain: settings['p-gain'],
    iGain: settings['i-gain'],
    dGain: settings['d-gain'],
    setpoint: settings.setpoint,
    initialProcessVariable: settings['initial-process-variable'],
    totalDurationS: settings['total-duration-s'],
    outputIntervalS: settings['output-interval-s'],
  };
}
