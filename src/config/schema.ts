/**
 * Simulation Settings Schemas
 *
 * Zod schemas for validating settings files. Keys keep the kebab-case
 * spelling used in the files.
 */

import { z } from 'zod';
import { GAIN_MAX, GAIN_MIN } from '../control/pid/pidTypes.js';

const gain = z.number().finite().min(GAIN_MIN, `must be >= ${GAIN_MIN}`).max(GAIN_MAX, `must be <= ${GAIN_MAX}`);

export const SimulationSettingsSchema = z
  .object({
    'p-gain': gain,
    'i-gain': gain,
    'd-gain': gain,
    setpoint: z.number().finite('must be finite'),
    'initial-process-variable': z.number().finite('must be finite'),
    'total-duration-s': z.number().positive('must be positive'),
    'output-interval-s': z.number().positive('must be positive'),
  })
  .strict()
  .refine((data) => data['output-interval-s'] <= data['total-duration-s'], {
    message: 'must be <= total-duration-s',
    path: ['output-interval-s'],
  });

export type SimulationSettings = z.infer<typeof SimulationSettingsSchema>;

/**
 * Settings file layout: everything lives under `simulation`
 */
export const SettingsFileSchema = z.object({
  simulation: z.record(z.string(), z.unknown()),
});
