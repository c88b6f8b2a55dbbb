/**
 * Environment overrides for headless runs.
 *
 * METRONOME_PRESET   lock-at-25 | lock-at-40 (default lock-at-25)
 * METRONOME_SEED     integer seed
 * METRONOME_COUNT    number of metronomes
 * METRONOME_DURATION run length in seconds
 */

import { z } from 'zod';
import { PRESET_NAMES, resolvePreset, type Preset } from './presets.js';
import type { SimulationConfig } from './schema.js';
import { SimulationConfigError } from './errors.js';

const EnvSchema = z.object({
  METRONOME_PRESET: z.enum(PRESET_NAMES).default('lock-at-25'),
  METRONOME_SEED: z.coerce.number().int().optional(),
  METRONOME_COUNT: z.coerce.number().int().positive().optional(),
  METRONOME_DURATION: z.coerce.number().positive().optional(),
});

/**
 * @throws SimulationConfigError
 */
export function loadPresetFromEnv(env: Record<string, string | undefined> = process.env): Preset {
  const parsed = EnvSchema.safeParse({
    METRONOME_PRESET: env['METRONOME_PRESET'] || undefined,
    METRONOME_SEED: env['METRONOME_SEED'] || undefined,
    METRONOME_COUNT: env['METRONOME_COUNT'] || undefined,
    METRONOME_DURATION: env['METRONOME_DURATION'] || undefined,
  });
  if (!parsed.success) throw SimulationConfigError.fromZod(parsed.error.issues);

  const { METRONOME_PRESET, METRONOME_SEED, METRONOME_COUNT, METRONOME_DURATION } = parsed.data;
  const overrides: Partial<SimulationConfig> = {};
  if (METRONOME_SEED !== undefined) overrides.seed = METRONOME_SEED;
  if (METRONOME_COUNT !== undefined) overrides.count = METRONOME_COUNT;
  if (METRONOME_DURATION !== undefined) overrides.duration = METRONOME_DURATION;

  return resolvePreset(METRONOME_PRESET, overrides);
}
