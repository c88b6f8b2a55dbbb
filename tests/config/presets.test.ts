import { describe, it, expect } from 'vitest';
import { resolvePreset, isPresetName, PRESET_NAMES } from '../../src/config/presets.js';
import { loadPresetFromEnv } from '../../src/config/env.js';
import { SimulationConfigError } from '../../src/config/errors.js';
import { DEFAULT_SIMULATION_CONFIG } from '../../src/config/schema.js';

describe('resolvePreset', () => {
  it('builds the 30 s preset from the defaults', () => {
    const preset = resolvePreset('lock-at-25');
    expect(preset.config).toEqual(DEFAULT_SIMULATION_CONFIG);
    expect(preset.layout.width).toBe(1280);
    expect(preset.swing.maxAngleDeg).toBe(22);
  });

  it('builds the 46 s preset', () => {
    const preset = resolvePreset('lock-at-40');
    expect(preset.config.duration).toBe(46);
    expect(preset.config.lockTarget).toBe(40);
    expect(preset.config.palette).toHaveLength(7);
  });

  it('layers overrides on top of a preset', () => {
    const preset = resolvePreset('lock-at-40', { seed: 99 });
    expect(preset.config.seed).toBe(99);
    expect(preset.config.duration).toBe(46);
  });

  it('rejects unknown names', () => {
    expect(() => resolvePreset('lock-at-99')).toThrow(SimulationConfigError);
    expect(isPresetName('lock-at-99')).toBe(false);
    expect(PRESET_NAMES.every(isPresetName)).toBe(true);
  });
});

describe('loadPresetFromEnv', () => {
  it('falls back to lock-at-25', () => {
    const preset = loadPresetFromEnv({});
    expect(preset.name).toBe('lock-at-25');
    expect(preset.config.seed).toBe(7);
  });

  it('reads preset and numeric overrides', () => {
    const preset = loadPresetFromEnv({
      METRONOME_PRESET: 'lock-at-40',
      METRONOME_SEED: '11',
      METRONOME_COUNT: '45',
      METRONOME_DURATION: '12.5',
    });
    expect(preset.name).toBe('lock-at-40');
    expect(preset.config.seed).toBe(11);
    expect(preset.config.count).toBe(45);
    expect(preset.config.duration).toBe(12.5);
  });

  it('treats empty values as unset', () => {
    expect(loadPresetFromEnv({ METRONOME_SEED: '' }).config.seed).toBe(7);
  });

  it('rejects malformed values', () => {
    expect(() => loadPresetFromEnv({ METRONOME_SEED: 'abc' })).toThrow(SimulationConfigError);
    expect(() => loadPresetFromEnv({ METRONOME_COUNT: '-4' })).toThrow(SimulationConfigError);
    expect(() => loadPresetFromEnv({ METRONOME_PRESET: 'fast' })).toThrow(SimulationConfigError);
  });
});
