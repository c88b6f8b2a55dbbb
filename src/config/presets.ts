/**
 * Named run presets.
 *
 * Each preset is a full, validated configuration plus the layout and swing
 * geometry the renderer uses with it.
 */

import type { Rgb } from '../primitives/types.js';
import { DEFAULT_GRID_LAYOUT, type GridLayout } from '../layout/grid.js';
import { DEFAULT_SWING, type SwingGeometry } from '../render/swing.js';
import { createSimulationConfig, type SimulationConfig } from './schema.js';
import { SimulationConfigError } from './errors.js';

export const PRESET_NAMES = ['lock-at-25', 'lock-at-40'] as const;
export type PresetName = (typeof PRESET_NAMES)[number];

export interface Preset {
  name: PresetName;
  description: string;
  config: SimulationConfig;
  layout: GridLayout;
  swing: SwingGeometry;
}

const PASTEL_PALETTE: Rgb[] = [
  [255, 170, 190],
  [170, 220, 255],
  [190, 245, 180],
  [255, 225, 160],
  [215, 185, 255],
  [160, 240, 225],
  [255, 200, 150],
];

const PRESET_OVERRIDES: Record<PresetName, { description: string; config: Partial<SimulationConfig> }> = {
  'lock-at-25': {
    description: '30 s run, 90 metronomes, full lock near 25 s',
    config: {},
  },
  'lock-at-40': {
    description: '46 s run, pastel cluster colors, full lock near 40 s',
    config: {
      duration: 46,
      omegaSpread: 0.12,
      startSpread: 12,
      fadeIn: 3,
      couplingStart: 0.15,
      couplingEnd: 1.7,
      rampStart: 8,
      lockTarget: 40,
      noiseStd: 0.025,
      neighborRadius: 110,
      phaseThreshold: 0.3,
      clusterCoherenceThreshold: 0.92,
      minClusterSize: 3,
      hysteresisSeconds: 0.8,
      lockThreshold: 0.98,
      lockHoldSeconds: 2,
      palette: PASTEL_PALETTE,
      lockedColor: [236, 246, 255],
    },
  },
};

export function isPresetName(value: string): value is PresetName {
  return (PRESET_NAMES as readonly string[]).includes(value);
}

/**
 * Build a preset, applying overrides on top of its configuration.
 * @throws SimulationConfigError for an unknown name or invalid overrides
 */
export function resolvePreset(name: string, overrides: Partial<SimulationConfig> = {}): Preset {
  if (!isPresetName(name)) {
    throw new SimulationConfigError([`preset: unknown preset "${name}" (expected ${PRESET_NAMES.join(', ')})`]);
  }
  const base = PRESET_OVERRIDES[name];
  return {
    name,
    description: base.description,
    config: createSimulationConfig({ ...base.config, ...overrides }),
    layout: { ...DEFAULT_GRID_LAYOUT },
    swing: { ...DEFAULT_SWING },
  };
}
