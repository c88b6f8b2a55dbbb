/**
 * Simulation configuration
 *
 * Every tunable the engine reads lives in one validated bundle. Times are in
 * seconds, frequencies in Hz unless noted, distances in layout pixels.
 */

import { z } from 'zod';
import { Rgb } from '../primitives/types.js';
import { SimulationConfigError } from './errors.js';

const SimulationConfigObject = z.object({
  /** Number of metronomes (N) */
  count: z.number().int().positive(),
  /** Grid rows used by the layout provider */
  rows: z.number().int().positive(),
  duration: z.number().positive().finite(),
  fps: z.number().positive().finite(),
  /** Integrator sub-steps per output frame */
  substeps: z.number().int().min(1),
  omegaMeanHz: z.number().finite(),
  /** Standard deviation of ω (rad/s) */
  omegaSpread: z.number().nonnegative().finite(),
  seed: z.number().int(),
  /** Start times are drawn uniformly from [0, startSpread) */
  startSpread: z.number().nonnegative().finite(),
  fadeIn: z.number().positive().finite(),
  /** Spatial decay length λ */
  spatialDecay: z.number().positive().finite(),
  couplingStart: z.number().finite(),
  couplingEnd: z.number().finite(),
  rampStart: z.number().finite(),
  lockTarget: z.number().finite(),
  /** Phase diffusion σ (rad/√s) */
  noiseStd: z.number().nonnegative().finite(),
  neighborRadius: z.number().nonnegative().finite(),
  /** Largest in-cluster phase gap (rad) */
  phaseThreshold: z.number().min(0).max(Math.PI),
  clusterCoherenceThreshold: z.number().min(0).max(1),
  minClusterSize: z.number().int().min(1),
  hysteresisSeconds: z.number().nonnegative().finite(),
  /** R_LOCK */
  lockThreshold: z.number().min(0).max(1),
  lockHoldSeconds: z.number().nonnegative().finite(),
  palette: z.array(Rgb).min(1),
  /** Color reported for every metronome once locked */
  lockedColor: Rgb,
});

export const SimulationConfigSchema = SimulationConfigObject
  .refine(c => c.lockTarget >= c.rampStart, {
    message: 'lockTarget must not precede rampStart',
    path: ['lockTarget'],
  })
  .refine(c => c.couplingEnd >= c.couplingStart, {
    message: 'couplingEnd must be at least couplingStart',
    path: ['couplingEnd'],
  });

export type SimulationConfig = z.infer<typeof SimulationConfigSchema>;

export const DEFAULT_PALETTE: Rgb[] = [
  [255, 179, 186],
  [255, 223, 186],
  [255, 255, 186],
  [186, 255, 201],
  [186, 225, 255],
  [218, 190, 255],
];

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  count: 90,
  rows: 3,
  duration: 30,
  fps: 30,
  substeps: 4,
  omegaMeanHz: 1.1,
  omegaSpread: 0.1,
  seed: 7,
  startSpread: 10,
  fadeIn: 2.5,
  spatialDecay: 160,
  couplingStart: 0.18,
  couplingEnd: 1.6,
  rampStart: 5,
  lockTarget: 25,
  noiseStd: 0.02,
  neighborRadius: 120,
  phaseThreshold: 0.35,
  clusterCoherenceThreshold: 0.9,
  minClusterSize: 3,
  hysteresisSeconds: 0.6,
  lockThreshold: 0.97,
  lockHoldSeconds: 1.5,
  palette: DEFAULT_PALETTE,
  lockedColor: [80, 200, 255],
};

/**
 * Merge overrides onto the defaults and validate.
 * @throws SimulationConfigError
 */
export function createSimulationConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const parsed = SimulationConfigSchema.safeParse({ ...DEFAULT_SIMULATION_CONFIG, ...overrides });
  if (!parsed.success) throw SimulationConfigError.fromZod(parsed.error.issues);
  return parsed.data;
}

/**
 * Frames in a full run: floor(fps · duration).
 */
export function totalFrames(config: Pick<SimulationConfig, 'fps' | 'duration'>): number {
  return Math.floor(config.fps * config.duration);
}
