/**
 * Two-line status overlay shown in the top-left corner of each frame.
 */

import type { SimulationConfig } from '../config/schema.js';
import type { FrameSnapshot } from '../resonance/engine.js';
import { DEFAULT_SWING, type SwingGeometry } from './swing.js';

export type HudSnapshot = Pick<FrameSnapshot, 'time' | 'coupling' | 'orderParameter'>;

export function formatHud(
  snapshot: HudSnapshot,
  config: Pick<SimulationConfig, 'count' | 'spatialDecay' | 'omegaMeanHz'>,
  swing: SwingGeometry = DEFAULT_SWING
): [string, string] {
  const line1 =
    `N=${config.count}   K(t)=${snapshot.coupling.toFixed(2)}   ` +
    `λ=${Math.trunc(config.spatialDecay)}px   f≈${config.omegaMeanHz.toFixed(2)} Hz   ` +
    `t=${snapshot.time.toFixed(1).padStart(5)}s`;
  const line2 = `order parameter r=${snapshot.orderParameter.toFixed(3)}   swing ±${swing.maxAngleDeg.toFixed(0)}°`;
  return [line1, line2];
}
