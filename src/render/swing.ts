/**
 * Metronome swing geometry for renderers.
 *
 * The arm swings by α = αmax·sin θ around its pivot; the bob sits armLength
 * below the pivot along that angle (screen y grows downward).
 */

import type { Position } from '../primitives/types.js';

export interface SwingGeometry {
  /** Largest swing angle in degrees */
  maxAngleDeg: number;
  /** Pivot-to-bob distance in pixels */
  armLength: number;
}

export const DEFAULT_SWING: SwingGeometry = {
  maxAngleDeg: 22,
  armLength: 70,
};

export interface SwingPose {
  /** Arm angle in radians, 0 = hanging straight down */
  angle: number;
  bob: Position;
}

export function swingPose(pivot: Position, phase: number, geometry: SwingGeometry = DEFAULT_SWING): SwingPose {
  const maxAngle = (geometry.maxAngleDeg * Math.PI) / 180;
  const angle = maxAngle * Math.sin(phase);
  return {
    angle,
    bob: {
      x: pivot.x + geometry.armLength * Math.sin(angle),
      y: pivot.y + geometry.armLength * Math.cos(angle),
    },
  };
}
