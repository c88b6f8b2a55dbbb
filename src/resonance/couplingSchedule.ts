/**
 * Time-ramped coupling strength.
 *
 * Holds K at couplingStart until rampStart, then eases to couplingEnd by
 * lockTarget with a smoothstep, and stays there.
 */

import { clamp01 } from './phase.js';

export interface CouplingSchedule {
  couplingStart: number;
  couplingEnd: number;
  /** Seconds */
  rampStart: number;
  /** Seconds */
  lockTarget: number;
}

/** Ramp width used when lockTarget == rampStart */
export const RAMP_EPSILON = 1e-9;

export function smoothstep(z: number): number {
  const x = clamp01(z);
  return x * x * (3 - 2 * x);
}

export function effectiveCoupling(schedule: CouplingSchedule, t: number): number {
  const { couplingStart, couplingEnd, rampStart, lockTarget } = schedule;
  if (t <= rampStart) return couplingStart;
  const z = (t - rampStart) / Math.max(RAMP_EPSILON, lockTarget - rampStart);
  return couplingStart + smoothstep(z) * (couplingEnd - couplingStart);
}
