/**
 * Staggered activation: each metronome starts at its own time and fades its
 * coupling in linearly over fadeIn seconds.
 */

import { clamp01 } from './phase.js';

export function isActive(startTime: number, t: number): boolean {
  return t >= startTime;
}

export function activationGain(startTime: number, fadeIn: number, t: number): number {
  if (t < startTime) return 0;
  return clamp01((t - startTime) / fadeIn);
}

export function fillActivation(
  startTimes: ArrayLike<number>,
  fadeIn: number,
  t: number,
  out: Float64Array
): Float64Array {
  for (let i = 0; i < startTimes.length; i++) {
    out[i] = activationGain(startTimes[i], fadeIn, t);
  }
  return out;
}

export function fillActive(startTimes: ArrayLike<number>, t: number, out: Uint8Array): Uint8Array {
  for (let i = 0; i < startTimes.length; i++) {
    out[i] = isActive(startTimes[i], t) ? 1 : 0;
  }
  return out;
}
