/**
 * Phase arithmetic on the circle (-π, π].
 */

export const TWO_PI = 2 * Math.PI;

export function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

export function clamp01(v: number): number {
  return clamp(v, 0, 1);
}

/**
 * Wrap an angle into (-π, π].
 */
export function wrapPhase(angle: number): number {
  let wrapped = angle - TWO_PI * Math.floor((angle + Math.PI) / TWO_PI);
  // floor() lands on [-π, π); move the closed end over and absorb rounding
  if (wrapped <= -Math.PI) wrapped += TWO_PI;
  if (wrapped > Math.PI) wrapped -= TWO_PI;
  return wrapped;
}

/**
 * Smallest signed difference a - b on the circle.
 */
export function phaseDifference(a: number, b: number): number {
  return wrapPhase(a - b);
}
