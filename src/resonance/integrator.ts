/**
 * Kuramoto integrator
 *
 * dθ_i = (ω_i + K Σ_j w_ij g_i g_j sin(θ_j - θ_i)) dt + σ √dt ξ_i
 *
 * Euler–Maruyama with a synchronous update: every coupling term is computed
 * from the phases at the start of the sub-step before any phase moves.
 */

import type { SpatialWeights } from './spatialWeights.js';
import { wrapPhase } from './phase.js';

export interface IntegratorInput {
  /** Current phases; updated in place */
  phases: Float64Array;
  /** Natural frequencies (rad/s) */
  omega: ArrayLike<number>;
  weights: SpatialWeights;
  /** Activation gain per oscillator in [0, 1] */
  gains: ArrayLike<number>;
  /** Effective coupling K_eff for this sub-step */
  coupling: number;
  noiseStd: number;
}

/**
 * Coupling term for each oscillator, K Σ_j w_ij g_i g_j sin(θ_j - θ_i).
 */
export function couplingTerms(
  phases: ArrayLike<number>,
  weights: SpatialWeights,
  gains: ArrayLike<number>,
  coupling: number,
  out: Float64Array = new Float64Array(phases.length)
): Float64Array {
  const n = phases.length;
  const w = weights.values;

  for (let i = 0; i < n; i++) {
    const gi = gains[i];
    if (gi === 0 || coupling === 0) {
      out[i] = 0;
      continue;
    }
    const theta = phases[i];
    const row = i * n;
    let sum = 0;
    for (let j = 0; j < n; j++) {
      const wij = w[row + j];
      const gj = gains[j];
      if (wij === 0 || gj === 0) continue;
      sum += wij * gj * Math.sin(phases[j] - theta);
    }
    out[i] = coupling * gi * sum;
  }

  return out;
}

/**
 * Advance every phase by one sub-step.
 *
 * Exactly one normal variate is drawn per oscillator, in index order, on every
 * call (also when noiseStd is 0) so the random stream stays aligned across
 * parameter changes.
 */
export function integrateStep(
  input: IntegratorInput,
  dt: number,
  randn: () => number,
  scratch?: Float64Array
): void {
  const { phases, omega, weights, gains, coupling, noiseStd } = input;
  const terms = couplingTerms(phases, weights, gains, coupling, scratch);
  const noiseScale = noiseStd * Math.sqrt(dt);

  for (let i = 0; i < phases.length; i++) {
    const eta = noiseScale * randn();
    phases[i] = wrapPhase(phases[i] + (omega[i] + terms[i]) * dt + eta);
  }
}
