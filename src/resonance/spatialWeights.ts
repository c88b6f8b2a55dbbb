/**
 * Spatial coupling weights
 *
 * w_ij = exp(-dist(i, j) / λ), w_ii = 0, each row divided by its sum.
 * A row whose sum is zero keeps divisor 1, leaving that oscillator uncoupled.
 */

import type { Position } from '../primitives/types.js';

export interface SpatialWeights {
  /** Number of oscillators (rows/columns) */
  readonly size: number;
  /** Row-major N×N matrix */
  readonly values: Float64Array;
}

export function distance(a: Position, b: Position): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function buildSpatialWeights(positions: readonly Position[], decay: number): SpatialWeights {
  const size = positions.length;
  const values = new Float64Array(size * size);

  for (let i = 0; i < size; i++) {
    const row = i * size;
    let sum = 0;
    for (let j = 0; j < size; j++) {
      if (i === j) continue;
      const w = Math.exp(-distance(positions[i], positions[j]) / decay);
      values[row + j] = w;
      sum += w;
    }
    const divisor = sum === 0 ? 1 : sum;
    for (let j = 0; j < size; j++) {
      values[row + j] /= divisor;
    }
  }

  return { size, values };
}

export function weightAt(weights: SpatialWeights, i: number, j: number): number {
  return weights.values[i * weights.size + j];
}

export function rowSum(weights: SpatialWeights, i: number): number {
  let sum = 0;
  const row = i * weights.size;
  for (let j = 0; j < weights.size; j++) sum += weights.values[row + j];
  return sum;
}
