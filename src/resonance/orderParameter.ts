/**
 * Global order parameter and lock-hold state machine.
 *
 * Order parameter: r = |Σ e^(iθ_j)| / N
 * r = 0: complete incoherence
 * r = 1: perfect synchronization
 */

import type { LockState } from '../primitives/types.js';

/** Slack for hold time accumulated from repeated frame durations */
export const HOLD_EPSILON = 1e-9;

/**
 * Kuramoto order parameter over all phases, or over a subset of indices.
 */
export function orderParameter(phases: ArrayLike<number>, indices?: readonly number[]): number {
  const count = indices ? indices.length : phases.length;
  if (count === 0) return 0;

  let sumCos = 0;
  let sumSin = 0;
  for (let k = 0; k < count; k++) {
    const theta = indices ? phases[indices[k]] : phases[k];
    sumCos += Math.cos(theta);
    sumSin += Math.sin(theta);
  }

  // Rounding can push a perfectly aligned set a hair above 1
  return Math.min(1, Math.hypot(sumCos, sumSin) / count);
}

/**
 * Mean phase (Ψ in Kuramoto notation)
 */
export function meanPhase(phases: ArrayLike<number>): number {
  let sumCos = 0;
  let sumSin = 0;
  for (let i = 0; i < phases.length; i++) {
    sumCos += Math.cos(phases[i]);
    sumSin += Math.sin(phases[i]);
  }
  return Math.atan2(sumSin, sumCos);
}

export interface LockTrackerConfig {
  /** Coherence needed to accumulate hold time (R_LOCK) */
  lockThreshold: number;
  /** Seconds r must stay at or above the threshold */
  lockHoldSeconds: number;
}

export interface LockUpdate {
  state: LockState;
  lockTimer: number;
  /** True only on the update that entered 'locked' */
  justLocked: boolean;
}

/**
 * Once locked, the tracker stays locked until reset() is called.
 */
export class LockTracker {
  private config: LockTrackerConfig;
  private timer = 0;
  private current: LockState = 'unlocked';

  constructor(config: LockTrackerConfig) {
    this.config = { ...config };
  }

  update(r: number, frameDuration: number): LockUpdate {
    if (this.current === 'locked') {
      return { state: 'locked', lockTimer: this.timer, justLocked: false };
    }

    const coherent = r >= this.config.lockThreshold;
    if (coherent) {
      this.timer += frameDuration;
    } else {
      this.timer = 0;
    }

    // A zero hold time still needs one coherent frame
    if (coherent && this.timer >= this.config.lockHoldSeconds - HOLD_EPSILON) {
      this.current = 'locked';
      return { state: 'locked', lockTimer: this.timer, justLocked: true };
    }

    return { state: 'unlocked', lockTimer: this.timer, justLocked: false };
  }

  get state(): LockState {
    return this.current;
  }

  get locked(): boolean {
    return this.current === 'locked';
  }

  get lockTimer(): number {
    return this.timer;
  }

  reset(): void {
    this.timer = 0;
    this.current = 'unlocked';
  }
}
