/**
 * Color hysteresis
 *
 * Keeps a metronome's cluster color for hysteresisSeconds after it drops out
 * of a cluster, absorbing per-frame churn from the detector.
 */

import type { ColorAssignment, Rgb } from '../primitives/types.js';

export interface HysteresisEntry {
  color: Rgb;
  /** Seconds left before the color is dropped */
  ttl: number;
}

/** ttl at or below this counts as expired */
export const TTL_EPSILON = 1e-9;

export class HysteresisTracker {
  private holdSeconds: number;
  private entries: Map<number, HysteresisEntry> = new Map();

  constructor(holdSeconds: number) {
    this.holdSeconds = holdSeconds;
  }

  /**
   * Refresh fresh members to the full hold time and decay everyone else by
   * the frame's elapsed time.
   */
  update(fresh: ReadonlyMap<number, Rgb>, elapsed: number): void {
    for (const [index, entry] of this.entries) {
      if (fresh.has(index)) continue;
      entry.ttl -= elapsed;
      if (entry.ttl <= TTL_EPSILON) this.entries.delete(index);
    }

    for (const [index, color] of fresh) {
      this.entries.set(index, { color, ttl: this.holdSeconds });
    }
  }

  colorOf(index: number): ColorAssignment {
    return this.entries.get(index)?.color ?? null;
  }

  entryOf(index: number): HysteresisEntry | undefined {
    const entry = this.entries.get(index);
    return entry ? { ...entry } : undefined;
  }

  colors(count: number): ColorAssignment[] {
    return Array.from({ length: count }, (_, i) => this.colorOf(i));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
