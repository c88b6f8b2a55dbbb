/**
 * Seedable random source owned by a single engine.
 *
 * Uniform draws come from mulberry32; normal draws use Box-Muller and keep the
 * second variate of each pair for the next call, so the sequence depends only
 * on the seed and the order of calls.
 */

export interface RandomSource {
  /** Uniform in [0, 1) */
  next(): number;
  /** Standard normal */
  normal(): number;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed: number): RandomSource {
  const uniform = mulberry32(seed);
  let spare: number | null = null;

  return {
    next: uniform,
    normal: () => {
      if (spare !== null) {
        const value = spare;
        spare = null;
        return value;
      }
      let u = 0;
      let v = 0;
      while (u === 0) u = uniform();
      while (v === 0) v = uniform();
      const mag = Math.sqrt(-2.0 * Math.log(u));
      spare = mag * Math.sin(2 * Math.PI * v);
      return mag * Math.cos(2 * Math.PI * v);
    },
  };
}
