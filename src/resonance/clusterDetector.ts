/**
 * Cluster Detector
 *
 * Groups active metronomes that are both spatially close and nearly in phase.
 * An edge (i, j) exists when dist(i, j) ≤ neighborRadius and
 * |wrap(θ_i - θ_j)| ≤ phaseThreshold; components come from a union-find over
 * the active indices. A component is a cluster when it is large enough and
 * internally coherent. Identity is not tracked between frames: colors follow
 * discovery order (smallest member index first) through the palette.
 */

import type { Position, Rgb } from '../primitives/types.js';
import { orderParameter } from './orderParameter.js';
import { phaseDifference } from './phase.js';
import { UnionFind } from './unionFind.js';

export interface ClusterParams {
  neighborRadius: number;
  phaseThreshold: number;
  clusterCoherenceThreshold: number;
  minClusterSize: number;
  palette: readonly Rgb[];
}

export interface ClusterInput {
  positions: readonly Position[];
  phases: ArrayLike<number>;
  /** Nonzero for oscillators that have started */
  active: ArrayLike<number>;
}

export interface Cluster {
  /** Oscillator indices in ascending order */
  members: number[];
  /** |mean e^(iθ)| over the members */
  coherence: number;
  qualified: boolean;
  /** Palette color for qualified clusters, null otherwise */
  color: Rgb | null;
}

export interface ClusterResult {
  /** Every connected component, in discovery order */
  components: Cluster[];
  /** Qualified components only */
  clusters: Cluster[];
  /** Fresh color per oscillator belonging to a qualified cluster */
  assignments: Map<number, Rgb>;
}

export function detectClusters(input: ClusterInput, params: ClusterParams): ClusterResult {
  const { positions, phases, active } = input;

  const activeIndices: number[] = [];
  for (let i = 0; i < phases.length; i++) {
    if (active[i]) activeIndices.push(i);
  }

  const components: Cluster[] = [];
  const clusters: Cluster[] = [];
  const assignments = new Map<number, Rgb>();
  if (activeIndices.length === 0) return { components, clusters, assignments };

  const m = activeIndices.length;
  const sets = new UnionFind(m);
  const radiusSq = params.neighborRadius * params.neighborRadius;

  for (let a = 0; a < m; a++) {
    const i = activeIndices[a];
    const pi = positions[i];
    for (let b = a + 1; b < m; b++) {
      const j = activeIndices[b];
      const dx = pi.x - positions[j].x;
      const dy = pi.y - positions[j].y;
      if (dx * dx + dy * dy > radiusSq) continue;
      if (Math.abs(phaseDifference(phases[i], phases[j])) > params.phaseThreshold) continue;
      sets.union(a, b);
    }
  }

  // Walking local indices in order keeps members sorted and components ordered
  const byRoot = new Map<number, number[]>();
  const order: number[][] = [];
  for (let a = 0; a < m; a++) {
    const root = sets.find(a);
    let members = byRoot.get(root);
    if (!members) {
      members = [];
      byRoot.set(root, members);
      order.push(members);
    }
    members.push(activeIndices[a]);
  }

  for (const members of order) {
    const coherence = orderParameter(phases, members);
    const qualified =
      members.length >= params.minClusterSize && coherence >= params.clusterCoherenceThreshold;
    let color: Rgb | null = null;
    if (qualified && params.palette.length > 0) {
      color = params.palette[clusters.length % params.palette.length];
    }
    const cluster: Cluster = { members, coherence, qualified, color };
    components.push(cluster);
    if (qualified) {
      clusters.push(cluster);
      if (color) {
        for (const idx of members) assignments.set(idx, color);
      }
    }
  }

  return { components, clusters, assignments };
}
