import { describe, it, expect } from 'vitest';
import { detectClusters, type ClusterParams } from '../../src/resonance/clusterDetector.js';
import type { Rgb } from '../../src/primitives/types.js';

const RED: Rgb = [255, 0, 0];
const BLUE: Rgb = [0, 0, 255];

const params: ClusterParams = {
  neighborRadius: 10,
  phaseThreshold: 0.3,
  clusterCoherenceThreshold: 0.9,
  minClusterSize: 2,
  palette: [RED, BLUE],
};

const positions = [
  { x: 0, y: 0 },
  { x: 5, y: 0 },
  { x: 100, y: 0 },
  { x: 105, y: 0 },
  { x: 200, y: 0 },
];
const phases = [0, 0.1, 1.0, 1.2, 2.0];
const allActive = Uint8Array.of(1, 1, 1, 1, 1);

describe('detectClusters', () => {
  it('groups near, in-phase neighbors and colors them in discovery order', () => {
    const result = detectClusters({ positions, phases, active: allActive }, params);

    expect(result.components.map(c => c.members)).toEqual([[0, 1], [2, 3], [4]]);
    expect(result.clusters.map(c => c.members)).toEqual([[0, 1], [2, 3]]);
    expect(result.clusters[0].color).toEqual(RED);
    expect(result.clusters[1].color).toEqual(BLUE);
    expect(result.clusters[0].coherence).toBeCloseTo(Math.cos(0.05), 12);
    expect(result.components[2].qualified).toBe(false);
    expect(result.components[2].color).toBeNull();

    expect(result.assignments.get(0)).toEqual(RED);
    expect(result.assignments.get(3)).toEqual(BLUE);
    expect(result.assignments.has(4)).toBe(false);
  });

  it('splits neighbors whose phases are too far apart', () => {
    const result = detectClusters(
      { positions, phases: [0, 0.5, 1.0, 1.2, 2.0], active: allActive },
      params
    );
    expect(result.components.map(c => c.members)).toEqual([[0], [1], [2, 3], [4]]);
    expect(result.clusters).toHaveLength(1);
    expect(result.clusters[0].color).toEqual(RED);
  });

  it('measures phase proximity around the circle', () => {
    const result = detectClusters(
      {
        positions: [
          { x: 0, y: 0 },
          { x: 1, y: 0 },
        ],
        phases: [3.1, -3.1],
        active: Uint8Array.of(1, 1),
      },
      params
    );
    expect(result.clusters).toHaveLength(1);
    expect(result.clusters[0].members).toEqual([0, 1]);
  });

  it('connects chains transitively and checks their coherence', () => {
    const chain = {
      positions: [
        { x: 0, y: 0 },
        { x: 8, y: 0 },
        { x: 16, y: 0 },
      ],
      phases: [0, 0.25, 0.5],
      active: Uint8Array.of(1, 1, 1),
    };
    const loose = detectClusters(chain, params);
    expect(loose.clusters).toHaveLength(1);
    expect(loose.clusters[0].coherence).toBeCloseTo(0.97927, 4);

    const strict = detectClusters(chain, { ...params, clusterCoherenceThreshold: 0.99 });
    expect(strict.components).toHaveLength(1);
    expect(strict.components[0].qualified).toBe(false);
    expect(strict.clusters).toHaveLength(0);
    expect(strict.assignments.size).toBe(0);
  });

  it('ignores oscillators that have not started', () => {
    const result = detectClusters(
      { positions, phases, active: Uint8Array.of(1, 0, 1, 1, 1) },
      params
    );
    expect(result.components.map(c => c.members)).toEqual([[0], [2, 3], [4]]);
    expect(result.assignments.has(0)).toBe(false);
    expect(result.assignments.has(1)).toBe(false);
    expect(result.assignments.get(2)).toEqual(RED);
  });

  it('cycles through the palette', () => {
    const spread = [
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 100, y: 0 },
      { x: 101, y: 0 },
      { x: 200, y: 0 },
      { x: 201, y: 0 },
    ];
    const result = detectClusters(
      { positions: spread, phases: [0, 0, 1, 1, 2, 2], active: new Uint8Array(6).fill(1) },
      params
    );
    expect(result.clusters.map(c => c.color)).toEqual([RED, BLUE, RED]);
  });

  it('returns nothing when no oscillator is active', () => {
    const result = detectClusters({ positions, phases, active: new Uint8Array(5) }, params);
    expect(result.components).toEqual([]);
    expect(result.clusters).toEqual([]);
    expect(result.assignments.size).toBe(0);
  });

  it('keeps co-located, in-phase twins together in any index order', () => {
    const twins = [
      { x: 50, y: 50 },
      { x: 300, y: 0 },
      { x: 50, y: 50 },
      { x: 0, y: 300 },
    ];
    const twinPhases = [0.4, -1.0, 0.4, 2.0];
    const forward = detectClusters(
      { positions: twins, phases: twinPhases, active: Uint8Array.of(1, 1, 1, 1) },
      { ...params, minClusterSize: 3 }
    );
    const reversed = detectClusters(
      {
        positions: [...twins].reverse(),
        phases: [...twinPhases].reverse(),
        active: Uint8Array.of(1, 1, 1, 1),
      },
      { ...params, minClusterSize: 3 }
    );

    const sameComponent = (members: number[][], a: number, b: number) =>
      members.some(m => m.includes(a) && m.includes(b));
    expect(sameComponent(forward.components.map(c => c.members), 0, 2)).toBe(true);
    expect(sameComponent(reversed.components.map(c => c.members), 3, 1)).toBe(true);
    expect(forward.clusters).toHaveLength(0);
    expect(reversed.clusters).toHaveLength(0);
  });
});
