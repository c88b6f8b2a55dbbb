/**
 * metronome-sync/resonance
 *
 * Kuramoto integration, lock detection, clustering and color hysteresis.
 */

export { MetronomeEngine, createMetronomeEngine } from './engine.js';
export type {
  FrameSnapshot,
  LockedEvent,
  MetronomeEngineEvents,
  MetronomeEngineOptions,
  RunSummary,
} from './engine.js';

export { buildSpatialWeights, weightAt, rowSum, distance } from './spatialWeights.js';
export type { SpatialWeights } from './spatialWeights.js';

export { effectiveCoupling, smoothstep, RAMP_EPSILON } from './couplingSchedule.js';
export type { CouplingSchedule } from './couplingSchedule.js';

export { activationGain, isActive, fillActivation, fillActive } from './activation.js';

export { integrateStep, couplingTerms } from './integrator.js';
export type { IntegratorInput } from './integrator.js';

export { orderParameter, meanPhase, LockTracker, HOLD_EPSILON } from './orderParameter.js';
export type { LockTrackerConfig, LockUpdate } from './orderParameter.js';

export { detectClusters } from './clusterDetector.js';
export type { Cluster, ClusterInput, ClusterParams, ClusterResult } from './clusterDetector.js';

export { HysteresisTracker, TTL_EPSILON } from './hysteresis.js';
export type { HysteresisEntry } from './hysteresis.js';

export { UnionFind } from './unionFind.js';
export { createRandomSource } from './random.js';
export type { RandomSource } from './random.js';
export { TWO_PI, clamp, clamp01, wrapPhase, phaseDifference } from './phase.js';
