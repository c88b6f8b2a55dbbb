/**
 * Metronome Engine
 *
 * Owns one run of the coupled-metronome simulation. Each output frame runs
 * the integrator for `substeps` sub-steps, updates the lock state, then (while
 * unlocked) detects clusters and smooths their colors through hysteresis.
 *
 * Events:
 * - 'frame' - FrameSnapshot after every nextFrame()
 * - 'locked' - {frame, time, orderParameter} on the transition to locked
 */

import { EventEmitter } from 'eventemitter3';
import { Position, type ColorAssignment, type LockState, type Rgb } from '../primitives/types.js';
import {
  createSimulationConfig,
  totalFrames,
  type SimulationConfig,
} from '../config/schema.js';
import { SimulationConfigError } from '../config/errors.js';
import { simLog } from '../utils/logger.js';
import { fillActivation, fillActive } from './activation.js';
import { detectClusters, type Cluster } from './clusterDetector.js';
import { effectiveCoupling } from './couplingSchedule.js';
import { HysteresisTracker } from './hysteresis.js';
import { integrateStep } from './integrator.js';
import { LockTracker, orderParameter } from './orderParameter.js';
import { TWO_PI, wrapPhase } from './phase.js';
import { createRandomSource, type RandomSource } from './random.js';
import { buildSpatialWeights, type SpatialWeights } from './spatialWeights.js';

const COMPONENT = 'engine';

export interface FrameSnapshot {
  /** 0-based index of this output frame */
  frame: number;
  /** Simulation clock at the end of the frame (s) */
  time: number;
  phases: Float64Array;
  /** 1 for metronomes that have started */
  active: Uint8Array;
  /** Coupling gain in [0, 1] per metronome */
  activation: Float64Array;
  colors: ColorAssignment[];
  /** Detected components while unlocked; one group of everyone once locked */
  clusters: Cluster[];
  orderParameter: number;
  /** K_eff at the frame's end time */
  coupling: number;
  lockState: LockState;
  fullyLocked: boolean;
  justLocked: boolean;
  lockTimer: number;
}

export interface LockedEvent {
  frame: number;
  time: number;
  orderParameter: number;
}

export interface MetronomeEngineEvents {
  frame: (snapshot: FrameSnapshot) => void;
  locked: (event: LockedEvent) => void;
}

export interface MetronomeEngineOptions {
  /** Replaces the seeded source built from config.seed */
  random?: RandomSource;
  /** Overrides the drawn initial phases (rad) */
  initialPhases?: ArrayLike<number>;
  /** Overrides the drawn natural frequencies (rad/s) */
  naturalFrequencies?: ArrayLike<number>;
  /** Overrides the drawn start times (s) */
  startTimes?: ArrayLike<number>;
}

export interface RunSummary {
  frames: number;
  time: number;
  finalOrderParameter: number;
  lockedAtFrame: number | null;
  lockedAtTime: number | null;
}

function copyOverride(name: string, values: ArrayLike<number> | undefined, target: Float64Array): string[] {
  if (!values) return [];
  if (values.length !== target.length) {
    return [`${name}: expected ${target.length} values, received ${values.length}`];
  }
  for (let i = 0; i < target.length; i++) {
    if (!Number.isFinite(values[i])) return [`${name}.${i}: must be finite`];
    target[i] = values[i];
  }
  return [];
}

function copyColor(color: ColorAssignment): ColorAssignment {
  if (color === null) return null;
  const copy: Rgb = [color[0], color[1], color[2]];
  return copy;
}

export class MetronomeEngine extends EventEmitter<MetronomeEngineEvents> {
  readonly config: SimulationConfig;
  readonly positions: readonly Position[];
  readonly weights: SpatialWeights;
  private naturalFrequencies: Float64Array;
  private startTimes: Float64Array;
  private random: RandomSource;
  private phases: Float64Array;
  private gains: Float64Array;
  private active: Uint8Array;
  private scratch: Float64Array;
  private lock: LockTracker;
  private hysteresis: HysteresisTracker;
  private stepCount = 0;
  private frameCount = 0;
  private dt: number;

  /**
   * @throws SimulationConfigError for invalid config or positions
   */
  constructor(
    positions: readonly Position[],
    config: Partial<SimulationConfig> = {},
    options: MetronomeEngineOptions = {}
  ) {
    super();
    this.config = createSimulationConfig(config);
    const n = this.config.count;

    const issues: string[] = [];
    if (positions.length !== n) {
      issues.push(`positions: expected ${n} entries, received ${positions.length}`);
    }
    positions.forEach((p, i) => {
      if (!Position.safeParse(p).success) issues.push(`positions.${i}: x and y must be finite numbers`);
    });
    if (issues.length > 0) throw new SimulationConfigError(issues);

    this.positions = Object.freeze(positions.map(p => Object.freeze({ x: p.x, y: p.y })));
    this.weights = buildSpatialWeights(this.positions, this.config.spatialDecay);
    this.random = options.random ?? createRandomSource(this.config.seed);

    // Draw order is fixed: frequencies, then phases, then start times
    this.naturalFrequencies = new Float64Array(n);
    this.phases = new Float64Array(n);
    this.startTimes = new Float64Array(n);
    const omegaMean = TWO_PI * this.config.omegaMeanHz;
    for (let i = 0; i < n; i++) {
      this.naturalFrequencies[i] = omegaMean + this.config.omegaSpread * this.random.normal();
    }
    for (let i = 0; i < n; i++) {
      this.phases[i] = wrapPhase(-Math.PI + TWO_PI * this.random.next());
    }
    for (let i = 0; i < n; i++) {
      this.startTimes[i] = this.config.startSpread * this.random.next();
    }

    const overrideIssues = [
      ...copyOverride('naturalFrequencies', options.naturalFrequencies, this.naturalFrequencies),
      ...copyOverride('initialPhases', options.initialPhases, this.phases),
      ...copyOverride('startTimes', options.startTimes, this.startTimes),
    ];
    if (overrideIssues.length > 0) throw new SimulationConfigError(overrideIssues);
    for (let i = 0; i < n; i++) this.phases[i] = wrapPhase(this.phases[i]);

    this.gains = new Float64Array(n);
    this.active = new Uint8Array(n);
    this.scratch = new Float64Array(n);
    this.lock = new LockTracker({
      lockThreshold: this.config.lockThreshold,
      lockHoldSeconds: this.config.lockHoldSeconds,
    });
    this.hysteresis = new HysteresisTracker(this.config.hysteresisSeconds);
    this.dt = 1 / (this.config.fps * this.config.substeps);

    simLog.debug(COMPONENT, 'engine created', {
      count: n,
      seed: this.config.seed,
      fps: this.config.fps,
      substeps: this.config.substeps,
      totalFrames: this.totalFrames,
    });
  }

  /** Simulation clock (s) */
  get time(): number {
    return this.stepCount * this.dt;
  }

  /** Output frames produced so far */
  get frameIndex(): number {
    return this.frameCount;
  }

  get totalFrames(): number {
    return totalFrames(this.config);
  }

  get lockState(): LockState {
    return this.lock.state;
  }

  get isLocked(): boolean {
    return this.lock.locked;
  }

  /** Copy of the current phase vector */
  getPhases(): Float64Array {
    return Float64Array.from(this.phases);
  }

  /** Copy of the natural frequencies (rad/s) */
  getNaturalFrequencies(): Float64Array {
    return Float64Array.from(this.naturalFrequencies);
  }

  /** Copy of the start times (s) */
  getStartTimes(): Float64Array {
    return Float64Array.from(this.startTimes);
  }

  getOrderParameter(): number {
    return orderParameter(this.phases);
  }

  /**
   * Advance one output frame and return its snapshot.
   */
  nextFrame(): FrameSnapshot {
    const { config } = this;
    const n = config.count;

    for (let s = 0; s < config.substeps; s++) {
      const t = this.time;
      fillActivation(this.startTimes, config.fadeIn, t, this.gains);
      integrateStep(
        {
          phases: this.phases,
          omega: this.naturalFrequencies,
          weights: this.weights,
          gains: this.gains,
          coupling: effectiveCoupling(config, t),
          noiseStd: config.noiseStd,
        },
        this.dt,
        () => this.random.normal(),
        this.scratch
      );
      this.stepCount++;
    }

    const time = this.time;
    const frame = this.frameCount++;
    const frameDuration = 1 / config.fps;
    const r = orderParameter(this.phases);
    const lockUpdate = this.lock.update(r, frameDuration);

    fillActive(this.startTimes, time, this.active);
    fillActivation(this.startTimes, config.fadeIn, time, this.gains);

    let colors: ColorAssignment[];
    let clusters: Cluster[];

    if (lockUpdate.state === 'locked') {
      if (lockUpdate.justLocked) {
        this.hysteresis.clear();
        simLog.info(COMPONENT, 'metronomes locked', { frame, time, orderParameter: r });
        this.emit('locked', { frame, time, orderParameter: r });
      }
      colors = Array.from({ length: n }, () => config.lockedColor);
      clusters = [
        {
          members: Array.from({ length: n }, (_, i) => i),
          coherence: r,
          qualified: true,
          color: config.lockedColor,
        },
      ];
    } else {
      const result = detectClusters(
        { positions: this.positions, phases: this.phases, active: this.active },
        config
      );
      this.hysteresis.update(result.assignments, frameDuration);
      colors = this.hysteresis.colors(n);
      clusters = result.components;
    }

    const snapshot: FrameSnapshot = {
      frame,
      time,
      phases: Float64Array.from(this.phases),
      active: Uint8Array.from(this.active),
      activation: Float64Array.from(this.gains),
      colors: colors.map(copyColor),
      clusters: clusters.map(c => ({ ...c, members: [...c.members], color: copyColor(c.color) })),
      orderParameter: r,
      coupling: effectiveCoupling(config, time),
      lockState: lockUpdate.state,
      fullyLocked: lockUpdate.state === 'locked',
      justLocked: lockUpdate.justLocked,
      lockTimer: lockUpdate.lockTimer,
    };

    this.emit('frame', snapshot);
    return snapshot;
  }

  /**
   * Yields frames until the configured duration is reached. Breaking out of
   * the loop stops the run between frames.
   */
  *frames(): Generator<FrameSnapshot, void, undefined> {
    while (this.frameCount < this.totalFrames) {
      yield this.nextFrame();
    }
  }

  /**
   * Run the remaining frames to completion.
   */
  run(onFrame?: (snapshot: FrameSnapshot) => void): RunSummary {
    let lockedAtFrame: number | null = null;
    let lockedAtTime: number | null = null;
    let last: FrameSnapshot | null = null;

    for (const snapshot of this.frames()) {
      if (snapshot.justLocked) {
        lockedAtFrame = snapshot.frame;
        lockedAtTime = snapshot.time;
      }
      onFrame?.(snapshot);
      last = snapshot;
    }

    return {
      frames: this.frameCount,
      time: this.time,
      finalOrderParameter: last ? last.orderParameter : this.getOrderParameter(),
      lockedAtFrame,
      lockedAtTime,
    };
  }

  /**
   * Leave the locked state. Clustering resumes on the next frame.
   */
  resetLock(): void {
    this.lock.reset();
    this.hysteresis.clear();
    simLog.info(COMPONENT, 'lock reset', { frame: this.frameCount, time: this.time });
  }
}

export function createMetronomeEngine(
  positions: readonly Position[],
  config?: Partial<SimulationConfig>,
  options?: MetronomeEngineOptions
): MetronomeEngine {
  return new MetronomeEngine(positions, config, options);
}
