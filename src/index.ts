/**
 * Metronome Sync
 *
 * Coupled-metronome synchronization engine: time-ramped Kuramoto coupling,
 * staggered starts, lock detection and flicker-free cluster coloring.
 *
 * @package metronome-sync
 * @version 0.1.0
 * @license MIT
 */

// Core primitives
export * from './primitives/types.js';

// Configuration
export * from './config/schema.js';
export * from './config/errors.js';
export * from './config/presets.js';
export * from './config/env.js';

// Layout
export * from './layout/grid.js';

// Simulation engine
export * from './resonance/index.js';

// Renderer helpers
export * from './render/swing.js';
export * from './render/hud.js';

// Logging
export { log, simLog, setLogSink } from './utils/logger.js';
export type { LogLevel, LogSink } from './utils/logger.js';
