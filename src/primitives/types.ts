/**
 * Metronome Sync Core Primitives
 *
 * Shapes shared between the layout provider, the engine and the renderer.
 * Each primitive is a zod schema with a same-named inferred type.
 */

import { z } from 'zod';

// ============================================================================
// GEOMETRY
// ============================================================================

export const Position = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});
export type Position = z.infer<typeof Position>;

// ============================================================================
// COLOR
// ============================================================================

const Channel = z.number().int().min(0).max(255);

/** 8-bit RGB triple */
export const Rgb = z.tuple([Channel, Channel, Channel]);
export type Rgb = z.infer<typeof Rgb>;

/** Per-oscillator color as seen by the renderer; null means neutral */
export type ColorAssignment = Rgb | null;

// ============================================================================
// LOCK STATE
// ============================================================================

export const LockState = z.enum(['unlocked', 'locked']);
export type LockState = z.infer<typeof LockState>;
