import { describe, it, expect } from 'vitest';
import { gridPositions, DEFAULT_GRID_LAYOUT } from '../../src/layout/grid.js';

describe('gridPositions', () => {
  it('spreads 90 metronomes over three rows of thirty', () => {
    const positions = gridPositions(90, 3);
    expect(positions).toHaveLength(90);
    expect(positions[0]).toEqual({ x: 120, y: 160 });
    expect(positions[30]).toEqual({ x: 120, y: 320 });
    expect(positions[89].x).toBeCloseTo(1160, 9);
    expect(positions[89].y).toBe(480);
    expect(positions[1].x).toBeCloseTo(120 + 1040 / 29, 9);
  });

  it('leaves the last row short when the count does not divide evenly', () => {
    const positions = gridPositions(5, 2);
    expect(positions.map(p => p.y)).toEqual([160, 160, 160, 320, 320]);
    expect(positions[3].x).toBe(120);
  });

  it('places a single metronome at the top-left margin', () => {
    expect(gridPositions(1, 1)).toEqual([{ x: 120, y: 160 }]);
  });

  it('honors a custom layout', () => {
    const positions = gridPositions(3, 1, { ...DEFAULT_GRID_LAYOUT, width: 400, marginX: 100, marginTop: 50 });
    expect(positions).toEqual([
      { x: 100, y: 50 },
      { x: 200, y: 50 },
      { x: 300, y: 50 },
    ]);
  });
});
