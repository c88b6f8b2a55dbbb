/**
 * Grid layout provider
 *
 * Lays metronomes out row by row on a fixed table. Columns span the canvas
 * width between the side margins; rows are a fixed distance apart.
 */

import type { Position } from '../primitives/types.js';

export interface GridLayout {
  width: number;
  marginX: number;
  marginTop: number;
  spacingY: number;
}

export const DEFAULT_GRID_LAYOUT: GridLayout = {
  width: 1280,
  marginX: 120,
  marginTop: 160,
  spacingY: 160,
};

export function gridPositions(
  count: number,
  rows: number,
  layout: GridLayout = DEFAULT_GRID_LAYOUT
): Position[] {
  const cols = Math.ceil(count / rows);
  const spacingX = (layout.width - 2 * layout.marginX) / Math.max(1, cols - 1);
  const positions: Position[] = [];

  for (let r = 0; r < rows && positions.length < count; r++) {
    const y = layout.marginTop + r * layout.spacingY;
    for (let c = 0; c < cols && positions.length < count; c++) {
      positions.push({ x: layout.marginX + c * spacingX, y });
    }
  }

  return positions;
}
