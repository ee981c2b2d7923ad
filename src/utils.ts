// utils.ts
// Small sign and grid-key helpers shared by the engine modules.

import type { GridCell } from './protocol/state.ts';

/**
 * Classifies a signed distance into -1, 0 or 1 with a symmetric threshold.
 * Distances strictly inside the threshold count as zero.
 * @param value - Signed distance.
 * @param threshold - Minimum magnitude for a non-zero result.
 * @returns Axis step.
 */
export function axisStep(value: number, threshold: number): -1 | 0 | 1 {
  if (Math.abs(value) < threshold) return 0;
  return value > 0 ? 1 : -1;
}

/**
 * Stable string key for a grid cell, used by occupancy sets.
 * @param col - Column index.
 * @param row - Row index.
 * @returns Key of the form "col,row".
 */
export function cellKey(col: number, row: number): string {
  return `${col},${row}`;
}

/** Key for an existing cell object. */
export function keyOf(cell: GridCell): string {
  return cellKey(cell.col, cell.row);
}
