// board.ts
// Fixed logical grid derived from the playfield's pixel area.

import { MIN_GRID_CELLS, type BoardMargins } from './config.ts';
import type { GridCell, Pixel } from './protocol/state.ts';

/** Inputs for deriving a board. */
export interface BoardSpec {
  pixelWidth: number;
  pixelHeight: number;
  margins: BoardMargins;
  cellSize: number;
}

/** Immutable board geometry. */
export interface Board {
  readonly gridW: number;
  readonly gridH: number;
  readonly cellSize: number;
  readonly margins: Readonly<BoardMargins>;
  readonly pixelWidth: number;
  readonly pixelHeight: number;
  /** Pixel X of the left edge of column 0. */
  readonly originX: number;
  /** Pixel Y of the top edge of row 0. */
  readonly originY: number;
}

/**
 * Derive the grid from a pixel budget. Inputs are clamped, never rejected:
 * the usable area is floored at one pixel and each grid edge at
 * MIN_GRID_CELLS cells. The grid is centred inside the usable area.
 * @param spec - Pixel size, margins and cell size.
 * @returns Frozen board geometry.
 */
export function buildBoard(spec: BoardSpec): Board {
  const cellSize = Math.max(1, spec.cellSize);
  const { left, right, top, bottom } = spec.margins;
  const usableW = Math.max(1, spec.pixelWidth - left - right);
  const usableH = Math.max(1, spec.pixelHeight - top - bottom);
  const gridW = Math.max(MIN_GRID_CELLS, Math.floor(usableW / cellSize));
  const gridH = Math.max(MIN_GRID_CELLS, Math.floor(usableH / cellSize));
  const originX = left + Math.max(0, Math.floor((usableW - gridW * cellSize) / 2));
  const originY = top + Math.max(0, Math.floor((usableH - gridH * cellSize) / 2));
  return Object.freeze({
    gridW,
    gridH,
    cellSize,
    margins: Object.freeze({ left, right, top, bottom }),
    pixelWidth: spec.pixelWidth,
    pixelHeight: spec.pixelHeight,
    originX,
    originY
  });
}

/** Pixel centre of a cell. */
export function cellCenter(board: Board, cell: GridCell): Pixel {
  return {
    x: board.originX + cell.col * board.cellSize + board.cellSize * 0.5,
    y: board.originY + cell.row * board.cellSize + board.cellSize * 0.5
  };
}

export function inBounds(board: Board, cell: GridCell): boolean {
  return cell.col >= 0 && cell.row >= 0 && cell.col < board.gridW && cell.row < board.gridH;
}

/** Cell at the geometric centre, rounding toward the top-left. */
export function boardCenter(board: Board): GridCell {
  return { col: Math.floor(board.gridW / 2), row: Math.floor(board.gridH / 2) };
}
