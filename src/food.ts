// food.ts
// Food block placement constrained by snake occupancy.

import type { Board } from './board.ts';
import type { GridCell } from './protocol/state.ts';
import { pickOne, type RandomSource } from './rng.ts';
import { cellKey } from './utils.ts';

/** Square food block anchored at its top-left cell. */
export interface FoodState {
  topLeft: GridCell;
  sizeCells: number;
}

/** Membership view of the cells the snake occupies. */
export interface Occupancy {
  has(key: string): boolean;
}

/**
 * Top-left of the block centred on the board, used when nothing fits.
 * @param board - Board geometry.
 * @param sizeCells - Block edge length.
 * @returns Centre block anchor.
 */
export function centerFoodAnchor(board: Board, sizeCells: number): GridCell {
  return {
    col: Math.max(0, Math.floor((board.gridW - sizeCells) / 2)),
    row: Math.max(0, Math.floor((board.gridH - sizeCells) / 2))
  };
}

function blockIsFree(occupied: Occupancy, col: number, row: number, sizeCells: number): boolean {
  for (let i = 0; i < sizeCells; i++) {
    for (let j = 0; j < sizeCells; j++) {
      if (occupied.has(cellKey(col + i, row + j))) return false;
    }
  }
  return true;
}

/**
 * Choose a food anchor uniformly among blocks that avoid the snake.
 * When the snake leaves no room, falls back to the centre block and accepts
 * the overlap.
 * @param board - Board geometry.
 * @param occupied - Cells taken by the snake.
 * @param sizeCells - Block edge length.
 * @param rng - Random source.
 * @returns Top-left cell of the new block.
 */
export function placeFood(
  board: Board,
  occupied: Occupancy,
  sizeCells: number,
  rng: RandomSource
): GridCell {
  if (board.gridW < sizeCells || board.gridH < sizeCells) {
    return centerFoodAnchor(board, sizeCells);
  }
  const candidates: GridCell[] = [];
  for (let col = 0; col <= board.gridW - sizeCells; col++) {
    for (let row = 0; row <= board.gridH - sizeCells; row++) {
      if (blockIsFree(occupied, col, row, sizeCells)) candidates.push({ col, row });
    }
  }
  return pickOne(candidates, rng) ?? centerFoodAnchor(board, sizeCells);
}

/** Owns the current food block and its placement policy. */
export class FoodManager {
  /** Current block. */
  private state: FoodState;
  /** Random source for placement. */
  private rng: RandomSource;

  /**
   * @param sizeCells - Block edge length.
   * @param rng - Random source for placement.
   */
  constructor(sizeCells: number, rng: RandomSource) {
    this.state = { topLeft: { col: 0, row: 0 }, sizeCells };
    this.rng = rng;
  }

  get topLeft(): GridCell {
    return { ...this.state.topLeft };
  }

  get sizeCells(): number {
    return this.state.sizeCells;
  }

  /**
   * Move the block to a fresh random spot clear of the snake.
   * @returns New top-left cell.
   */
  respawn(board: Board, occupied: Occupancy): GridCell {
    this.state.topLeft = placeFood(board, occupied, this.state.sizeCells, this.rng);
    return this.topLeft;
  }

  contains(cell: GridCell): boolean {
    const { topLeft, sizeCells } = this.state;
    return (
      cell.col >= topLeft.col &&
      cell.col < topLeft.col + sizeCells &&
      cell.row >= topLeft.row &&
      cell.row < topLeft.row + sizeCells
    );
  }

  /** Every cell covered by the block, column-major. */
  cells(): GridCell[] {
    const out: GridCell[] = [];
    const { topLeft, sizeCells } = this.state;
    for (let i = 0; i < sizeCells; i++) {
      for (let j = 0; j < sizeCells; j++) {
        out.push({ col: topLeft.col + i, row: topLeft.row + j });
      }
    }
    return out;
  }
}
