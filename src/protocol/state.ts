/** Integer grid coordinate, 0-indexed from the top-left cell. */
export interface GridCell {
  col: number;
  row: number;
}

/**
 * Unit step on the grid. Each component is -1, 0 or 1 and at least one is
 * non-zero, giving the four cardinal and four diagonal moves.
 */
export interface Direction {
  dx: -1 | 0 | 1;
  dy: -1 | 0 | 1;
}

/** Position in the playfield's pixel space. */
export interface Pixel {
  x: number;
  y: number;
}

/** Result of one logical tick. */
export type StepOutcome = 'moved' | 'ate' | 'collided';

/** Coarse engine state derived from the over/paused flags. */
export type EnginePhase = 'active' | 'paused' | 'over';

/**
 * Read-only view of the game handed to renderers after every update.
 * Holds copies only; mutating it never reaches engine state.
 */
export interface RenderableState {
  /** Snake cells, head first. */
  body: GridCell[];
  /** Top-left cell of the food block. */
  foodTopLeft: GridCell;
  /** Edge length of the square food block in cells. */
  foodSize: number;
  score: number;
  isOver: boolean;
  isPaused: boolean;
  /** Direction of the most recent move. */
  direction: Direction;
  gridWidth: number;
  gridHeight: number;
  length: number;
  /** True for a short window after food was eaten. */
  eating: boolean;
}
