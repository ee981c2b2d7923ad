// snakeState.ts
// Ordered snake body, direction bookkeeping, growth and collision.

import { boardCenter, inBounds, type Board } from './board.ts';
import { isReverse, RIGHT, sameDirection } from './direction.ts';
import type { FoodManager, Occupancy } from './food.ts';
import type { Direction, GridCell, StepOutcome } from './protocol/state.ts';
import { cellKey, keyOf } from './utils.ts';

/** Body length of a freshly reset snake. */
export const START_LENGTH = 3;

/**
 * Mutable simulation subject. The body array keeps head-to-tail order and
 * the occupancy set mirrors it for constant-time membership checks; every
 * insert and removal touches both.
 */
export class SnakeState {
  /** Cells from head to tail. */
  private body: GridCell[] = [];
  /** Keys of every body cell. */
  private occupied = new Set<string>();
  /** Direction applied on the last step. */
  currentDirection: Direction = RIGHT;
  /** Direction the next step will adopt. */
  pendingDirection: Direction = RIGHT;
  /** Remaining steps on which the tail is kept. */
  growCredits = 0;
  /** Set once on collision; cleared only by reset. */
  isOver = false;
  /** Set while the pointer signal is lost. */
  isPaused = false;
  score = 0;
  /** Food blocks eaten in this life. */
  foodEaten = 0;
  /** Successful moves in this life. */
  ticks = 0;

  /**
   * Re-initialise to a three-cell snake at the board centre heading right.
   * @param board - Board geometry.
   */
  reset(board: Board): void {
    const { col, row } = boardCenter(board);
    const body: GridCell[] = [];
    for (let i = 0; i < START_LENGTH; i++) body.push({ col: col - i, row });
    this.place(body, RIGHT);
  }

  /**
   * Load an explicit body and heading, clearing all counters.
   * @param body - Cells from head to tail; must be non-empty and distinct.
   * @param direction - Current and pending direction.
   */
  place(body: readonly GridCell[], direction: Direction): void {
    const keys = new Set(body.map(keyOf));
    if (!body.length || keys.size !== body.length) {
      throw new Error('SnakeState.place: body must be non-empty with distinct cells.');
    }
    this.body = body.map((cell) => ({ ...cell }));
    this.occupied = keys;
    this.currentDirection = direction;
    this.pendingDirection = direction;
    this.growCredits = 0;
    this.isOver = false;
    this.isPaused = false;
    this.score = 0;
    this.foodEaten = 0;
    this.ticks = 0;
  }

  get head(): GridCell {
    const head = this.body[0];
    if (!head) throw new Error('SnakeState: body is empty; call reset() first.');
    return head;
  }

  get length(): number {
    return this.body.length;
  }

  /** Membership view used by food placement. */
  get occupancy(): Occupancy {
    return this.occupied;
  }

  /** Copy of the body, head first. */
  cells(): GridCell[] {
    return this.body.map((cell) => ({ ...cell }));
  }

  occupies(cell: GridCell): boolean {
    return this.occupied.has(keyOf(cell));
  }

  /**
   * Request a direction for the next step. A reversal of the current
   * direction is refused so the pending value can never point back into
   * the neck.
   * @returns Whether the request was accepted.
   */
  setPending(direction: Direction): boolean {
    if (isReverse(direction, this.currentDirection)) return false;
    if (!sameDirection(direction, this.pendingDirection)) {
      this.pendingDirection = direction;
    }
    return true;
  }

  /**
   * Advance one logical tick.
   *
   * The new head goes in before growth is evaluated and the tail only
   * leaves when no growth credit is left, so each credit adds one cell.
   * A collision leaves the body untouched and ends the game.
   *
   * @param board - Board geometry.
   * @param food - Food manager consulted and respawned on eating.
   * @param growthPerFood - Credits awarded per food block.
   * @returns What the step did.
   */
  step(board: Board, food: FoodManager, growthPerFood: number): StepOutcome {
    if (this.isOver) return 'collided';
    this.currentDirection = this.pendingDirection;
    const head = this.head;
    const next: GridCell = {
      col: head.col + this.currentDirection.dx,
      row: head.row + this.currentDirection.dy
    };
    const key = cellKey(next.col, next.row);
    if (!inBounds(board, next) || this.occupied.has(key)) {
      this.isOver = true;
      return 'collided';
    }

    this.body.unshift(next);
    this.occupied.add(key);

    let outcome: StepOutcome = 'moved';
    if (food.contains(next)) {
      this.score += 1;
      this.growCredits += growthPerFood;
      this.foodEaten += 1;
      food.respawn(board, this.occupied);
      outcome = 'ate';
    }

    if (this.growCredits > 0) {
      this.growCredits -= 1;
    } else {
      const tail = this.body.pop();
      if (tail) this.occupied.delete(keyOf(tail));
    }
    this.ticks += 1;
    return outcome;
  }
}
