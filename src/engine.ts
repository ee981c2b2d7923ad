// engine.ts
// Fixed-tick simulation stepper driven by an optional pointer sample per
// poll. Callers own the loop and pass timestamps in seconds.

import { buildBoard, cellCenter, type Board } from './board.ts';
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from './config.ts';
import { resolveDirection } from './direction.ts';
import { FoodManager } from './food.ts';
import type { EnginePhase, Pixel, RenderableState } from './protocol/state.ts';
import type { RandomSource } from './rng.ts';
import { SnakeState } from './snakeState.ts';

/** Slack for float error when dividing elapsed time into ticks. */
const TICK_EPSILON = 1e-9;

/** Optional collaborators for an engine instance. */
export interface EngineOptions {
  /** Random source for food placement; defaults to Math.random. */
  rng?: RandomSource;
}

export class SnakeEngine {
  /** Resolved construction parameters. */
  readonly config: EngineConfig;
  /** Board geometry, fixed for the engine's lifetime. */
  readonly board: Board;
  /** Pointer distance below which input is ignored. */
  readonly deadzone: number;
  /** Snake owned exclusively by this engine. */
  private state = new SnakeState();
  /** Food block and placement policy. */
  private food: FoodManager;
  /** Time of the last applied tick boundary. */
  private lastTickAt = 0;
  /** Time the pointer was last seen. */
  private lastSignalAt = 0;
  /** Whether the clock fields hold real timestamps yet. */
  private anchored = false;
  /** Latest timestamp passed to update. */
  private lastNow = 0;
  /** End of the current eat flash. */
  private eatFlashUntil = Number.NEGATIVE_INFINITY;

  /**
   * Validate parameters, build the board and start a fresh game.
   * @param input - Configuration overrides.
   * @param options - Optional collaborators.
   * @throws EngineConfigError on contradictory parameters.
   */
  constructor(input: EngineConfigInput = {}, options: EngineOptions = {}) {
    this.config = resolveEngineConfig(input);
    this.board = buildBoard(this.config);
    this.deadzone = this.config.cellSize * this.config.deadzoneFraction;
    this.food = new FoodManager(this.config.foodSize, options.rng ?? Math.random);
    this.reset();
  }

  /**
   * Start a new game: three-cell snake at the centre, new food, score 0.
   * @param now - Timestamp to anchor the tick clock to. When omitted the
   *   clock anchors on the next update.
   * @returns Snapshot of the fresh game.
   */
  reset(now?: number): RenderableState {
    this.state.reset(this.board);
    this.food.respawn(this.board, this.state.occupancy);
    this.eatFlashUntil = Number.NEGATIVE_INFINITY;
    if (now !== undefined && Number.isFinite(now)) {
      this.anchor(now);
    } else {
      this.anchored = false;
    }
    return this.snapshot();
  }

  /**
   * Feed one poll into the engine.
   * @param now - Current time in seconds.
   * @param pointer - Pointer sample, or null when nothing was detected.
   * @returns Snapshot after any ticks that became due.
   */
  update(now: number, pointer: Pixel | null): RenderableState {
    if (!Number.isFinite(now)) return this.snapshot();
    if (!this.anchored) this.anchor(now);
    this.lastNow = now;

    const state = this.state;
    if (state.isOver) return this.snapshot();

    const sample = pointer && Number.isFinite(pointer.x) && Number.isFinite(pointer.y) ? pointer : null;
    if (sample) {
      this.lastSignalAt = now;
      state.isPaused = false;
      const next = resolveDirection(this.headPixelCenter(), sample, state.currentDirection, this.deadzone);
      if (next) state.setPending(next);
    } else if (now - this.lastSignalAt > this.config.signalLossWindow) {
      state.isPaused = true;
    }

    if (!state.isPaused) this.advance(now);
    return this.snapshot();
  }

  /** Coarse state for hosts that branch on it. */
  get phase(): EnginePhase {
    if (this.state.isOver) return 'over';
    return this.state.isPaused ? 'paused' : 'active';
  }

  /** Pixel centre of the head cell. */
  headPixelCenter(): Pixel {
    return cellCenter(this.board, this.state.head);
  }

  /** Copy of the current game for renderers. */
  snapshot(): RenderableState {
    const state = this.state;
    return {
      body: state.cells(),
      foodTopLeft: this.food.topLeft,
      foodSize: this.food.sizeCells,
      score: state.score,
      isOver: state.isOver,
      isPaused: state.isPaused,
      direction: { ...state.currentDirection },
      gridWidth: this.board.gridW,
      gridHeight: this.board.gridH,
      length: state.length,
      eating: this.lastNow < this.eatFlashUntil
    };
  }

  private anchor(now: number): void {
    this.lastTickAt = now;
    this.lastSignalAt = now;
    this.lastNow = now;
    this.anchored = true;
  }

  /**
   * Replay the ticks that fell due since the last boundary, at most
   * maxCatchUpSteps of them. The boundary moves only by the ticks applied,
   * so any remaining backlog drains over the following polls and the tick
   * phase does not drift.
   */
  private advance(now: number): void {
    const { tickInterval, maxCatchUpSteps, growthPerFood, eatFlashSeconds } = this.config;
    const due = Math.floor((now - this.lastTickAt) / tickInterval + TICK_EPSILON);
    if (due <= 0) return;
    const steps = Math.min(due, maxCatchUpSteps);
    for (let i = 0; i < steps; i++) {
      const outcome = this.state.step(this.board, this.food, growthPerFood);
      if (outcome === 'ate') this.eatFlashUntil = now + eatFlashSeconds;
      if (outcome === 'collided') break;
    }
    this.lastTickAt += steps * tickInterval;
  }
}
