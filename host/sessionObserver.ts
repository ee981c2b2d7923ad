import type { RenderableState } from '../src/protocol/state.ts';
import type { Logger } from './logger.ts';
import type { ScoreStore, SessionOutcome, SessionSummary } from './scoreStore.ts';

/** SQLite error code indicating the database or disk is full. */
const SQLITE_FULL_CODE = 'SQLITE_FULL';

function isSqliteFullError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  return (err as { code?: string }).code === SQLITE_FULL_CODE;
}

export interface SessionObserverOptions {
  player: string;
  logger: Logger;
  /** Optional store; without one the observer only logs. */
  store?: ScoreStore | null;
  /** Wall clock in epoch ms for stored timestamps. */
  wallClock?: () => number;
}

/**
 * Watches engine snapshots from the outside and turns state changes into
 * log lines and score-store writes. The engine never sees this object.
 */
export class SessionObserver {
  private readonly player: string;
  private readonly logger: Logger;
  private store: ScoreStore | null;
  private readonly wallClock: () => number;
  /** Engine time the current session began, in seconds. */
  private startedAt = 0;
  /** Wall-clock start of the current session, epoch ms. */
  private startedAtWall = 0;
  private lastScore = 0;
  private lastPaused = false;
  private foodEaten = 0;
  /** Whether a session is open and not yet summarised. */
  private open = false;
  /** Best score known for the player. */
  private best = 0;
  /** Reason the store was dropped, if any. */
  private storeDisabledReason: string | null = null;
  /** Summaries written during this process, newest last. */
  readonly finished: SessionSummary[] = [];

  constructor(options: SessionObserverOptions) {
    this.player = options.player;
    this.logger = options.logger;
    this.store = options.store ?? null;
    this.wallClock = options.wallClock ?? (() => Date.now());
    this.best = this.withStore('read high score', (store) => store.getHighScore(this.player)) ?? 0;
  }

  /** Best score seen for the player, stored or from this process. */
  get highScore(): number {
    return this.best;
  }

  get isOpen(): boolean {
    return this.open;
  }

  /**
   * Start tracking a new life. Call after every engine reset.
   * @param now - Engine time in seconds.
   */
  begin(now: number): void {
    this.startedAt = now;
    this.startedAtWall = this.wallClock();
    this.lastScore = 0;
    this.lastPaused = false;
    this.foodEaten = 0;
    this.open = true;
    this.logger.info('session', `started for ${this.player}`, { highScore: this.best });
  }

  /**
   * Compare a snapshot with the previous one and react to changes.
   * @param snapshot - Snapshot returned by the engine.
   * @param now - Engine time the snapshot was taken at.
   */
  observe(snapshot: RenderableState, now: number): void {
    if (!this.open) return;

    if (snapshot.score > this.lastScore) {
      this.foodEaten += snapshot.score - this.lastScore;
      this.lastScore = snapshot.score;
      this.logger.debug('session', 'food eaten', { score: snapshot.score, length: snapshot.length });
      this.submit(snapshot.score);
    }

    if (snapshot.isPaused !== this.lastPaused) {
      this.lastPaused = snapshot.isPaused;
      this.logger.info('session', snapshot.isPaused ? 'pointer lost, paused' : 'pointer back, resumed');
    }

    if (snapshot.isOver) {
      this.close(now, 'collision', snapshot.score);
    }
  }

  /**
   * Close a session that ended without a collision.
   * @param now - Engine time in seconds.
   */
  finish(now: number): SessionSummary | null {
    if (!this.open) return null;
    return this.close(now, 'abandoned', this.lastScore);
  }

  private close(now: number, outcome: SessionOutcome, score: number): SessionSummary {
    this.open = false;
    const summary: SessionSummary = {
      player: this.player,
      startedAt: this.startedAtWall,
      endedAt: this.wallClock(),
      durationSec: Math.max(0, now - this.startedAt),
      score,
      foodEaten: this.foodEaten,
      outcome
    };
    this.finished.push(summary);
    this.submit(score);
    this.withStore('record session', (store) => store.recordSession(summary));
    this.logger.info('session', outcome === 'collision' ? 'game over' : 'session abandoned', {
      score,
      durationSec: Number(summary.durationSec.toFixed(2)),
      highScore: this.best
    });
    return summary;
  }

  private submit(score: number): void {
    if (score <= this.best) return;
    this.best = score;
    const stored = this.withStore('submit score', (store) => store.submitScore(this.player, score));
    if (stored) this.logger.info('session', 'new high score', { score });
  }

  /** Run a store call, logging failures instead of raising them. */
  private withStore<T>(label: string, fn: (store: ScoreStore) => T): T | undefined {
    if (!this.store) return undefined;
    try {
      return fn(this.store);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (isSqliteFullError(err)) {
        this.disableStore('disk full', message);
      } else {
        this.logger.warn('store', `${label} failed: ${message}`);
      }
      return undefined;
    }
  }

  private disableStore(reason: string, detail: string): void {
    if (this.storeDisabledReason) return;
    this.storeDisabledReason = reason;
    this.store = null;
    this.logger.warn('store', `disabled (${reason}): ${detail}`);
  }
}
