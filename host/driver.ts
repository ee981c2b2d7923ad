import { performance } from 'node:perf_hooks';
import type { Pixel, RenderableState } from '../src/protocol/state.ts';
import type { TraceSample } from './trace.ts';

/** Minimal engine surface the drivers need. */
export interface SteppableEngine {
  update: (now: number, pointer: Pixel | null) => RenderableState;
}

/** Produces the pointer for a poll at engine time `now`. */
export interface PointerSource {
  poll: (now: number) => Pixel | null;
}

/** Receives each snapshot; return false to stop the loop. */
export type FrameHandler = (snapshot: RenderableState, now: number) => boolean | void;

export interface PollLoopOptions {
  pollRateHz: number;
  /** Monotonic clock in milliseconds. */
  clock?: () => number;
  /** Engine time of the first poll, in seconds. */
  epoch?: number;
  onStop?: () => void;
}

/**
 * Fixed-rate poll loop. Each poll reads the pointer source and feeds the
 * engine; the engine decides how many logical ticks that poll covers.
 */
export class PollLoop {
  private readonly engine: SteppableEngine;
  private readonly source: PointerSource;
  private readonly onFrame: FrameHandler;
  private readonly intervalMs: number;
  private readonly clock: () => number;
  private readonly epoch: number;
  private readonly onStop: (() => void) | undefined;
  /** Whether the loop is running. */
  private running = false;
  /** Active timer id for the next poll. */
  private timer: ReturnType<typeof setTimeout> | null = null;
  /** Target time for the next poll in ms. */
  private nextPollAt = 0;
  /** Clock reading at start; engine time is measured from here. */
  private startedAt = 0;
  /** Polls issued since start. */
  private polls = 0;

  constructor(
    engine: SteppableEngine,
    source: PointerSource,
    onFrame: FrameHandler,
    options: PollLoopOptions
  ) {
    this.engine = engine;
    this.source = source;
    this.onFrame = onFrame;
    this.intervalMs = 1000 / Math.max(1, options.pollRateHz);
    this.clock = options.clock ?? (() => performance.now());
    this.epoch = options.epoch ?? 0;
    this.onStop = options.onStop;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get pollCount(): number {
    return this.polls;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = this.clock();
    this.nextPollAt = this.startedAt;
    this.loop();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.onStop?.();
  }

  private loop(): void {
    if (!this.running) return;
    const nowMs = this.clock();
    if (nowMs >= this.nextPollAt) {
      this.poll(nowMs);
      if (!this.running) return;
      this.nextPollAt += this.intervalMs;
    }
    const delay = Math.max(0, this.nextPollAt - nowMs);
    this.timer = setTimeout(() => this.loop(), delay);
  }

  private poll(nowMs: number): void {
    const now = this.epoch + (nowMs - this.startedAt) / 1000;
    this.polls += 1;
    const snapshot = this.engine.update(now, this.source.poll(now));
    if (this.onFrame(snapshot, now) === false) this.stop();
  }
}

/**
 * Drive an engine through a recorded trace using the trace's own
 * timestamps, synchronously.
 * @param engine - Engine to feed.
 * @param samples - Recorded polls in time order.
 * @param onFrame - Optional per-snapshot callback; false stops early.
 * @returns Last snapshot produced, or null for an empty trace.
 */
export function replayTrace(
  engine: SteppableEngine,
  samples: readonly TraceSample[],
  onFrame?: FrameHandler
): RenderableState | null {
  let last: RenderableState | null = null;
  for (const sample of samples) {
    last = engine.update(sample.t, sample.pointer);
    if (onFrame && onFrame(last, sample.t) === false) break;
  }
  return last;
}
