import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import { EngineConfigError } from '../src/config.ts';
import { SnakeEngine } from '../src/engine.ts';
import type { RenderableState } from '../src/protocol/state.ts';
import { createRng } from '../src/rng.ts';
import { parseConfig, type HostConfig } from './config.ts';
import { PollLoop, replayTrace } from './driver.ts';
import { createLogger, type Logger } from './logger.ts';
import { createScoreStore, initDb, type ScoreStore } from './scoreStore.ts';
import { SessionObserver } from './sessionObserver.ts';
import { parseTrace, TracePointerSource, type TraceSample } from './trace.ts';
import { renderText } from './textRenderer.ts';

export interface ReplayResult {
  final: RenderableState | null;
  highScore: number;
  polls: number;
}

export interface ReplayDeps {
  logger: Logger;
  store?: ScoreStore | null;
  /** Receives rendered frames when `config.render` is set. */
  write?: (text: string) => void;
}

/**
 * Run one game over a recorded trace and report the outcome.
 * Synchronous unless `config.realtime` is set, in which case the trace is
 * played back through the poll loop at wall-clock speed.
 */
export async function runReplay(
  config: HostConfig,
  samples: readonly TraceSample[],
  deps: ReplayDeps
): Promise<ReplayResult> {
  const { logger } = deps;
  const write = deps.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const engine = new SnakeEngine(config.engine, {
    rng: config.seed !== undefined ? createRng(config.seed) : Math.random
  });
  logger.info('engine', `board ${engine.board.gridW}x${engine.board.gridH}`, {
    cellSize: engine.board.cellSize,
    tickInterval: engine.config.tickInterval
  });

  const observer = new SessionObserver({ player: config.player, logger, store: deps.store ?? null });
  const startAt = samples[0]?.t ?? 0;
  engine.reset(startAt);
  observer.begin(startAt);

  let polls = 0;
  let lastNow = startAt;
  const onFrame = (snapshot: RenderableState, now: number): boolean => {
    polls += 1;
    lastNow = now;
    observer.observe(snapshot, now);
    if (config.render) write(renderText(snapshot));
    return !snapshot.isOver;
  };

  let final: RenderableState | null;
  if (config.realtime) {
    const source = new TracePointerSource(samples);
    const duration = source.duration;
    final = await new Promise<RenderableState | null>((resolve) => {
      let last: RenderableState | null = null;
      const loop = new PollLoop(
        engine,
        source,
        (snapshot, now) => {
          last = snapshot;
          return onFrame(snapshot, now) && now < duration;
        },
        { pollRateHz: config.pollRateHz, epoch: startAt, onStop: () => resolve(last) }
      );
      loop.start();
    });
  } else {
    final = replayTrace(engine, samples, onFrame);
  }

  if (observer.isOpen) observer.finish(lastNow);
  logger.info('replay', 'finished', {
    polls,
    score: final?.score ?? 0,
    over: final?.isOver ?? false
  });
  return { final, highScore: observer.highScore, polls };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  if (!config.tracePath) {
    logger.error('cli', 'no trace given; pass --trace <file.jsonl> or set SNAKE_TRACE');
    process.exitCode = 1;
    return;
  }

  const samples = parseTrace(fs.readFileSync(config.tracePath, 'utf8'));
  logger.info('cli', `loaded ${samples.length} samples from ${config.tracePath}`);

  const db = initDb(config.dbPath);
  try {
    const store = createScoreStore(db);
    const result = await runReplay(config, samples, { logger, store });
    logger.info('cli', `score ${result.final?.score ?? 0}, best ${result.highScore}`);
  } catch (err) {
    if (err instanceof EngineConfigError) {
      logger.error('config', err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    db.close();
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
