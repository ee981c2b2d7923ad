import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { Pixel } from '../src/protocol/state.ts';
import { DEFAULT_CONFIG, type HostConfig } from './config.ts';
import { runReplay } from './index.ts';
import { createLogger, type Logger } from './logger.ts';
import { createScoreStore, initDb, type ScoreStore } from './scoreStore.ts';
import type { TraceSample } from './trace.ts';

/** 20x15 board of 10px cells; the head starts at (10,7) heading right. */
const config: HostConfig = {
  ...DEFAULT_CONFIG,
  player: 'tester',
  seed: 7,
  engine: {
    pixelWidth: 200,
    pixelHeight: 150,
    margins: { left: 0, right: 0, top: 0, bottom: 0 },
    cellSize: 10,
    tickInterval: 0.125
  }
};

const RIGHT_EDGE: Pixel = { x: 199, y: 75 };

function steadyTrace(until: number, pointer: Pixel | null): TraceSample[] {
  const samples: TraceSample[] = [];
  for (let k = 0; k * 0.125 <= until; k++) samples.push({ t: k * 0.125, pointer });
  return samples;
}

describe('replay', () => {
  let db: Database.Database;
  let store: ScoreStore;
  let logger: Logger;
  let lines: string[];

  beforeEach(() => {
    db = initDb(':memory:');
    store = createScoreStore(db);
    lines = [];
    logger = createLogger('info', (line) => lines.push(line));
  });

  afterEach(() => {
    db.close();
  });

  it('runs into the wall and records the collision', async () => {
    const result = await runReplay(config, steadyTrace(2, RIGHT_EDGE), { logger, store });

    // ten steps from column 10 reach past column 19 at t = 1.25
    expect(result.polls).toBe(11);
    expect(result.final?.isOver).toBe(true);
    expect(result.final?.body[0]).toEqual({ col: 19, row: 7 });
    expect(result.highScore).toBe(result.final?.score);

    const sessions = store.listSessions('tester', 10);
    expect(sessions).toHaveLength(1);
    expect(sessions[0]?.outcome).toBe('collision');
    expect(sessions[0]?.durationSec).toBe(1.25);
    expect(store.getHighScore('tester')).toBe(result.final?.score);
  });

  it('ends a trace that loses the pointer as an abandoned, paused session', async () => {
    const frames: string[] = [];
    const samples: TraceSample[] = [
      { t: 0, pointer: RIGHT_EDGE },
      { t: 0.5, pointer: null },
      { t: 1, pointer: null }
    ];
    const result = await runReplay({ ...config, render: true }, samples, {
      logger,
      store,
      write: (text) => frames.push(text)
    });

    expect(result.polls).toBe(3);
    expect(result.final?.isPaused).toBe(true);
    // the 0.5 s gap is four ticks, capped at three
    expect(result.final?.body[0]).toEqual({ col: 13, row: 7 });
    expect(frames).toHaveLength(3);
    expect(frames[2]?.split('\n').at(-1)).toMatch(/ {2}PAUSED \(pointer lost\)$/);

    const sessions = store.listSessions('tester', 10);
    expect(sessions.map((s) => [s.outcome, s.durationSec])).toEqual([['abandoned', 1]]);
    expect(lines.some((line) => line.endsWith('| session | pointer lost, paused'))).toBe(true);
  });
});
