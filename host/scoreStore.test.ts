import { describe, it, expect, beforeEach } from 'vitest';
import { createScoreStore, initDb, type ScoreStore, type SessionSummary } from './scoreStore.ts';

/** Test suite label for the score store. */
const SUITE = 'scoreStore';

function session(overrides: Partial<SessionSummary> = {}): SessionSummary {
  return {
    player: 'ann',
    startedAt: 1_000,
    endedAt: 31_000,
    durationSec: 30,
    score: 4,
    foodEaten: 4,
    outcome: 'collision',
    ...overrides
  };
}

describe(SUITE, () => {
  let db: ReturnType<typeof initDb>;
  let store: ScoreStore;

  beforeEach(() => {
    db = initDb(':memory:');
    store = createScoreStore(db);
  });

  it('creates its tables', () => {
    const tables = db
      .prepare(`SELECT name FROM sqlite_master WHERE type='table' ORDER BY name`)
      .all() as Array<{ name: string }>;
    expect(tables.map((row) => row.name)).toEqual(['high_scores', 'sessions']);
  });

  it('keeps only the best score per player', () => {
    expect(store.getHighScore('ann')).toBe(0);
    expect(store.submitScore('ann', 0)).toBe(false);
    expect(store.submitScore('ann', 3)).toBe(true);
    expect(store.submitScore('ann', 2)).toBe(false);
    expect(store.submitScore('ann', 3)).toBe(false);
    expect(store.getHighScore('ann')).toBe(3);
    expect(store.submitScore('ann', 7)).toBe(true);
    expect(store.getHighScore('ann')).toBe(7);
  });

  it('ignores invalid scores', () => {
    expect(store.submitScore('ann', -1)).toBe(false);
    expect(store.submitScore('ann', Number.NaN)).toBe(false);
    expect(store.getHighScore('ann')).toBe(0);
  });

  it('ranks players by best score', () => {
    store.submitScore('ann', 3);
    store.submitScore('bob', 5);
    store.submitScore('cy', 1);
    const top = store.topScores(2);
    expect(top.map((row) => [row.player, row.best])).toEqual([
      ['bob', 5],
      ['ann', 3]
    ]);
  });

  it('records sessions newest first', () => {
    const first = store.recordSession(session());
    const second = store.recordSession(session({ score: 9, foodEaten: 9, outcome: 'abandoned' }));
    store.recordSession(session({ player: 'bob' }));
    expect(second).toBeGreaterThan(first);

    const rows = store.listSessions('ann', 10);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({ id: second, ...session({ score: 9, foodEaten: 9, outcome: 'abandoned' }) });
    expect(rows[1]?.id).toBe(first);
    expect(store.listSessions('ann', 1)).toHaveLength(1);
  });

  it('rejects a session with a negative score', () => {
    expect(() => store.recordSession(session({ score: -2 }))).toThrow('recordSession: invalid score -2');
  });
});
