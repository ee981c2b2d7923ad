import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

/** How a recorded session ended. */
export type SessionOutcome = 'collision' | 'abandoned';

export interface SessionSummary {
  player: string;
  /** Epoch milliseconds. */
  startedAt: number;
  /** Epoch milliseconds. */
  endedAt: number;
  durationSec: number;
  score: number;
  foodEaten: number;
  outcome: SessionOutcome;
}

export interface SessionRow extends SessionSummary {
  id: number;
}

export interface HighScoreRow {
  player: string;
  best: number;
  updatedAt: number;
}

export interface ScoreStore {
  getHighScore: (player: string) => number;
  /** Returns true when the score beat the stored best. */
  submitScore: (player: string, score: number) => boolean;
  recordSession: (summary: SessionSummary) => number;
  listSessions: (player: string, limit: number) => SessionRow[];
  topScores: (limit: number) => HighScoreRow[];
}

type DbType = ReturnType<typeof Database>;

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS high_scores (
  player TEXT PRIMARY KEY,
  best INTEGER NOT NULL,
  updated_at INTEGER
);

CREATE TABLE IF NOT EXISTS sessions (
  id INTEGER PRIMARY KEY,
  player TEXT,
  started_at INTEGER,
  ended_at INTEGER,
  duration_sec REAL,
  score INTEGER,
  food_eaten INTEGER,
  outcome TEXT
);

CREATE INDEX IF NOT EXISTS idx_sessions_player ON sessions(player);
`;

interface SessionDbRow {
  id: number;
  player: string;
  started_at: number;
  ended_at: number;
  duration_sec: number;
  score: number;
  food_eaten: number;
  outcome: string;
}

interface HighScoreDbRow {
  player: string;
  best: number;
  updated_at: number;
}

function isValidScore(score: number): boolean {
  return Number.isFinite(score) && score >= 0;
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return 10;
  return Math.max(1, Math.min(1000, Math.floor(limit)));
}

export function initDb(dbPath: string): DbType {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.exec(SCHEMA_SQL);
  return db;
}

export function createScoreStore(db: DbType): ScoreStore {
  const selectBest = db.prepare(`SELECT best FROM high_scores WHERE player = ?`);
  const upsertBest = db.prepare(
    `INSERT INTO high_scores (player, best, updated_at)
     VALUES (@player, @best, @updated_at)
     ON CONFLICT(player) DO UPDATE SET best = excluded.best, updated_at = excluded.updated_at
     WHERE excluded.best > high_scores.best`
  );
  const insertSession = db.prepare(
    `INSERT INTO sessions (player, started_at, ended_at, duration_sec, score, food_eaten, outcome)
     VALUES (@player, @started_at, @ended_at, @duration_sec, @score, @food_eaten, @outcome)`
  );
  const listSessionsStmt = db.prepare(
    `SELECT id, player, started_at, ended_at, duration_sec, score, food_eaten, outcome
     FROM sessions WHERE player = ? ORDER BY id DESC LIMIT ?`
  );
  const topScoresStmt = db.prepare(
    `SELECT player, best, updated_at FROM high_scores ORDER BY best DESC, updated_at ASC LIMIT ?`
  );

  const getHighScore = (player: string): number => {
    const row = selectBest.get(player) as { best: number } | undefined;
    return row?.best ?? 0;
  };

  const submitScore = (player: string, score: number): boolean => {
    if (!isValidScore(score)) return false;
    const best = Math.floor(score);
    const result = upsertBest.run({ player, best, updated_at: Date.now() });
    return result.changes > 0 && best > 0;
  };

  const recordSession = (summary: SessionSummary): number => {
    if (!isValidScore(summary.score)) {
      throw new Error(`recordSession: invalid score ${summary.score}`);
    }
    const result = insertSession.run({
      player: summary.player,
      started_at: summary.startedAt,
      ended_at: summary.endedAt,
      duration_sec: Math.max(0, summary.durationSec),
      score: Math.floor(summary.score),
      food_eaten: Math.max(0, Math.floor(summary.foodEaten)),
      outcome: summary.outcome
    });
    return Number(result.lastInsertRowid);
  };

  const listSessions = (player: string, limit: number): SessionRow[] => {
    const rows = listSessionsStmt.all(player, clampLimit(limit)) as SessionDbRow[];
    return rows.map((row) => ({
      id: row.id,
      player: row.player,
      startedAt: row.started_at,
      endedAt: row.ended_at,
      durationSec: row.duration_sec,
      score: row.score,
      foodEaten: row.food_eaten,
      outcome: row.outcome === 'collision' ? 'collision' : 'abandoned'
    }));
  };

  const topScores = (limit: number): HighScoreRow[] => {
    const rows = topScoresStmt.all(clampLimit(limit)) as HighScoreDbRow[];
    return rows.map((row) => ({ player: row.player, best: row.best, updatedAt: row.updated_at }));
  };

  return { getHighScore, submitScore, recordSession, listSessions, topScores };
}
