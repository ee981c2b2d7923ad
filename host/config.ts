import fs from 'node:fs';
import path from 'node:path';
import { parse as parseToml } from 'smol-toml';
import type { BoardMargins, EngineConfigInput } from '../src/config.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface HostConfig {
  pollRateHz: number;
  logLevel: LogLevel;
  dbPath: string;
  player: string;
  tracePath?: string;
  realtime: boolean;
  render: boolean;
  seed?: number;
  /** Engine overrides; validated by the engine itself. */
  engine: EngineConfigInput;
}

export const DEFAULT_CONFIG: HostConfig = {
  pollRateHz: 33,
  logLevel: 'info',
  dbPath: './data/scores.db',
  player: 'guest',
  realtime: false,
  render: false,
  engine: {}
};

/** Loosely typed input before normalization. */
export type HostConfigInput = Partial<Omit<HostConfig, 'engine' | 'logLevel'>> & {
  logLevel?: string;
  engine?: Record<string, unknown>;
};

type Env = Record<string, string | undefined>;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Engine keys accepted from TOML and flags, all numeric. */
const ENGINE_NUMBER_KEYS = [
  'pixelWidth',
  'pixelHeight',
  'cellSize',
  'foodSize',
  'tickInterval',
  'deadzoneFraction',
  'signalLossWindow',
  'maxCatchUpSteps',
  'growthPerFood',
  'eatFlashSeconds'
] as const;

const MARGIN_KEYS = ['left', 'right', 'top', 'bottom'] as const;

/** Leading integer of a number or numeric string, if it has one. */
function readInt(raw: unknown): number | undefined {
  const parsed =
    typeof raw === 'number'
      ? Math.floor(raw)
      : typeof raw === 'string'
      ? Number.parseInt(raw, 10)
      : Number.NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Value of `--flag value` or `--flag=value`; the first occurrence wins. */
function argValue(argv: readonly string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const idx = argv.findIndex((arg) => arg === flag || arg.startsWith(prefix));
  const arg = argv[idx];
  if (arg === undefined) return undefined;
  return arg === flag ? argv[idx + 1] : arg.slice(prefix.length);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Integer setting bounded to [min, max]. Fractions are floored; anything
 * that changes the given value is reported.
 */
function boundedInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: (msg: string) => void
): number {
  if (value === undefined || value === null) return fallback;
  const whole = readInt(value);
  if (whole === undefined) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const bounded = Math.max(min, Math.min(max, whole));
  const given = typeof value === 'number' ? value : whole;
  if (bounded !== given) {
    warn?.(`${name} was clamped to ${bounded}.`);
  }
  return bounded;
}

/**
 * Coerce a raw value to a number without range checks. Strings are parsed
 * as floats; anything unparseable is reported and dropped.
 */
function coerceNumber(name: string, value: unknown, warn?: (msg: string) => void): number | undefined {
  if (value === undefined || value === null) return undefined;
  const parsed =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim()
      ? Number(value)
      : Number.NaN;
  if (Number.isNaN(parsed)) {
    warn?.(`engine.${name} is not a number; ignoring.`);
    return undefined;
  }
  return parsed;
}

/**
 * Strip a player name down to a filesystem- and log-safe key.
 * @param raw - Name as typed.
 * @returns Sanitised key, "guest" when nothing usable remains.
 */
export function sanitizePlayer(raw: string | undefined): string {
  const cleaned = (raw ?? '').trim().replace(/[^A-Za-z0-9_-]+/g, '_').slice(0, 30);
  return cleaned && cleaned !== '_' ? cleaned : DEFAULT_CONFIG.player;
}

/**
 * Pull engine overrides out of a loose table. Only type coercion happens
 * here; ranges are the engine's call.
 */
export function normalizeEngineInput(
  raw: Record<string, unknown> | undefined,
  warn?: (msg: string) => void
): EngineConfigInput {
  const output: EngineConfigInput = {};
  if (!raw) return output;
  for (const key of ENGINE_NUMBER_KEYS) {
    const value = coerceNumber(key, raw[key], warn);
    if (value !== undefined) output[key] = value;
  }
  const rawMargins = raw['margins'];
  if (isRecord(rawMargins)) {
    const margins: Partial<BoardMargins> = {};
    for (const side of MARGIN_KEYS) {
      const value = coerceNumber(`margins.${side}`, rawMargins[side], warn);
      if (value !== undefined) margins[side] = value;
    }
    output.margins = margins;
  }
  return output;
}

export function normalizeConfig(
  input: HostConfigInput,
  warn?: (msg: string) => void
): HostConfig {
  const pollRateHz = boundedInt(
    'pollRateHz',
    input.pollRateHz,
    DEFAULT_CONFIG.pollRateHz,
    1,
    240,
    warn
  );
  let logLevel = DEFAULT_CONFIG.logLevel;
  if (input.logLevel && isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel) {
    warn?.(`logLevel "${input.logLevel}" is invalid; using ${logLevel}.`);
  }
  const rawDbPath = input.dbPath;
  const dbPath = rawDbPath && rawDbPath.trim() ? rawDbPath : DEFAULT_CONFIG.dbPath;
  if (rawDbPath !== undefined && (!rawDbPath || !rawDbPath.trim())) {
    warn?.(`dbPath is invalid; using ${dbPath}.`);
  }
  const player = sanitizePlayer(input.player);
  if (input.player !== undefined && player !== input.player) {
    warn?.(`player was normalized to "${player}".`);
  }

  const seed = readInt(input.seed);
  if (input.seed !== undefined && seed === undefined) warn?.('seed is invalid; ignoring.');

  const output: HostConfig = {
    pollRateHz,
    logLevel,
    dbPath,
    player,
    realtime: input.realtime === true,
    render: input.render === true,
    engine: normalizeEngineInput(input.engine, warn)
  };
  if (input.tracePath && input.tracePath.trim()) output.tracePath = input.tracePath;
  if (seed !== undefined) output.seed = seed;
  return output;
}

/**
 * Read the TOML config file. A missing or empty file is not an error.
 * @param filePath - Absolute or cwd-relative path.
 * @param warn - Receives parse failures.
 * @returns Raw table, empty on any failure.
 */
export function loadTomlConfig(filePath: string, warn?: (msg: string) => void): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf8');
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = parseToml(raw);
    return isRecord(parsed) ? parsed : {};
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`Failed to parse ${filePath}: ${message}`);
    return {};
  }
}

/** Map snake_case and camelCase TOML keys onto host fields. */
function fromToml(table: Record<string, unknown>): HostConfigInput {
  const input: HostConfigInput = {};
  const pick = (...keys: string[]): unknown => {
    for (const key of keys) {
      if (table[key] !== undefined) return table[key];
    }
    return undefined;
  };
  const pollRate = pick('pollRateHz', 'poll_rate_hz');
  if (typeof pollRate === 'number' || typeof pollRate === 'string') input.pollRateHz = Number(pollRate);
  const logLevel = pick('logLevel', 'log_level');
  if (typeof logLevel === 'string') input.logLevel = logLevel;
  const dbPath = pick('dbPath', 'db_path');
  if (typeof dbPath === 'string') input.dbPath = dbPath;
  const player = pick('player');
  if (typeof player === 'string') input.player = player;
  const seed = pick('seed');
  if (typeof seed === 'number') input.seed = seed;
  const engine = pick('engine');
  if (isRecord(engine)) input.engine = engine;
  return input;
}

/**
 * Resolve host configuration from flags, environment and the TOML file,
 * in that priority order.
 * @param argv - CLI arguments without the node and script entries.
 * @param env - Process environment.
 * @param warn - Receives normalization warnings.
 * @returns Normalized configuration.
 */
export function parseConfig(
  argv: string[],
  env: Env,
  warn: (msg: string) => void = (msg) => console.warn(`[config] ${msg}`)
): HostConfig {
  const configPath = path.resolve(
    process.cwd(),
    argValue(argv, '--config') ?? env['SNAKE_CONFIG'] ?? 'snake.toml'
  );
  const input = fromToml(loadTomlConfig(configPath, warn));

  const pollRate =
    readInt(argValue(argv, '--poll-rate')) ?? readInt(env['POLL_RATE']);
  if (pollRate !== undefined) input.pollRateHz = pollRate;
  const logLevel = argValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  const dbPath = argValue(argv, '--db-path') ?? env['DB_PATH'];
  if (dbPath) input.dbPath = dbPath;
  const player = argValue(argv, '--player') ?? env['SNAKE_PLAYER'];
  if (player) input.player = player;
  const seed = readInt(argValue(argv, '--seed')) ?? readInt(env['SNAKE_SEED']);
  if (seed !== undefined) input.seed = seed;
  const tracePath = argValue(argv, '--trace') ?? env['SNAKE_TRACE'];
  if (tracePath) input.tracePath = tracePath;
  if (hasFlag(argv, '--realtime')) input.realtime = true;
  if (hasFlag(argv, '--render')) input.render = true;

  const engine: Record<string, unknown> = { ...(input.engine ?? {}) };
  const cellSize = argValue(argv, '--cell-size');
  if (cellSize !== undefined) engine['cellSize'] = cellSize;
  const tick = argValue(argv, '--tick');
  if (tick !== undefined) engine['tickInterval'] = tick;
  const width = argValue(argv, '--width');
  if (width !== undefined) engine['pixelWidth'] = width;
  const height = argValue(argv, '--height');
  if (height !== undefined) engine['pixelHeight'] = height;
  input.engine = engine;

  return normalizeConfig(input, warn);
}
