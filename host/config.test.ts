import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import {
  DEFAULT_CONFIG,
  normalizeConfig,
  normalizeEngineInput,
  parseConfig,
  sanitizePlayer
} from './config.ts';

describe('config', () => {
  let dir = '';
  let missing = '';

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pointer-snake-config-'));
    missing = path.join(dir, 'missing.toml');
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('uses defaults for empty input', () => {
    expect(normalizeConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('clamps the poll rate with a warning', () => {
    const warnings: string[] = [];
    const cfg = normalizeConfig({ pollRateHz: 1000 }, (msg) => warnings.push(msg));
    expect(cfg.pollRateHz).toBe(240);
    expect(warnings).toEqual(['pollRateHz was clamped to 240.']);
  });

  it('floors a fractional poll rate and rejects a non-numeric one', () => {
    const warnings: string[] = [];
    expect(normalizeConfig({ pollRateHz: 33.5 }, (msg) => warnings.push(msg)).pollRateHz).toBe(33);
    expect(normalizeConfig({ pollRateHz: Number.NaN }, (msg) => warnings.push(msg)).pollRateHz).toBe(33);
    expect(warnings).toEqual(['pollRateHz was clamped to 33.', 'pollRateHz is invalid; using 33.']);
  });

  it('reads both flag forms and keeps the first occurrence', () => {
    const cfg = parseConfig(
      ['--poll-rate=50', '--seed', '12x', '--player', 'first', '--player=second', '--config', missing],
      {},
      () => {}
    );
    expect(cfg.pollRateHz).toBe(50);
    expect(cfg.seed).toBe(12);
    expect(cfg.player).toBe('first');
  });

  it('falls back on an unknown log level', () => {
    const warnings: string[] = [];
    const cfg = parseConfig(['--log', 'loud', '--config', missing], {}, (msg) => warnings.push(msg));
    expect(cfg.logLevel).toBe('info');
    expect(warnings).toEqual(['logLevel "loud" is invalid; using info.']);
  });

  it('sanitizes player names', () => {
    expect(sanitizePlayer(' ann marie! ')).toBe('ann_marie_');
    expect(sanitizePlayer('!!!')).toBe('guest');
    expect(sanitizePlayer(undefined)).toBe('guest');
    expect(sanitizePlayer('x'.repeat(40))).toHaveLength(30);
  });

  it('coerces engine overrides without range checks', () => {
    const warnings: string[] = [];
    const engine = normalizeEngineInput(
      { cellSize: '20', tickInterval: 0.1, growthPerFood: -3, margins: { bottom: '300', left: 'x' }, extra: 1 },
      (msg) => warnings.push(msg)
    );
    expect(engine).toEqual({ cellSize: 20, tickInterval: 0.1, growthPerFood: -3, margins: { bottom: 300 } });
    expect(warnings).toEqual(['engine.margins.left is not a number; ignoring.']);
  });

  it('layers flags over env over the TOML file', () => {
    const file = path.join(dir, 'layered.toml');
    fs.writeFileSync(
      file,
      [
        'poll_rate_hz = 20',
        'player = "toml_player"',
        'seed = 9',
        '',
        '[engine]',
        'cellSize = 30',
        'tickInterval = 0.1',
        '',
        '[engine.margins]',
        'bottom = 250'
      ].join('\n')
    );
    const cfg = parseConfig(
      ['--player', 'cli_player', '--cell-size=12', '--realtime'],
      { SNAKE_CONFIG: file, POLL_RATE: '25' },
      () => {}
    );
    expect(cfg.pollRateHz).toBe(25);
    expect(cfg.player).toBe('cli_player');
    expect(cfg.seed).toBe(9);
    expect(cfg.realtime).toBe(true);
    expect(cfg.render).toBe(false);
    expect(cfg.engine).toEqual({ cellSize: 12, tickInterval: 0.1, margins: { bottom: 250 } });
  });

  it('warns and uses defaults for an unparseable TOML file', () => {
    const file = path.join(dir, 'broken.toml');
    fs.writeFileSync(file, 'poll_rate_hz = = 3\n');
    const warnings: string[] = [];
    const cfg = parseConfig(['--config', file], {}, (msg) => warnings.push(msg));
    expect(cfg.pollRateHz).toBe(DEFAULT_CONFIG.pollRateHz);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.startsWith(`Failed to parse ${file}:`)).toBe(true);
  });

  it('reads the trace path and seed from the environment', () => {
    const cfg = parseConfig(['--config', missing], { SNAKE_TRACE: 'run.jsonl', SNAKE_SEED: '77' }, () => {});
    expect(cfg.tracePath).toBe('run.jsonl');
    expect(cfg.seed).toBe(77);
  });
});
