import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.ts';

describe('logger', () => {
  it('drops lines below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));
    logger.debug('engine', 'tick');
    logger.info('engine', 'started');
    logger.warn('store', 'slow write');
    logger.error('store', 'failed');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \| warn \| store \| slow write$/);
    expect(lines[1]).toMatch(/ \| error \| store \| failed$/);
  });

  it('appends structured fields as JSON', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', (line) => lines.push(line));
    logger.info('session', 'food eaten', { score: 2, length: 5 });
    logger.info('session', 'no fields', {});
    expect(lines[0]).toMatch(/ \| info \| session \| food eaten \{"score":2,"length":5\}$/);
    expect(lines[1]).toMatch(/ \| info \| session \| no fields$/);
  });
});
