import { describe, it, expect } from 'vitest';
import { createRng, pickOne, toUint32 } from './rng.ts';

describe('rng.ts', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
    for (const value of seqA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('remaps a zero seed so the generator does not stall', () => {
    const rng = createRng(0);
    expect(rng()).not.toBe(0);
  });

  it('normalizes seeds to uint32', () => {
    expect(toUint32(-1)).toBe(0xffffffff);
    expect(toUint32(Number.NaN)).toBe(0);
    expect(toUint32(3.9)).toBe(3);
  });

  it('picks within bounds', () => {
    const items = ['a', 'b', 'c'];
    expect(pickOne(items, () => 0)).toBe('a');
    expect(pickOne(items, () => 0.5)).toBe('b');
    expect(pickOne(items, () => 0.9999)).toBe('c');
    expect(pickOne([], () => 0.5)).toBeUndefined();
  });
});
