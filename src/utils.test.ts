import { describe, it, expect } from 'vitest';
import { axisStep, cellKey, keyOf } from './utils.ts';

describe('utils.ts', () => {
  it('axisStep zeroes distances strictly inside the threshold', () => {
    expect(axisStep(-3, 5.5)).toBe(0);
    expect(axisStep(5.4, 5.5)).toBe(0);
    expect(axisStep(5.5, 5.5)).toBe(1);
    expect(axisStep(-6, 5.5)).toBe(-1);
  });

  it('axisStep with a zero threshold keeps the sign', () => {
    expect(axisStep(0.001, 0)).toBe(1);
    expect(axisStep(-0.001, 0)).toBe(-1);
  });

  it('builds the same key from coordinates and cells', () => {
    expect(cellKey(3, 12)).toBe('3,12');
    expect(keyOf({ col: 3, row: 12 })).toBe('3,12');
  });
});
