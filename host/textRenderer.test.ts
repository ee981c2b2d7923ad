import { describe, it, expect } from 'vitest';
import type { RenderableState } from '../src/protocol/state.ts';
import { renderText } from './textRenderer.ts';

function frame(overrides: Partial<RenderableState> = {}): RenderableState {
  return {
    body: [
      { col: 2, row: 1 },
      { col: 1, row: 1 }
    ],
    foodTopLeft: { col: 3, row: 2 },
    foodSize: 2,
    score: 4,
    isOver: false,
    isPaused: false,
    direction: { dx: 1, dy: 0 },
    gridWidth: 5,
    gridHeight: 4,
    length: 2,
    eating: false,
    ...overrides
  };
}

describe('textRenderer', () => {
  it('draws head, body and food', () => {
    expect(renderText(frame())).toBe(['.....', '.o@..', '...**', '...**', 'score 4  length 2'].join('\n'));
  });

  it('draws the snake over overlapping food', () => {
    const text = renderText(frame({ foodTopLeft: { col: 1, row: 1 }, foodSize: 1 }));
    expect(text.split('\n')[1]).toBe('.o@..');
  });

  it('marks paused and finished games', () => {
    expect(renderText(frame({ isPaused: true })).split('\n')[4]).toBe('score 4  length 2  PAUSED (pointer lost)');
    expect(renderText(frame({ isOver: true, isPaused: true })).split('\n')[4]).toBe(
      'score 4  length 2  GAME OVER'
    );
  });
});
