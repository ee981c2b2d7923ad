import type { RenderableState } from '../src/protocol/state.ts';

/** Glyphs used by the text renderer. */
const GLYPH = {
  empty: '.',
  food: '*',
  body: 'o',
  head: '@'
} as const;

/**
 * Draw a snapshot as a character grid followed by a status line.
 * Food is drawn first so the snake covers it where they overlap.
 */
export function renderText(snapshot: RenderableState): string {
  const { gridWidth, gridHeight } = snapshot;
  const rows: string[][] = [];
  for (let r = 0; r < gridHeight; r++) rows.push(new Array<string>(gridWidth).fill(GLYPH.empty));

  const put = (col: number, row: number, glyph: string) => {
    const line = rows[row];
    if (!line || col < 0 || col >= gridWidth) return;
    line[col] = glyph;
  };

  const { foodTopLeft, foodSize } = snapshot;
  for (let i = 0; i < foodSize; i++) {
    for (let j = 0; j < foodSize; j++) put(foodTopLeft.col + i, foodTopLeft.row + j, GLYPH.food);
  }
  snapshot.body.forEach((cell, idx) => put(cell.col, cell.row, idx === 0 ? GLYPH.head : GLYPH.body));

  let status = `score ${snapshot.score}  length ${snapshot.length}`;
  if (snapshot.isOver) status += '  GAME OVER';
  else if (snapshot.isPaused) status += '  PAUSED (pointer lost)';
  return [...rows.map((line) => line.join('')), status].join('\n');
}
