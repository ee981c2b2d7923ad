// direction.ts
// Turns a continuous pointer position into one of eight grid directions.

import type { Direction, Pixel } from './protocol/state.ts';
import { axisStep } from './utils.ts';

/** The eight unit moves, row-major from the top-left. */
export const DIRECTIONS: readonly Direction[] = [
  { dx: -1, dy: -1 },
  { dx: 0, dy: -1 },
  { dx: 1, dy: -1 },
  { dx: -1, dy: 0 },
  { dx: 1, dy: 0 },
  { dx: -1, dy: 1 },
  { dx: 0, dy: 1 },
  { dx: 1, dy: 1 }
];

export const RIGHT: Direction = { dx: 1, dy: 0 };

export function sameDirection(a: Direction, b: Direction): boolean {
  return a.dx === b.dx && a.dy === b.dy;
}

/** True when `candidate` is the exact 180° turn of `current`. */
export function isReverse(candidate: Direction, current: Direction): boolean {
  return candidate.dx === -current.dx && candidate.dy === -current.dy;
}

/**
 * Resolve a pointer sample into a direction request.
 *
 * Inside the deadzone around the head nothing changes, which keeps jitter
 * near the head from flipping direction. Outside it each axis is classified
 * on its own with the same threshold, so a pointer far off both axes yields
 * a diagonal. A request that would reverse the snake onto its neck is
 * dropped.
 *
 * @param head - Pixel centre of the head cell.
 * @param pointer - Pointer sample.
 * @param current - Direction of the last move.
 * @param deadzone - Minimum per-axis pixel distance.
 * @returns New pending direction, or null for no change.
 */
export function resolveDirection(
  head: Pixel,
  pointer: Pixel,
  current: Direction,
  deadzone: number
): Direction | null {
  const dx = pointer.x - head.x;
  const dy = pointer.y - head.y;
  if (!Number.isFinite(dx) || !Number.isFinite(dy)) return null;
  if (Math.abs(dx) < deadzone && Math.abs(dy) < deadzone) return null;

  const candidate: Direction = { dx: axisStep(dx, deadzone), dy: axisStep(dy, deadzone) };
  if (candidate.dx === 0 && candidate.dy === 0) return null;
  if (isReverse(candidate, current)) return null;
  return candidate;
}
