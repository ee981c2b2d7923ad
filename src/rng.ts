/** Seedable RNG helpers so food placement can be replayed. */

/** Random source returning a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Normalize a number into an unsigned 32-bit integer.
 * @param value - Input value to normalize.
 * @returns Unsigned 32-bit integer.
 */
export function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return (Math.floor(value) >>> 0);
}

/**
 * Create a deterministic xorshift RNG from a 32-bit seed.
 * @param seed - Seed value; zero is remapped to 1.
 * @returns Random source function returning [0,1).
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

/**
 * Pick one element uniformly at random.
 * @param items - Candidates to choose from.
 * @param rng - Random source.
 * @returns Chosen element, or undefined for an empty list.
 */
export function pickOne<T>(items: readonly T[], rng: RandomSource): T | undefined {
  if (!items.length) return undefined;
  const idx = Math.min(items.length - 1, Math.floor(rng() * items.length));
  return items[idx];
}
