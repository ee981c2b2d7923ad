import type { Pixel } from '../src/protocol/state.ts';
import type { PointerSource } from './driver.ts';

/** One recorded poll: a timestamp and the pointer, or null for no detection. */
export interface TraceSample {
  t: number;
  pointer: Pixel | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parse a JSON-lines pointer trace.
 *
 * Each non-blank line is `{"t": s, "x": px, "y": px}`; omitting x/y or
 * setting them to null records a poll with nothing detected. Lines starting
 * with `#` are comments.
 *
 * @param text - Trace file contents.
 * @returns Samples in file order.
 * @throws Error naming the first malformed line.
 */
export function parseTrace(text: string): TraceSample[] {
  const samples: TraceSample[] = [];
  const lines = text.split(/\r?\n/);
  let lastT = Number.NEGATIVE_INFINITY;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim() ?? '';
    if (!line || line.startsWith('#')) continue;
    const lineNo = i + 1;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      throw new Error(`trace line ${lineNo}: not valid JSON`);
    }
    if (!isRecord(parsed)) throw new Error(`trace line ${lineNo}: expected an object`);
    const t = parsed['t'];
    if (typeof t !== 'number' || !Number.isFinite(t)) {
      throw new Error(`trace line ${lineNo}: "t" must be a finite number`);
    }
    if (t < lastT) throw new Error(`trace line ${lineNo}: timestamps must not decrease`);
    lastT = t;

    const x = parsed['x'];
    const y = parsed['y'];
    let pointer: Pixel | null = null;
    if (x != null || y != null) {
      if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
        throw new Error(`trace line ${lineNo}: "x" and "y" must both be finite numbers or both absent`);
      }
      pointer = { x, y };
    }
    samples.push({ t, pointer });
  }
  return samples;
}

/** Answers "where was the pointer at time t" from a recorded trace. */
export class TracePointerSource implements PointerSource {
  private readonly samples: readonly TraceSample[];
  /** Index of the last sample returned; lookups only move forward. */
  private cursor = -1;

  constructor(samples: readonly TraceSample[]) {
    this.samples = samples;
  }

  /** Time of the last sample, or 0 for an empty trace. */
  get duration(): number {
    return this.samples[this.samples.length - 1]?.t ?? 0;
  }

  /**
   * Latest sample at or before `t`. Queries are expected in
   * non-decreasing time order; an earlier time rewinds the cursor.
   * @returns Pointer position, or null before the first sample or when
   *   nothing was detected.
   */
  poll(t: number): Pixel | null {
    const current = this.samples[this.cursor];
    if (current && current.t > t) this.cursor = -1;
    while (true) {
      const next = this.samples[this.cursor + 1];
      if (!next || next.t > t) break;
      this.cursor += 1;
    }
    return this.samples[this.cursor]?.pointer ?? null;
  }
}
