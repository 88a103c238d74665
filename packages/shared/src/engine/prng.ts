// ─── Seeded PRNG ───────────────────────────────────────────────────
// Deterministic pseudo-random numbers for reproducible formula runs.
// Backs SeededRandomProvider; the 32-bit state is explicit so a
// generator can be cloned and replayed from any point.

const MULBERRY_INCREMENT = 0x6d2b79f5;
const UINT32_RANGE = 4294967296;

/** One mulberry32 step: the next state and its output in [0, 1). */
function mulberry32(state: number): { readonly state: number; readonly value: number } {
  const next = (state + MULBERRY_INCREMENT) | 0;
  let t = Math.imul(next ^ (next >>> 15), 1 | next);
  t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
  return { state: next, value: ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE };
}

/** A seeded random number generator built on mulberry32. */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  /** Returns the next pseudo-random float in [0, 1). */
  next(): number {
    const step = mulberry32(this.state);
    this.state = step.state;
    return step.value;
  }

  /** Returns a pseudo-random float in [0, max). */
  nextFloat(max: number): number {
    return this.next() * max;
  }

  /**
   * Returns a pseudo-random integer in [min, max).
   * @throws {RangeError} if min >= max or either value is not a safe integer.
   */
  nextInt(min: number, max: number): number {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
      throw new RangeError("min and max must be safe integers");
    }
    if (min >= max) {
      throw new RangeError(`min (${min}) must be less than max (${max})`);
    }
    return min + Math.floor(this.next() * (max - min));
  }

  /** A generator that continues from the current state independently. */
  clone(): SeededRng {
    const copy = new SeededRng(0);
    copy.state = this.state;
    return copy;
  }
}

export function createRng(seed: number): SeededRng {
  return new SeededRng(seed);
}
