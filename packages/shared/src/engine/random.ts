// ─── Random Providers ──────────────────────────────────────────────
// The capability behind rand(), randf() and random(). Providers are
// bound into random nodes at parse time and can be swapped per
// evaluation, so tests can pin every draw.

import { createRng, type SeededRng } from "./prng.js";

/** Source of randomness for the random intrinsics. */
export interface RandomProvider {
  /** Uniform float in [0, 1). */
  uniform01(): number;
  /** Uniform float in [0, max). */
  uniformBelow(max: number): number;
  /** Uniform integer in [0, max). */
  uniformIntBelow(max: number): number;
}

/**
 * Platform-default provider backed by `Math.random`.
 * Every worker thread gets its own engine state.
 */
export class DefaultRandomProvider implements RandomProvider {
  uniform01(): number {
    return Math.random();
  }

  uniformBelow(max: number): number {
    return Math.random() * max;
  }

  uniformIntBelow(max: number): number {
    const bound = Math.trunc(max);
    if (!Number.isSafeInteger(bound) || bound <= 0) return 0;
    return Math.floor(Math.random() * bound);
  }
}

/** Deterministic provider: the same seed replays the same draws. */
export class SeededRandomProvider implements RandomProvider {
  private readonly rng: SeededRng;

  constructor(seed: number) {
    this.rng = createRng(seed);
  }

  uniform01(): number {
    return this.rng.next();
  }

  uniformBelow(max: number): number {
    return this.rng.nextFloat(max);
  }

  uniformIntBelow(max: number): number {
    const bound = Math.trunc(max);
    if (!Number.isSafeInteger(bound) || bound <= 0) return 0;
    return this.rng.nextInt(0, bound);
  }
}

/** Always answers with the same fraction. Intended for tests. */
export class FixedRandomProvider implements RandomProvider {
  constructor(private readonly fixedValue: number = 0.5) {}

  uniform01(): number {
    return this.fixedValue;
  }

  uniformBelow(max: number): number {
    return this.fixedValue * max;
  }

  uniformIntBelow(max: number): number {
    return Math.trunc(this.fixedValue * Math.trunc(max));
  }
}
