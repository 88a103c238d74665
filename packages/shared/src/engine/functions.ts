// ─── Function Tables ───────────────────────────────────────────────
// The callable names of the language, resolved at parse time.
// Single-argument math functions and multi-argument functions are
// disjoint tables; the random intrinsics are handled by the parser
// because they bind to a random provider.

import type { MathFunction, MultiFunction } from "./ast.js";

/** Rounds to the nearest integer, ties to the even neighbour. */
export function roundHalfEven(value: number): number {
  if (!Number.isFinite(value)) return value;
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) return floor;
  if (diff > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

/** Linear interpolation with `t` clamped to [0, 1]. */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * clamp01(t);
}

const MATH_FUNCTIONS: ReadonlyMap<string, MathFunction> = new Map<string, MathFunction>([
  ["sqrt", Math.sqrt],
  ["abs", Math.abs],
  ["floor", Math.floor],
  ["ceil", Math.ceil],
  ["round", roundHalfEven],
  ["sin", Math.sin],
  ["cos", Math.cos],
  ["tan", Math.tan],
  ["log", Math.log],
  ["exp", Math.exp],
  ["clamp01", clamp01],
  // Zero counts as positive
  ["sign", (x) => (x >= 0 ? 1 : -1)],
  ["negative", (x) => -x],
  ["acos", Math.acos],
  ["asin", Math.asin],
  ["atan", Math.atan],
]);

export interface MultiFunctionEntry {
  /** Below this many arguments the call returns its first argument. */
  readonly minArity: number;
  readonly fn: MultiFunction;
}

function multi(minArity: number, full: (args: readonly number[]) => number): MultiFunctionEntry {
  return {
    minArity,
    fn: (args) => (args.length >= minArity ? full(args) : args[0] ?? 0),
  };
}

const MULTI_FUNCTIONS: ReadonlyMap<string, MultiFunctionEntry> = new Map([
  ["min", multi(2, ([a = 0, b = 0]) => Math.min(a, b))],
  ["max", multi(2, ([a = 0, b = 0]) => Math.max(a, b))],
  ["clamp", multi(3, ([v = 0, lo = 0, hi = 0]) => clamp(v, lo, hi))],
  ["lerp", multi(3, ([a = 0, b = 0, t = 0]) => lerp(a, b, t))],
  ["pow", multi(2, ([base = 0, exponent = 0]) => Math.pow(base, exponent))],
]);

export function lookupMathFunction(name: string): MathFunction | undefined {
  return MATH_FUNCTIONS.get(name);
}

export function lookupMultiFunction(name: string): MultiFunctionEntry | undefined {
  return MULTI_FUNCTIONS.get(name);
}
