import { describe, it, expect, vi } from "vitest";
import { parseFormula } from "./parser.js";
import { BindingContext, type Bindings } from "./binding-context.js";
import { FixedRandomProvider, SeededRandomProvider, type RandomProvider } from "./random.js";
import { isTruthy, type EvaluationOptions, type EvaluationResult } from "./evaluator.js";
import type { Formula } from "./formula.js";
import type { ParserOptions } from "./parser.js";

// ─── Helpers ───────────────────────────────────────────────────────

function compile(text: string, options?: ParserOptions): Formula {
  const result = parseFormula(text, options);
  if (!result.ok) throw result.error;
  return result.formula;
}

function run(
  text: string,
  bindings: Bindings = {},
  options?: EvaluationOptions
): EvaluationResult {
  return compile(text).evaluate(bindings, options);
}

/** Evaluates and unwraps the numeric value. */
function value(text: string, bindings: Bindings = {}): number {
  const result = run(text, bindings);
  if (!result.ok) throw result.error;
  return result.value;
}

function spyProvider() {
  const uniform01 = vi.fn(() => 0.5);
  const random: RandomProvider = {
    uniform01,
    uniformBelow: (max) => max / 2,
    uniformIntBelow: () => 1,
  };
  return { random, uniform01 };
}

// ─── Tests ─────────────────────────────────────────────────────────

describe("evaluator", () => {
  // ══════════════════════════════════════════════════════════════════
  // ── Arithmetic ───────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("arithmetic", () => {
    it("respects precedence", () => {
      expect(value("a + b * 2", { a: 2, b: 3 })).toBe(8);
    });

    it("evaluates grouped damage formulas", () => {
      expect(
        value("(baseDamage + bonus) * crit", { baseDamage: 10, bonus: 5, crit: 1.5 })
      ).toBe(22.5);
    });

    it("raises right associatively", () => {
      expect(value("2^3^2")).toBe(512);
    });

    it("negates before raising", () => {
      expect(value("-2^2")).toBe(4);
    });

    it("keeps the sign of the dividend for %", () => {
      expect(value("10 % 3")).toBe(1);
      expect(value("-7 % 3")).toBe(-1);
    });

    it("follows IEEE semantics for division by zero", () => {
      expect(value("1 / 0")).toBe(Infinity);
      expect(value("-1 / 0")).toBe(-Infinity);
      expect(value("0 / 0")).toBeNaN();
    });

    it("evaluates an empty formula to 0", () => {
      expect(value("")).toBe(0);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Comparison and logic ─────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("comparison", () => {
    it("yields 1 or 0", () => {
      expect(value("3 > 2")).toBe(1);
      expect(value("2 >= 3")).toBe(0);
      expect(value("2 <= 2")).toBe(1);
      expect(value("1 < 1")).toBe(0);
    });

    it("compares equality within a tolerance", () => {
      expect(value("0.1 + 0.2 == 0.3")).toBe(1);
      expect(value("1 == 1.00005")).toBe(1);
      expect(value("1 == 1.001")).toBe(0);
      expect(value("1 != 1.001")).toBe(1);
      expect(value("1 != 1.00005")).toBe(0);
    });
  });

  describe("logic", () => {
    it("normalises results to 1 or 0", () => {
      expect(value("2 && 3")).toBe(1);
      expect(value("0 || 0")).toBe(0);
      expect(value("0 || 7")).toBe(1);
      expect(value("!5")).toBe(0);
      expect(value("!0")).toBe(1);
    });

    it("short-circuits && without reading the right side", () => {
      expect(run("0 && missing")).toEqual({ ok: true, value: 0 });
    });

    it("short-circuits || without reading the right side", () => {
      expect(run("1 || missing")).toEqual({ ok: true, value: 1 });
    });

    it("evaluates the right side when needed", () => {
      const result = run("1 && missing");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.variableName).toBe("missing");
    });

    it("never draws from the provider on a skipped side", () => {
      const { random, uniform01 } = spyProvider();
      const formula = compile("0 && random() > 0.1", { random });

      expect(formula.evaluate()).toEqual({ ok: true, value: 0 });
      expect(uniform01).not.toHaveBeenCalled();
    });

    it("treats NaN as truthy", () => {
      expect(isTruthy(Number.NaN)).toBe(true);
      expect(value("x ? 1 : 2", { x: Number.NaN })).toBe(1);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Statements ───────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("statements", () => {
    it("uses declared locals", () => {
      const formula = compile("let temp = x * 2; temp + y");
      expect(formula.evaluate({ x: 2, y: 3 })).toEqual({ ok: true, value: 7 });
    });

    it("declares to 0 without an initializer", () => {
      expect(value("let z; z")).toBe(0);
    });

    it("returns the value of the last statement", () => {
      expect(value("1; 2; 3")).toBe(3);
    });

    it("takes the else branch of if", () => {
      expect(value("let r = 0; if (x > 10) { r = 1 } else { r = 2 }; r", { x: 5 })).toBe(2);
    });

    it("evaluates if without else to 0 when false", () => {
      expect(value("if (0) 5")).toBe(0);
    });

    it("evaluates an empty block to 0", () => {
      expect(value("{}")).toBe(0);
    });

    it("applies compound assignments in order", () => {
      expect(value("total = 10; total -= 4; total *= 3; total /= 2")).toBe(9);
    });

    it("compounds onto a supplied value or onto 0", () => {
      expect(value("x += 1", { x: 5 })).toBe(6);
      expect(value("x += 1")).toBe(1);
    });

    it("ends a statement at a line break", () => {
      expect(value("let a = 5\n-a")).toBe(-5);
      expect(value("let t = x\n(t + 1) * 2", { x: 3 })).toBe(8);
    });

    it("reads a leading plus on a new line as a new statement", () => {
      expect(value("let total = base\n+ bonus", { base: 1, bonus: 2 })).toBe(2);
    });

    it("evaluates nested ternaries", () => {
      const grade = compile("s >= 90 ? 3 : s >= 50 ? 2 : 1");
      expect(grade.evaluate({ s: 95 })).toEqual({ ok: true, value: 3 });
      expect(grade.evaluate({ s: 60 })).toEqual({ ok: true, value: 2 });
      expect(grade.evaluate({ s: 10 })).toEqual({ ok: true, value: 1 });
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Functions ────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("math functions", () => {
    it("evaluates single-argument functions", () => {
      expect(value("sqrt(16)")).toBe(4);
      expect(value("abs(-3)")).toBe(3);
      expect(value("floor(2.7)")).toBe(2);
      expect(value("ceil(2.1)")).toBe(3);
      expect(value("negative(4)")).toBe(-4);
      expect(value("clamp01(1.5)")).toBe(1);
      expect(value("log(exp(2))")).toBeCloseTo(2);
    });

    it("rounds halves to even", () => {
      expect(value("round(2.5)")).toBe(2);
      expect(value("round(3.5)")).toBe(4);
      expect(value("round(-2.5)")).toBe(-2);
      expect(value("round(2.4)")).toBe(2);
    });

    it("counts zero as positive in sign", () => {
      expect(value("sign(0)")).toBe(1);
      expect(value("sign(-2)")).toBe(-1);
    });

    it("evaluates multi-argument functions", () => {
      expect(value("min(3, 7)")).toBe(3);
      expect(value("max(3, 7)")).toBe(7);
      expect(value("clamp(15, 0, 10)")).toBe(10);
      expect(value("clamp(-5, 0, 10)")).toBe(0);
      expect(value("pow(2, 10)")).toBe(1024);
    });

    it("clamps the lerp factor", () => {
      expect(value("lerp(0, 10, 0.25)")).toBe(2.5);
      expect(value("lerp(0, 10, 2)")).toBe(10);
      expect(value("lerp(0, 10, -1)")).toBe(0);
    });

    it("degrades to the first argument when given too few", () => {
      expect(value("min(5)")).toBe(5);
      expect(value("clamp(4, 1)")).toBe(4);
      expect(value("lerp(3)")).toBe(3);
    });
  });

  describe("random intrinsics", () => {
    const fixed = { random: new FixedRandomProvider(0.5) };

    it("draws through the bound provider", () => {
      expect(compile("random()", fixed).evaluate()).toEqual({ ok: true, value: 0.5 });
      expect(compile("rand(10)", fixed).evaluate()).toEqual({ ok: true, value: 5 });
      expect(compile("randf(4)", fixed).evaluate()).toEqual({ ok: true, value: 2 });
    });

    it("truncates the bound of rand", () => {
      expect(compile("rand(7.9)", fixed).evaluate()).toEqual({ ok: true, value: 3 });
    });

    it("returns 0 for non-positive bounds", () => {
      expect(compile("rand(0)", fixed).evaluate()).toEqual({ ok: true, value: 0 });
      expect(compile("rand(-3)", fixed).evaluate()).toEqual({ ok: true, value: 0 });
      expect(compile("rand(0.5)", fixed).evaluate()).toEqual({ ok: true, value: 0 });
      expect(compile("randf(0)", fixed).evaluate()).toEqual({ ok: true, value: 0 });
      expect(compile("randf(x)", fixed).evaluate({ x: Number.NaN })).toEqual({ ok: true, value: 0 });
    });

    it("prefers a per-evaluation provider", () => {
      const formula = compile("random()", fixed);
      expect(formula.evaluate({}, { random: new FixedRandomProvider(0.1) })).toEqual({
        ok: true,
        value: 0.1,
      });
      expect(formula.evaluate()).toEqual({ ok: true, value: 0.5 });
    });

    it("replays seeded draws", () => {
      const a = compile("rand(100) + randf(1)", { random: new SeededRandomProvider(42) });
      const b = compile("rand(100) + randf(1)", { random: new SeededRandomProvider(42) });
      const drawsA = [a.evaluate(), a.evaluate(), a.evaluate()];
      const drawsB = [b.evaluate(), b.evaluate(), b.evaluate()];
      expect(drawsA).toEqual(drawsB);
    });
  });

  // ══════════════════════════════════════════════════════════════════
  // ── Bindings ─────────────────────────────────────────────────────
  // ══════════════════════════════════════════════════════════════════

  describe("bindings", () => {
    it("reuses one formula with different inputs", () => {
      const formula = compile("value * 2");
      expect(formula.evaluate({ value: 4 })).toEqual({ ok: true, value: 8 });
      expect(formula.evaluate({ value: 10 })).toEqual({ ok: true, value: 20 });
    });

    it("accepts a Map", () => {
      expect(value("a - b", new Map([["a", 9], ["b", 4]]))).toBe(5);
    });

    it("reports the first missing variable", () => {
      const result = run("a + b", { a: 1 });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("MissingVariable");
      expect(result.error.variableName).toBe("b");
      expect(result.error.message).toBe("Variable 'b' not found");
    });

    it("never writes back into the caller's bindings", () => {
      const inputs = { a: 1 };
      expect(value("a = 5; a", inputs)).toBe(5);
      expect(inputs).toEqual({ a: 1 });
    });

    it("leaves locals in a caller-owned context", () => {
      const context = new BindingContext({ x: 3 });
      const result = compile("let doubled = x * 2; doubled + 1").evaluateIn(context);

      expect(result).toEqual({ ok: true, value: 7 });
      expect(context.get("doubled")).toBe(6);
    });
  });
});
