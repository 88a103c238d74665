import { describe, it, expect, vi, beforeEach } from "vitest";
import { FormulaRegistry } from "../registry/formula-registry.js";
import { silentLogger } from "../logging/logger.js";
import { FormulaNotFoundError } from "../errors.js";
import { FormulaRunner, formatRunnerStats } from "./formula-runner.js";

// ══════════════════════════════════════════════════════════════════════
// Setup
// ══════════════════════════════════════════════════════════════════════

const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

let registry: FormulaRegistry;
let runner: FormulaRunner;

beforeEach(() => {
  vi.clearAllMocks();
  registry = new FormulaRegistry({ logger: silentLogger });
  registry.registerMany([
    { id: "sum", expression: "a + b" },
    { id: "scale", expression: "x * 10" },
    { id: "double", expression: "x * 2" },
    { id: "square", expression: "x ^ 2" },
    { id: "accumulate", expression: "counter += a; counter" },
  ]);
  runner = new FormulaRunner(registry, { logger });
});

// ══════════════════════════════════════════════════════════════════════
// Tests
// ══════════════════════════════════════════════════════════════════════

describe("FormulaRunner", () => {
  // ── evaluate ─────────────────────────────────────────────────────

  describe("evaluate", () => {
    it("evaluates a registered formula", () => {
      expect(runner.evaluate("sum", { a: 2, b: 3 })).toBe(5);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("returns 0 and logs for an unknown id", () => {
      expect(runner.evaluate("ghost", {})).toBe(0);
      expect(logger.error).toHaveBeenCalledWith("Formula 'ghost' not found");
    });

    it("returns 0 and logs when an input is missing", () => {
      expect(runner.evaluate("sum", { a: 2 })).toBe(0);
      expect(logger.error).toHaveBeenCalledWith(
        "Error evaluating formula 'sum': Variable 'b' not found"
      );
    });

    it("leaves the caller's inputs untouched", () => {
      const inputs = { a: 1 };
      runner.evaluate("accumulate", inputs);
      expect(inputs).toEqual({ a: 1 });
    });
  });

  // ── evaluateEntries ──────────────────────────────────────────────

  describe("evaluateEntries", () => {
    it("defaults omitted inputs to 0 when pooling", () => {
      expect(runner.evaluateEntries("sum", ["a", 2])).toBe(2);
      expect(logger.error).not.toHaveBeenCalled();
      expect(runner.stats().pooledFormulaCount).toBe(1);
    });

    it("resets the pooled context between calls", () => {
      expect(runner.evaluateEntries("accumulate", ["a", 5])).toBe(5);
      expect(runner.evaluateEntries("accumulate", ["a", 5])).toBe(5);
      expect(runner.evaluateEntries("sum", ["a", 1], ["b", 1])).toBe(2);
      expect(runner.evaluateEntries("sum", ["b", 4])).toBe(4);
    });

    it("uses only the given entries without pooling", () => {
      runner.useInputPooling = false;

      expect(runner.evaluateEntries("sum", ["a", 2])).toBe(0);
      expect(runner.evaluateEntries("sum", ["a", 2], ["b", 5])).toBe(7);
      expect(logger.error).toHaveBeenCalledWith(
        "Error evaluating formula 'sum': Variable 'b' not found"
      );
      expect(runner.stats()).toEqual({ pooledFormulaCount: 0, isPoolingEnabled: false });
    });

    it("returns 0 and logs for an unknown id", () => {
      expect(runner.evaluateEntries("ghost", ["a", 1])).toBe(0);
      expect(logger.error).toHaveBeenCalledWith("Formula 'ghost' not found");
    });

    it("honours the pooling option", () => {
      const unpooled = new FormulaRunner(registry, { logger, useInputPooling: false });
      expect(unpooled.useInputPooling).toBe(false);
      expect(runner.useInputPooling).toBe(true);
    });
  });

  // ── prepare ──────────────────────────────────────────────────────

  describe("prepare", () => {
    it("creates one pool per formula", () => {
      expect(runner.prepare("sum")).toBe(true);
      expect(runner.prepare("sum")).toBe(true);
      expect(runner.stats().pooledFormulaCount).toBe(1);
    });

    it("logs and returns false for an unknown id", () => {
      expect(runner.prepare("ghost")).toBe(false);
      expect(logger.error).toHaveBeenCalledWith("Cannot prepare formula 'ghost' - not found");
      expect(runner.stats().pooledFormulaCount).toBe(0);
    });

    it("is dropped by clearPools", () => {
      runner.prepare("sum");
      runner.prepare("scale");

      runner.clearPools();

      expect(runner.stats().pooledFormulaCount).toBe(0);
    });
  });

  // ── Batch and multi ──────────────────────────────────────────────

  describe("evaluateBatch", () => {
    it("evaluates every input set", () => {
      expect(runner.evaluateBatch("scale", [{ x: 1 }, { x: 2 }, { x: 3 }])).toEqual([10, 20, 30]);
    });

    it("stops at the first failure and leaves the rest at 0", () => {
      const results = runner.evaluateBatch("scale", [{ x: 1 }, {}, { x: 3 }]);

      expect(results).toEqual([10, 0, 0]);
      expect(logger.error).toHaveBeenCalledWith(
        "Error in batch evaluation of 'scale': Variable 'x' not found"
      );
    });

    it("returns zeros for an unknown id", () => {
      expect(runner.evaluateBatch("ghost", [{}, {}])).toEqual([0, 0]);
      expect(logger.error).toHaveBeenCalledWith("Formula 'ghost' not found");
    });
  });

  describe("evaluateMultiple", () => {
    it("maps each id to its result", () => {
      const results = runner.evaluateMultiple(["double", "square", "ghost"], { x: 4 });

      expect([...results]).toEqual([
        ["double", 8],
        ["square", 16],
        ["ghost", 0],
      ]);
    });
  });

  // ── tryEvaluate ──────────────────────────────────────────────────

  describe("tryEvaluate", () => {
    it("returns the value on success", () => {
      expect(runner.tryEvaluate("double", { x: 21 })).toEqual({ ok: true, value: 42 });
    });

    it("reports an unknown id without logging", () => {
      const result = runner.tryEvaluate("ghost");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(FormulaNotFoundError);
      expect(result.error.kind).toBe("FormulaNotFound");
      expect(result.error.message).toBe("Formula 'ghost' not found");
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("reports a missing variable without logging", () => {
      const result = runner.tryEvaluate("sum", { b: 1 });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("MissingVariable");
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  // ── Stats ────────────────────────────────────────────────────────

  describe("stats", () => {
    it("formats as a single line", () => {
      runner.prepare("sum");
      expect(formatRunnerStats(runner.stats())).toBe("Pooled: 1, Pooling: Enabled");
      expect(formatRunnerStats({ pooledFormulaCount: 0, isPoolingEnabled: false })).toBe(
        "Pooled: 0, Pooling: Disabled"
      );
    });
  });
});
