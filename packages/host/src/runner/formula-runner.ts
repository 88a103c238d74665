// ─── Formula Runner ────────────────────────────────────────────────
// Evaluation façade over a FormulaRegistry. Failures are logged and
// evaluate to 0; tryEvaluate reports them instead. With pooling on,
// entry-style evaluations reuse one binding context per formula.

import {
  BindingContext,
  type Bindings,
  type EvaluationError,
  type Formula,
} from "@formula-engine/shared";

import { FormulaNotFoundError } from "../errors.js";
import { createConsoleLogger, type FormulaLogger } from "../logging/logger.js";
import type { FormulaRegistry } from "../registry/formula-registry.js";

export interface FormulaRunnerOptions {
  readonly logger?: FormulaLogger;
  /** Reuse one binding context per formula in evaluateEntries. Defaults to true. */
  readonly useInputPooling?: boolean;
}

/** A single `[name, value]` input. */
export type InputEntry = readonly [name: string, value: number];

export type RunnerResult =
  | { readonly ok: true; readonly value: number }
  | { readonly ok: false; readonly error: FormulaNotFoundError | EvaluationError };

export interface RunnerStats {
  readonly pooledFormulaCount: number;
  readonly isPoolingEnabled: boolean;
}

/** One-line summary, e.g. `Pooled: 2, Pooling: Enabled`. */
export function formatRunnerStats(stats: RunnerStats): string {
  const pooling = stats.isPoolingEnabled ? "Enabled" : "Disabled";
  return `Pooled: ${stats.pooledFormulaCount}, Pooling: ${pooling}`;
}

export class FormulaRunner {
  private readonly pools = new Map<string, BindingContext>();
  private readonly logger: FormulaLogger;
  private pooling: boolean;

  constructor(
    private readonly registry: FormulaRegistry,
    options: FormulaRunnerOptions = {}
  ) {
    this.logger = options.logger ?? createConsoleLogger("FormulaRunner");
    this.pooling = options.useInputPooling ?? true;
  }

  get useInputPooling(): boolean {
    return this.pooling;
  }

  set useInputPooling(enabled: boolean) {
    this.pooling = enabled;
  }

  /** Evaluates against a copy of `inputs`. Returns 0 on any failure. */
  evaluate(id: string, inputs: Bindings = {}): number {
    const formula = this.lookup(id);
    if (!formula) return 0;
    return this.unwrap(id, formula.evaluate(inputs));
  }

  /**
   * Evaluates with `[name, value]` entries. When pooling, every required
   * input starts at 0, so omitted inputs read as 0 rather than failing.
   */
  evaluateEntries(id: string, ...entries: readonly InputEntry[]): number {
    const formula = this.lookup(id);
    if (!formula) return 0;

    const context = this.pooling ? this.pooledContext(id, formula) : new BindingContext();
    for (const [name, value] of entries) {
      context.set(name, value);
    }
    return this.unwrap(id, formula.evaluateIn(context));
  }

  /** Creates the pooled context for `id` ahead of its first evaluation. */
  prepare(id: string): boolean {
    const formula = this.registry.get(id);
    if (!formula) {
      this.logger.error(`Cannot prepare formula '${id}' - not found`);
      return false;
    }
    if (!this.pools.has(id)) {
      this.pools.set(id, zeroInputs(new BindingContext(), formula));
    }
    return true;
  }

  /**
   * Evaluates one formula per input set. The first failure stops the
   * batch; its slot and every later one stay 0.
   */
  evaluateBatch(id: string, inputSets: readonly Bindings[]): number[] {
    const results = new Array<number>(inputSets.length).fill(0);
    const formula = this.lookup(id);
    if (!formula) return results;

    for (const [index, inputs] of inputSets.entries()) {
      const result = formula.evaluate(inputs);
      if (!result.ok) {
        this.logger.error(`Error in batch evaluation of '${id}': ${result.error.message}`);
        break;
      }
      results[index] = result.value;
    }
    return results;
  }

  /** Evaluates several formulas against the same inputs. */
  evaluateMultiple(ids: Iterable<string>, inputs: Bindings = {}): Map<string, number> {
    const results = new Map<string, number>();
    for (const id of ids) {
      results.set(id, this.evaluate(id, inputs));
    }
    return results;
  }

  /** Like evaluate, but reports failures instead of logging them. */
  tryEvaluate(id: string, inputs: Bindings = {}): RunnerResult {
    const formula = this.registry.get(id);
    if (!formula) {
      return { ok: false, error: new FormulaNotFoundError(id) };
    }
    return formula.evaluate(inputs);
  }

  clearPools(): void {
    this.pools.clear();
  }

  stats(): RunnerStats {
    return {
      pooledFormulaCount: this.pools.size,
      isPoolingEnabled: this.pooling,
    };
  }

  // ── Internals ──

  private lookup(id: string): Formula | undefined {
    const formula = this.registry.get(id);
    if (!formula) {
      this.logger.error(`Formula '${id}' not found`);
    }
    return formula;
  }

  private pooledContext(id: string, formula: Formula): BindingContext {
    let context = this.pools.get(id);
    if (!context) {
      context = new BindingContext();
      this.pools.set(id, context);
    }
    return zeroInputs(context.reset(), formula);
  }

  private unwrap(id: string, result: RunnerResult): number {
    if (result.ok) return result.value;
    this.logger.error(`Error evaluating formula '${id}': ${result.error.message}`);
    return 0;
  }
}

function zeroInputs(context: BindingContext, formula: Formula): BindingContext {
  for (const name of formula.requiredInputs) {
    context.set(name, 0);
  }
  return context;
}
