// ─── Formula Registry ──────────────────────────────────────────────
// Compiles expressions once and keeps them by id. A failed
// registration is logged and leaves the previous formula in place.

import {
  FormulaParser,
  type Formula,
  type FormulaDefinition,
  type ParseResult,
  type RandomProvider,
} from "@formula-engine/shared";

import { createConsoleLogger, type FormulaLogger } from "../logging/logger.js";

export interface FormulaRegistryOptions {
  /** Provider bound into the random intrinsics of every formula. */
  readonly random?: RandomProvider;
  readonly logger?: FormulaLogger;
}

const NO_INPUTS: ReadonlySet<string> = new Set();

export class FormulaRegistry {
  private readonly formulas = new Map<string, Formula>();
  private readonly parser: FormulaParser;
  private readonly logger: FormulaLogger;

  constructor(options: FormulaRegistryOptions = {}) {
    this.parser = new FormulaParser({ random: options.random });
    this.logger = options.logger ?? createConsoleLogger("FormulaRegistry");
  }

  /**
   * Compiles `expression` and stores it under `id` on success.
   * Nothing is logged; the caller decides what a failure means.
   */
  tryRegister(id: string, expression: string): ParseResult {
    const result = this.parser.parse(expression);
    if (result.ok) {
      this.formulas.set(id, result.formula);
    }
    return result;
  }

  /** Returns false and logs the parse error when `expression` does not compile. */
  register(id: string, expression: string): boolean {
    const result = this.tryRegister(id, expression);
    if (!result.ok) {
      this.logger.error(`Failed to register formula '${id}': ${result.error.message}`);
      return false;
    }
    return true;
  }

  /** Registers each definition in turn. Returns how many compiled. */
  registerMany(definitions: Iterable<FormulaDefinition>): number {
    let registered = 0;
    for (const { id, expression } of definitions) {
      if (this.register(id, expression)) registered++;
    }
    return registered;
  }

  get(id: string): Formula | undefined {
    return this.formulas.get(id);
  }

  has(id: string): boolean {
    return this.formulas.has(id);
  }

  /** The inputs of the formula under `id`, or an empty set. */
  requiredInputs(id: string): ReadonlySet<string> {
    return this.formulas.get(id)?.requiredInputs ?? NO_INPUTS;
  }

  expressionOf(id: string): string | undefined {
    return this.formulas.get(id)?.source;
  }

  /** Registered ids in registration order. */
  ids(): string[] {
    return [...this.formulas.keys()];
  }

  entries(): FormulaDefinition[] {
    return [...this.formulas].map(([id, formula]) => ({ id, expression: formula.source }));
  }

  get count(): number {
    return this.formulas.size;
  }

  remove(id: string): boolean {
    return this.formulas.delete(id);
  }

  clear(): void {
    this.formulas.clear();
    this.logger.log("All formulas cleared");
  }
}
