// ─── Formula API ───────────────────────────────────────────────────
// Cached entry point: run an expression without registering it first.
// Formulas are cached under the SHA-256 of their text unless the caller
// names a cache id.

import { createHash } from "node:crypto";

import { bindingEntries, type Bindings, type RandomProvider } from "@formula-engine/shared";

import { FormulaRegistrationError } from "../errors.js";
import type { FormulaLogger } from "../logging/logger.js";
import { FormulaRegistry } from "../registry/formula-registry.js";
import { FormulaRunner } from "../runner/formula-runner.js";

export interface FormulaApiOptions {
  readonly random?: RandomProvider;
  readonly logger?: FormulaLogger;
}

/** Hex SHA-256 of the expression text; the default cache id. */
export function formulaCacheId(expression: string): string {
  return createHash("sha256").update(expression, "utf8").digest("hex");
}

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function requireText(value: string, message: string): void {
  if (isBlank(value)) {
    throw new TypeError(message);
  }
}

export class FormulaApi {
  private readonly registry: FormulaRegistry;
  private readonly runner: FormulaRunner;

  constructor(options: FormulaApiOptions = {}) {
    this.registry = new FormulaRegistry(options);
    this.runner = new FormulaRunner(this.registry, { logger: options.logger });
  }

  /**
   * Starts a fluent request.
   *
   * @example
   * api.run("base * mult").set("base", 10).set("mult", 1.5).evaluate(); // 15
   */
  run(expression: string): FormulaRequest {
    requireText(expression, "Expression cannot be blank");
    return new FormulaRequest((inputs, cacheId) => this.evaluate(expression, inputs, cacheId));
  }

  /**
   * Evaluates `expression` against a copy of `inputs`, compiling it on
   * first use. A blank `cacheId` falls back to the expression hash.
   *
   * @throws {TypeError} when `expression` is blank.
   * @throws {FormulaRegistrationError} when `expression` does not compile.
   */
  evaluate(expression: string, inputs: Bindings, cacheId?: string): number {
    requireText(expression, "Expression cannot be blank");
    const id = this.ensureFormula(expression, cacheId);
    return this.runner.evaluate(id, inputs);
  }

  /** Drops every cached formula and pooled context. */
  clearCache(): void {
    this.registry.clear();
    this.runner.clearPools();
  }

  /** Cached expressions keyed by cache id. */
  getAllFormulas(): Map<string, string> {
    return new Map(this.registry.entries().map(({ id, expression }): [string, string] => [id, expression]));
  }

  private ensureFormula(expression: string, cacheId: string | undefined): string {
    const id = cacheId === undefined || isBlank(cacheId) ? formulaCacheId(expression) : cacheId;

    // A cache id reused for different text is recompiled
    if (this.registry.expressionOf(id) !== expression) {
      const result = this.registry.tryRegister(id, expression);
      if (!result.ok) {
        throw new FormulaRegistrationError(id, expression, result.error);
      }
    }
    return id;
  }
}

type RequestExecutor = (inputs: ReadonlyMap<string, number>, cacheId?: string) => number;

/** Collects inputs for one expression, then evaluates it. */
export class FormulaRequest {
  private readonly inputs = new Map<string, number>();

  constructor(private readonly execute: RequestExecutor) {}

  /** @throws {TypeError} when `key` is blank. */
  set(key: string, value: number): this {
    requireText(key, "Input key cannot be blank");
    this.inputs.set(key, value);
    return this;
  }

  /** Replaces every input with a copy of `inputs`. */
  withInputs(inputs: Bindings): this {
    this.inputs.clear();
    for (const [key, value] of bindingEntries(inputs)) {
      this.inputs.set(key, value);
    }
    return this;
  }

  evaluate(): number {
    return this.execute(new Map(this.inputs));
  }

  /**
   * Evaluates under an explicit cache id.
   * @throws {TypeError} when `cacheId` is blank.
   */
  withCache(cacheId: string): number {
    requireText(cacheId, "Cache identifier cannot be blank");
    return this.execute(new Map(this.inputs), cacheId);
  }
}

/** Shared instance for callers that need no configuration. */
export const defaultFormulaApi = new FormulaApi();
