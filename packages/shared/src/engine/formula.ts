// ─── Formula ───────────────────────────────────────────────────────
// A compiled formula: source text, AST root and the names callers must
// supply. Immutable once parsed; evaluate it as often as needed.

import type { FormulaNode } from "./ast.js";
import { BindingContext, type Bindings } from "./binding-context.js";
import {
  evaluateNode,
  type EvaluationOptions,
  type EvaluationResult,
} from "./evaluator.js";

export class Formula {
  constructor(
    readonly source: string,
    readonly root: FormulaNode,
    readonly requiredInputs: ReadonlySet<string>
  ) {}

  /**
   * Evaluates against a private copy of `bindings`.
   * The caller's object is never modified.
   */
  evaluate(bindings: Bindings = {}, options?: EvaluationOptions): EvaluationResult {
    return this.evaluateIn(new BindingContext(bindings), options);
  }

  /**
   * Evaluates against a context the caller owns, e.g. a pooled one.
   * Locals written by the formula stay in `context` afterwards.
   */
  evaluateIn(context: BindingContext, options?: EvaluationOptions): EvaluationResult {
    return evaluateNode(this.root, context, options);
  }
}
