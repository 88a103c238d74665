// ─── Evaluator ─────────────────────────────────────────────────────
// Tree-walking evaluator. Every node evaluates to a number against a
// binding context; declarations and assignments also write into it.
// Failures travel up as tagged results instead of exceptions, so the
// first missing variable aborts the rest of the walk.

import type {
  AssignmentNode,
  ComparisonOperator,
  ArithmeticOperator,
  FormulaNode,
  LogicalNode,
} from "./ast.js";
import type { BindingContext } from "./binding-context.js";
import { EvaluationError } from "./errors.js";
import type { RandomProvider } from "./random.js";

/** Tolerance used by `==` and `!=`. */
export const EQUALITY_EPSILON = 1e-4;

/** The outcome of evaluating a node or a whole formula. */
export type EvaluationResult =
  | { readonly ok: true; readonly value: number }
  | { readonly ok: false; readonly error: EvaluationError };

export interface EvaluationOptions {
  /** Replaces the provider bound at parse time for this evaluation only. */
  readonly random?: RandomProvider;
}

interface EvalState {
  readonly bindings: BindingContext;
  readonly random: RandomProvider | undefined;
}

function ok(value: number): EvaluationResult {
  return { ok: true, value };
}

function fromBoolean(condition: boolean): EvaluationResult {
  return ok(condition ? 1 : 0);
}

/** Zero is false; anything else, NaN included, is true. */
export function isTruthy(value: number): boolean {
  return value !== 0;
}

/**
 * Evaluates `node` against `bindings`.
 * The context is mutated by declarations and assignments.
 */
export function evaluateNode(
  node: FormulaNode,
  bindings: BindingContext,
  options: EvaluationOptions = {}
): EvaluationResult {
  return evaluate(node, { bindings, random: options.random });
}

function evaluate(node: FormulaNode, state: EvalState): EvaluationResult {
  switch (node.kind) {
    case "Constant":
      return ok(node.value);

    case "Variable": {
      const value = state.bindings.get(node.name);
      if (value === undefined) {
        return { ok: false, error: new EvaluationError(node.name) };
      }
      return ok(value);
    }

    case "UnaryOp": {
      const operand = evaluate(node.operand, state);
      if (!operand.ok) return operand;
      return ok(-operand.value);
    }

    case "BinaryOp": {
      const left = evaluate(node.left, state);
      if (!left.ok) return left;
      const right = evaluate(node.right, state);
      if (!right.ok) return right;
      return ok(applyArithmetic(node.operator, left.value, right.value));
    }

    case "Modulo": {
      const left = evaluate(node.left, state);
      if (!left.ok) return left;
      const right = evaluate(node.right, state);
      if (!right.ok) return right;
      return ok(left.value % right.value);
    }

    case "Comparison": {
      const left = evaluate(node.left, state);
      if (!left.ok) return left;
      const right = evaluate(node.right, state);
      if (!right.ok) return right;
      return fromBoolean(compare(node.operator, left.value, right.value));
    }

    case "Logical":
      return evaluateLogical(node, state);

    case "Not": {
      const operand = evaluate(node.operand, state);
      if (!operand.ok) return operand;
      return fromBoolean(!isTruthy(operand.value));
    }

    case "Ternary": {
      const condition = evaluate(node.condition, state);
      if (!condition.ok) return condition;
      return evaluate(isTruthy(condition.value) ? node.whenTrue : node.whenFalse, state);
    }

    case "Conditional": {
      const condition = evaluate(node.condition, state);
      if (!condition.ok) return condition;
      if (isTruthy(condition.value)) return evaluate(node.thenBranch, state);
      return node.elseBranch ? evaluate(node.elseBranch, state) : ok(0);
    }

    case "Declaration": {
      let value = 0;
      if (node.initializer) {
        const initial = evaluate(node.initializer, state);
        if (!initial.ok) return initial;
        value = initial.value;
      }
      state.bindings.set(node.name, value);
      return ok(value);
    }

    case "Assignment":
      return evaluateAssignment(node, state);

    case "Sequence": {
      let last: EvaluationResult = ok(0);
      for (const statement of node.statements) {
        last = evaluate(statement, state);
        if (!last.ok) return last;
      }
      return last;
    }

    case "Empty":
      return ok(0);

    case "MathCall": {
      const argument = evaluate(node.argument, state);
      if (!argument.ok) return argument;
      return ok(node.fn(argument.value));
    }

    case "FunctionCall": {
      const values: number[] = [];
      for (const arg of node.args) {
        const result = evaluate(arg, state);
        if (!result.ok) return result;
        values.push(result.value);
      }
      return ok(node.fn(values));
    }

    case "RandomValue":
      return ok((state.random ?? node.random).uniform01());

    case "RandomInt": {
      const max = evaluate(node.max, state);
      if (!max.ok) return max;
      const bound = Math.trunc(max.value);
      if (!(bound > 0)) return ok(0);
      return ok((state.random ?? node.random).uniformIntBelow(bound));
    }

    case "RandomFloat": {
      const max = evaluate(node.max, state);
      if (!max.ok) return max;
      if (!(max.value > 0)) return ok(0);
      return ok((state.random ?? node.random).uniformBelow(max.value));
    }
  }
}

function evaluateLogical(node: LogicalNode, state: EvalState): EvaluationResult {
  const left = evaluate(node.left, state);
  if (!left.ok) return left;

  // Short-circuit: the right side is never evaluated, so its writes never happen
  if (node.operator === "&&" && !isTruthy(left.value)) return ok(0);
  if (node.operator === "||" && isTruthy(left.value)) return ok(1);

  const right = evaluate(node.right, state);
  if (!right.ok) return right;
  return fromBoolean(isTruthy(right.value));
}

function evaluateAssignment(node: AssignmentNode, state: EvalState): EvaluationResult {
  const result = evaluate(node.value, state);
  if (!result.ok) return result;

  let value = result.value;
  if (node.operator !== "=") {
    const current = state.bindings.get(node.name) ?? 0;
    switch (node.operator) {
      case "+=":
        value = current + value;
        break;
      case "-=":
        value = current - value;
        break;
      case "*=":
        value = current * value;
        break;
      case "/=":
        value = current / value;
        break;
    }
  }

  state.bindings.set(node.name, value);
  return ok(value);
}

function applyArithmetic(op: ArithmeticOperator, left: number, right: number): number {
  switch (op) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "*":
      return left * right;
    case "/":
      return left / right;
    case "^":
      return Math.pow(left, right);
  }
}

function compare(op: ComparisonOperator, left: number, right: number): boolean {
  switch (op) {
    case "<":
      return left < right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;
    case "==":
      return Math.abs(left - right) < EQUALITY_EPSILON;
    case "!=":
      return Math.abs(left - right) >= EQUALITY_EPSILON;
  }
}
