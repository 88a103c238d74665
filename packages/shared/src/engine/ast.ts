// ─── AST Node Types ────────────────────────────────────────────────
// Discriminated union on `kind` field. Every node owns its children;
// the parser only ever links freshly parsed subtrees, so the result is
// always a tree.

import type { RandomProvider } from "./random.js";

export interface ConstantNode {
  readonly kind: "Constant";
  readonly value: number;
}

export interface VariableNode {
  readonly kind: "Variable";
  readonly name: string;
}

export interface UnaryOpNode {
  readonly kind: "UnaryOp";
  readonly operator: "-";
  readonly operand: FormulaNode;
}

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "^";

export interface BinaryOpNode {
  readonly kind: "BinaryOp";
  readonly operator: ArithmeticOperator;
  readonly left: FormulaNode;
  readonly right: FormulaNode;
}

export interface ModuloNode {
  readonly kind: "Modulo";
  readonly left: FormulaNode;
  readonly right: FormulaNode;
}

export type ComparisonOperator = "<" | "<=" | ">" | ">=" | "==" | "!=";

export interface ComparisonNode {
  readonly kind: "Comparison";
  readonly operator: ComparisonOperator;
  readonly left: FormulaNode;
  readonly right: FormulaNode;
}

export type LogicalOperator = "&&" | "||";

export interface LogicalNode {
  readonly kind: "Logical";
  readonly operator: LogicalOperator;
  readonly left: FormulaNode;
  readonly right: FormulaNode;
}

export interface NotNode {
  readonly kind: "Not";
  readonly operand: FormulaNode;
}

/** `condition ? whenTrue : whenFalse` */
export interface TernaryNode {
  readonly kind: "Ternary";
  readonly condition: FormulaNode;
  readonly whenTrue: FormulaNode;
  readonly whenFalse: FormulaNode;
}

/** `if (condition) thenBranch else elseBranch`. The else is optional. */
export interface ConditionalNode {
  readonly kind: "Conditional";
  readonly condition: FormulaNode;
  readonly thenBranch: FormulaNode;
  readonly elseBranch: FormulaNode | null;
}

/** `let name` or `let name = initializer` */
export interface DeclarationNode {
  readonly kind: "Declaration";
  readonly name: string;
  readonly initializer: FormulaNode | null;
}

export type AssignmentOperator = "=" | "+=" | "-=" | "*=" | "/=";

export interface AssignmentNode {
  readonly kind: "Assignment";
  readonly operator: AssignmentOperator;
  readonly name: string;
  readonly value: FormulaNode;
}

export interface SequenceNode {
  readonly kind: "Sequence";
  readonly statements: readonly FormulaNode[];
}

/** An empty block. */
export interface EmptyNode {
  readonly kind: "Empty";
}

export type MathFunction = (value: number) => number;
export type MultiFunction = (args: readonly number[]) => number;

/** Single-argument math function call, e.g. `sqrt(x)`. */
export interface MathCallNode {
  readonly kind: "MathCall";
  readonly callee: string;
  readonly fn: MathFunction;
  readonly argument: FormulaNode;
}

/** Multi-argument function call, e.g. `clamp(x, 0, 10)`. */
export interface FunctionCallNode {
  readonly kind: "FunctionCall";
  readonly callee: string;
  readonly fn: MultiFunction;
  readonly args: readonly FormulaNode[];
}

/** `random()` */
export interface RandomValueNode {
  readonly kind: "RandomValue";
  readonly random: RandomProvider;
}

/** `rand(max)` */
export interface RandomIntNode {
  readonly kind: "RandomInt";
  readonly max: FormulaNode;
  readonly random: RandomProvider;
}

/** `randf(max)` */
export interface RandomFloatNode {
  readonly kind: "RandomFloat";
  readonly max: FormulaNode;
  readonly random: RandomProvider;
}

export type FormulaNode =
  | ConstantNode
  | VariableNode
  | UnaryOpNode
  | BinaryOpNode
  | ModuloNode
  | ComparisonNode
  | LogicalNode
  | NotNode
  | TernaryNode
  | ConditionalNode
  | DeclarationNode
  | AssignmentNode
  | SequenceNode
  | EmptyNode
  | MathCallNode
  | FunctionCallNode
  | RandomValueNode
  | RandomIntNode
  | RandomFloatNode;

export type FormulaNodeKind = FormulaNode["kind"];
