// ─── Parser ────────────────────────────────────────────────────────
// Recursive descent parser for formula source text. Produces the AST
// root plus the set of input variables: names read by the formula
// before any `let` or assignment made them local.
//
// Precedence (low → high):
//   statements  →  ?:  →  ||  →  &&  →  comparison (one per level)
//   →  +, -  →  *, /, %  →  ^ (right)  →  unary -, +, !  →  primary

import type {
  AssignmentOperator,
  ComparisonOperator,
  FormulaNode,
} from "./ast.js";
import { ParseError, type ParseErrorKind } from "./errors.js";
import { Formula } from "./formula.js";
import { lookupMathFunction, lookupMultiFunction } from "./functions.js";
import { DefaultRandomProvider, type RandomProvider } from "./random.js";
import { tokenize, type Token, type TokenKind } from "./tokenizer.js";

export interface ParserOptions {
  /** Provider bound into rand(), randf() and random() nodes. */
  readonly random?: RandomProvider;
}

/** The result of parsing. A failed parse never carries a partial formula. */
export type ParseResult =
  | { readonly ok: true; readonly formula: Formula }
  | { readonly ok: false; readonly error: ParseError };

const MAX_NESTING_DEPTH = 256;

const ASSIGNMENT_OPERATORS: ReadonlySet<string> = new Set<AssignmentOperator>([
  "=",
  "+=",
  "-=",
  "*=",
  "/=",
]);

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set<ComparisonOperator>([
  "<",
  "<=",
  ">",
  ">=",
  "==",
  "!=",
]);

/**
 * Parses formulas with a fixed random provider.
 * Instances hold no per-parse state and can be shared freely.
 */
export class FormulaParser {
  private readonly random: RandomProvider;

  constructor(options: ParserOptions = {}) {
    this.random = options.random ?? new DefaultRandomProvider();
  }

  parse(text: string): ParseResult {
    return parseFormula(text, { random: this.random });
  }
}

/** Parses `text` into a Formula, or describes why it cannot be parsed. */
export function parseFormula(text: string, options: ParserOptions = {}): ParseResult {
  try {
    const formula = compile(text, options.random ?? new DefaultRandomProvider());
    return { ok: true, formula };
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}

function isAssignmentOperator(value: string): value is AssignmentOperator {
  return ASSIGNMENT_OPERATORS.has(value);
}

function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.has(value);
}

/**
 * Tokenizes and parses `source`.
 *
 * @throws {ParseError} on any grammar violation.
 */
function compile(source: string, random: RandomProvider): Formula {
  const tokens = tokenize(source);
  const locals = new Set<string>();
  const inputs = new Set<string>();
  let pos = 0;
  let depth = 0;

  function current(): Token {
    return peek(0);
  }

  function peek(offset: number): Token {
    return (
      tokens[pos + offset] ?? { kind: "EOF", value: "", position: source.length, lineBreakBefore: false }
    );
  }

  function advance(): Token {
    const tok = current();
    if (tok.kind !== "EOF") pos++;
    return tok;
  }

  function fail(kind: ParseErrorKind, reason: string, tok: Token = current()): never {
    throw new ParseError(kind, reason, source, tok.position);
  }

  function expect(kind: TokenKind, errorKind: ParseErrorKind, reason: string): Token {
    if (current().kind !== kind) fail(errorKind, reason);
    return advance();
  }

  function isOperator(value: string): boolean {
    const tok = current();
    return tok.kind === "Operator" && tok.value === value;
  }

  /** An operator that continues the current line; a line break ends the statement instead. */
  function isInfix(value: string): boolean {
    return isOperator(value) && !current().lineBreakBefore;
  }

  function continuesWith(kind: TokenKind): boolean {
    const tok = current();
    return tok.kind === kind && !tok.lineBreakBefore;
  }

  function isKeyword(word: string, tok: Token = current()): boolean {
    return tok.kind === "Identifier" && tok.value === word;
  }

  function skipSemicolons(): void {
    while (current().kind === "Semicolon") advance();
  }

  /** Runs a nested production, guarding against runaway nesting. */
  function nested<T>(production: () => T): T {
    if (depth >= MAX_NESTING_DEPTH) {
      fail("ExpressionTooComplex", `Expression nested deeper than ${MAX_NESTING_DEPTH} levels`);
    }
    depth++;
    try {
      return production();
    } finally {
      depth--;
    }
  }

  function collapse(statements: readonly FormulaNode[], whenEmpty: FormulaNode): FormulaNode {
    if (statements.length === 0) return whenEmpty;
    if (statements.length === 1 && statements[0]) return statements[0];
    return { kind: "Sequence", statements };
  }

  // ── Statements ──

  function parseProgram(): FormulaNode {
    const statements: FormulaNode[] = [];
    skipSemicolons();
    while (current().kind !== "EOF") {
      statements.push(parseStatement());
      skipSemicolons();
    }
    return collapse(statements, { kind: "Constant", value: 0 });
  }

  function parseStatement(): FormulaNode {
    return nested(() => {
      if (isKeyword("let")) return parseDeclaration();
      if (isKeyword("if")) return parseIf();
      if (current().kind === "LBrace") return parseBlock();
      return parseAssignmentOrExpression();
    });
  }

  function parseDeclaration(): FormulaNode {
    advance(); // consume `let`
    const name = expect("Identifier", "ExpectedToken", "Expected variable name after 'let'").value;
    locals.add(name);

    let initializer: FormulaNode | null = null;
    if (isInfix("=")) {
      advance();
      initializer = parseExpression();
    }
    return { kind: "Declaration", name, initializer };
  }

  function parseIf(): FormulaNode {
    advance(); // consume `if`
    expect("LParen", "ExpectedToken", "Expected '(' after 'if'");
    const condition = parseExpression();
    expect("RParen", "UnterminatedParenthesis", "Expected ')' after if condition");

    const thenBranch = parseStatement();

    // Allows `if (c) a; else b`
    if (current().kind === "Semicolon" && isKeyword("else", peek(1))) {
      advance();
    }

    let elseBranch: FormulaNode | null = null;
    if (isKeyword("else")) {
      advance();
      elseBranch = parseStatement();
    }
    return { kind: "Conditional", condition, thenBranch, elseBranch };
  }

  function parseBlock(): FormulaNode {
    advance(); // consume `{`
    const statements: FormulaNode[] = [];
    skipSemicolons();
    while (current().kind !== "RBrace" && current().kind !== "EOF") {
      statements.push(parseStatement());
      skipSemicolons();
    }
    expect("RBrace", "UnterminatedBlock", "Expected '}'");
    return collapse(statements, { kind: "Empty" });
  }

  function parseAssignmentOrExpression(): FormulaNode {
    const target = current();
    const operator = peek(1);
    if (
      target.kind === "Identifier" &&
      operator.kind === "Operator" &&
      !operator.lineBreakBefore &&
      isAssignmentOperator(operator.value)
    ) {
      advance();
      advance();
      const value = parseExpression();
      // Local only from here on: `a = a + 1` still reads `a` as an input
      locals.add(target.value);
      return { kind: "Assignment", operator: operator.value, name: target.value, value };
    }
    return parseExpression();
  }

  // ── Expressions ──

  function parseExpression(): FormulaNode {
    return nested(parseTernary);
  }

  function parseTernary(): FormulaNode {
    const condition = parseOr();
    if (!continuesWith("Question")) return condition;

    advance();
    const whenTrue = parseOr();
    expect("Colon", "UnterminatedTernary", "Expected ':' in ternary operator");
    const whenFalse = parseExpression(); // right associative
    return { kind: "Ternary", condition, whenTrue, whenFalse };
  }

  function parseOr(): FormulaNode {
    let left = parseAnd();
    while (isInfix("||")) {
      advance();
      const right = parseAnd();
      left = { kind: "Logical", operator: "||", left, right };
    }
    return left;
  }

  function parseAnd(): FormulaNode {
    let left = parseComparison();
    while (isInfix("&&")) {
      advance();
      const right = parseComparison();
      left = { kind: "Logical", operator: "&&", left, right };
    }
    return left;
  }

  function parseComparison(): FormulaNode {
    const left = parseAdditive();
    const tok = current();
    if (tok.kind === "Operator" && !tok.lineBreakBefore && isComparisonOperator(tok.value)) {
      advance();
      const right = parseAdditive();
      return { kind: "Comparison", operator: tok.value, left, right };
    }
    return left;
  }

  function parseAdditive(): FormulaNode {
    let left = parseMultiplicative();
    while (isInfix("+") || isInfix("-")) {
      const operator = advance().value === "+" ? "+" : "-";
      const right = parseMultiplicative();
      left = { kind: "BinaryOp", operator, left, right };
    }
    return left;
  }

  function parseMultiplicative(): FormulaNode {
    let left = parseExponent();
    while (isInfix("*") || isInfix("/") || isInfix("%")) {
      const op = advance().value;
      const right = parseExponent();
      if (op === "%") {
        left = { kind: "Modulo", left, right };
      } else {
        left = { kind: "BinaryOp", operator: op === "*" ? "*" : "/", left, right };
      }
    }
    return left;
  }

  function parseExponent(): FormulaNode {
    const base = parseUnary();
    if (!isInfix("^")) return base;

    advance();
    const exponent = nested(parseExponent); // right associative
    return { kind: "BinaryOp", operator: "^", left: base, right: exponent };
  }

  function parseUnary(): FormulaNode {
    if (isOperator("-")) {
      advance();
      const operand = nested(parseUnary);
      return { kind: "UnaryOp", operator: "-", operand };
    }
    if (isOperator("+")) {
      advance();
      return nested(parseUnary);
    }
    if (isOperator("!")) {
      advance();
      const operand = nested(parseUnary);
      return { kind: "Not", operand };
    }
    return parsePrimary();
  }

  function parsePrimary(): FormulaNode {
    const tok = current();

    if (tok.kind === "LParen") {
      advance();
      const inner = parseExpression();
      expect("RParen", "UnterminatedParenthesis", "Expected closing parenthesis");
      return inner;
    }

    if (tok.kind === "Number") {
      advance();
      return { kind: "Constant", value: Number(tok.value) };
    }

    if (tok.kind === "Identifier") {
      advance();
      // `f\n(x)` is a variable followed by a new statement
      if (continuesWith("LParen")) {
        return parseCall(tok);
      }
      if (!locals.has(tok.value)) {
        inputs.add(tok.value);
      }
      return { kind: "Variable", name: tok.value };
    }

    if (tok.kind === "EOF") {
      fail("UnexpectedToken", "Unexpected end of expression");
    }
    return fail("UnexpectedToken", `Unexpected token '${tok.value}'`);
  }

  function parseCall(nameTok: Token): FormulaNode {
    advance(); // consume `(`
    const args: FormulaNode[] = [];
    if (current().kind !== "RParen") {
      args.push(parseExpression());
      while (current().kind === "Comma") {
        advance();
        args.push(parseExpression());
      }
    }
    expect("RParen", "UnterminatedFunctionCall", "Expected closing parenthesis in function call");

    const callee = nameTok.value;

    const math = lookupMathFunction(callee);
    if (math) {
      const [argument] = args;
      if (args.length !== 1 || !argument) {
        fail("ArityMismatch", arityMessage(callee, "1 argument", args.length), nameTok);
      }
      return { kind: "MathCall", callee, fn: math, argument };
    }

    const multi = lookupMultiFunction(callee);
    if (multi) {
      if (args.length === 0) {
        fail("ArityMismatch", arityMessage(callee, "at least 1 argument", 0), nameTok);
      }
      return { kind: "FunctionCall", callee, fn: multi.fn, args };
    }

    if (callee === "random") {
      if (args.length !== 0) {
        fail("ArityMismatch", arityMessage(callee, "no arguments", args.length), nameTok);
      }
      return { kind: "RandomValue", random };
    }

    if (callee === "rand" || callee === "randf") {
      const [max] = args;
      if (args.length !== 1 || !max) {
        fail("ArityMismatch", arityMessage(callee, "1 argument", args.length), nameTok);
      }
      return callee === "rand"
        ? { kind: "RandomInt", max, random }
        : { kind: "RandomFloat", max, random };
    }

    return fail("UnknownFunction", `Unknown function: ${callee}`, nameTok);
  }

  const root = parseProgram();
  return new Formula(source, root, inputs);
}

function arityMessage(callee: string, expected: string, actual: number): string {
  return `Function '${callee}' expects ${expected}, got ${actual}`;
}
