// ─── Engine Errors ─────────────────────────────────────────────────
// ParseError describes malformed source text with line/column context.
// EvaluationError describes a failed evaluation. Both travel inside
// result unions; neither escapes the public API as a thrown exception.

export type ParseErrorKind =
  | "UnexpectedCharacter"
  | "InvalidNumber"
  | "UnexpectedToken"
  | "ExpectedToken"
  | "UnterminatedParenthesis"
  | "UnterminatedBlock"
  | "UnterminatedTernary"
  | "UnterminatedFunctionCall"
  | "UnknownFunction"
  | "ArityMismatch"
  | "ExpressionTooComplex";

/** Location of an error inside the source text. */
export interface SourceContext {
  /** Index into the source, clamped to the last character. */
  readonly offset: number;
  /** 1-based. */
  readonly line: number;
  /** 1-based. Carriage returns do not advance it. */
  readonly column: number;
  readonly lineText: string;
  /** Spaces followed by `^` under the offending column. */
  readonly pointer: string;
}

/**
 * Computes the line/column context for an index into `source`.
 * Positions past the end are clamped to the last character.
 */
export function buildSourceContext(source: string, position: number): SourceContext {
  if (source.length === 0) {
    return { offset: 0, line: 1, column: 1, lineText: "", pointer: "^" };
  }

  const offset = Math.max(0, Math.min(position, source.length - 1));

  let line = 1;
  let column = 1;
  for (let i = 0; i < offset; i++) {
    const ch = source[i];
    if (ch === "\n") {
      line++;
      column = 1;
    } else if (ch !== "\r") {
      column++;
    }
  }

  let start = offset;
  while (start > 0 && !isLineBreak(source[start - 1])) {
    start--;
  }
  let end = offset;
  while (end < source.length && !isLineBreak(source[end])) {
    end++;
  }
  const lineText = source.slice(start, end);

  const maxColumn = lineText.length > 0 ? lineText.length + 1 : 1;
  const pointerColumn = Math.max(1, Math.min(column, maxColumn));
  const pointer = `${" ".repeat(pointerColumn - 1)}^`;

  return { offset, line, column, lineText, pointer };
}

function isLineBreak(ch: string | undefined): boolean {
  return ch === "\n" || ch === "\r";
}

/** Error raised for source text that does not match the grammar. */
export class ParseError extends Error implements SourceContext {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
  readonly lineText: string;
  readonly pointer: string;

  constructor(
    readonly kind: ParseErrorKind,
    readonly reason: string,
    readonly expression: string,
    position: number
  ) {
    const context = buildSourceContext(expression, position);
    super(renderParseMessage(reason, expression, context));
    this.name = "ParseError";
    this.offset = context.offset;
    this.line = context.line;
    this.column = context.column;
    this.lineText = context.lineText;
    this.pointer = context.pointer;
  }
}

function renderParseMessage(
  reason: string,
  expression: string,
  context: SourceContext
): string {
  let message = `Parse error at line ${context.line}, column ${context.column}: ${reason}`;
  if (context.lineText.length > 0) {
    message += `\n${context.lineText}\n${context.pointer}`;
  }
  return `${message}\nExpression:\n${expression}`;
}

export type EvaluationErrorKind = "MissingVariable";

/** Error produced when an evaluation cannot complete. */
export class EvaluationError extends Error {
  readonly kind: EvaluationErrorKind = "MissingVariable";

  constructor(readonly variableName: string) {
    super(`Variable '${variableName}' not found`);
    this.name = "EvaluationError";
  }
}
