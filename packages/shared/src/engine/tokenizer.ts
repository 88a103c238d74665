// ─── Tokenizer ─────────────────────────────────────────────────────
// Converts formula source text into tokens. A line break outside
// parentheses is not a token of its own: it marks the next token with
// `lineBreakBefore`, and the parser ends a statement there.

import { ParseError } from "./errors.js";

export type TokenKind =
  | "Number"
  | "Identifier"
  | "Operator"
  | "LParen"
  | "RParen"
  | "LBrace"
  | "RBrace"
  | "Comma"
  | "Semicolon"
  | "Question"
  | "Colon"
  | "EOF";

export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly position: number;
  /** A line break outside parentheses separates this token from the previous one. */
  readonly lineBreakBefore: boolean;
}

const OPERATOR_CHARS = new Set([
  "<",
  ">",
  "=",
  "!",
  "&",
  "|",
  "+",
  "-",
  "*",
  "/",
  "%",
  "^",
]);

// Two-character operators that must be matched before single-char ones
const TWO_CHAR_OPERATORS = new Set([
  "<=",
  ">=",
  "==",
  "!=",
  "&&",
  "||",
  "+=",
  "-=",
  "*=",
  "/=",
]);

const PUNCTUATION: Readonly<Record<string, TokenKind>> = {
  "(": "LParen",
  ")": "RParen",
  "{": "LBrace",
  "}": "RBrace",
  ",": "Comma",
  ";": "Semicolon",
  "?": "Question",
  ":": "Colon",
};

/**
 * Converts an expression string into an array of tokens ending in EOF.
 *
 * @throws {ParseError} on characters outside the language or malformed numbers.
 */
export function tokenize(expression: string): readonly Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let parenDepth = 0;
  let sawLineBreak = false;

  const push = (kind: TokenKind, value: string, position: number): void => {
    tokens.push({ kind, value, position, lineBreakBefore: sawLineBreak && parenDepth === 0 });
    sawLineBreak = false;
  };

  while (pos < expression.length) {
    const ch = expression.charAt(pos);

    if (isWhitespace(ch)) {
      if (ch === "\n" || ch === "\r") sawLineBreak = true;
      pos++;
      continue;
    }

    // Numbers: digits and dots, no sign, no exponent
    if (isDigit(ch) || ch === ".") {
      const start = pos;
      while (pos < expression.length && (isDigit(expression.charAt(pos)) || expression.charAt(pos) === ".")) {
        pos++;
      }
      const text = expression.slice(start, pos);
      if (!/^(\d+\.?\d*|\.\d+)$/.test(text)) {
        throw new ParseError("InvalidNumber", `Invalid number '${text}'`, expression, start);
      }
      push("Number", text, start);
      continue;
    }

    if (isIdentStart(ch)) {
      const start = pos;
      while (pos < expression.length && isIdentContinue(expression.charAt(pos))) {
        pos++;
      }
      push("Identifier", expression.slice(start, pos), start);
      continue;
    }

    // Operators (two-char first, then single-char)
    if (OPERATOR_CHARS.has(ch)) {
      const twoChar = expression.slice(pos, pos + 2);
      if (TWO_CHAR_OPERATORS.has(twoChar)) {
        push("Operator", twoChar, pos);
        pos += 2;
        continue;
      }
      // Lone `&` and `|` have no meaning
      if (ch === "&" || ch === "|") {
        throw new ParseError(
          "UnexpectedCharacter",
          `Unexpected character '${ch}'. Did you mean '${ch}${ch}'?`,
          expression,
          pos
        );
      }
      push("Operator", ch, pos);
      pos++;
      continue;
    }

    const punctuation = PUNCTUATION[ch];
    if (punctuation !== undefined) {
      push(punctuation, ch, pos);
      // Line breaks inside parentheses are plain whitespace
      if (punctuation === "LParen") parenDepth++;
      if (punctuation === "RParen") parenDepth = Math.max(0, parenDepth - 1);
      pos++;
      continue;
    }

    throw new ParseError("UnexpectedCharacter", `Unexpected character '${ch}'`, expression, pos);
  }

  push("EOF", "", pos);
  return tokens;
}

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isIdentStart(ch: string): boolean {
  return ch === "_" || /\p{L}/u.test(ch);
}

function isIdentContinue(ch: string): boolean {
  return ch === "_" || /[\p{L}\p{Nd}]/u.test(ch);
}
