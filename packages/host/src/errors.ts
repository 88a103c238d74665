// ─── Host Errors ───────────────────────────────────────────────────

import type { ParseError } from "@formula-engine/shared";

/** Returned by FormulaRunner.tryEvaluate for an id nothing is registered under. */
export class FormulaNotFoundError extends Error {
  readonly kind = "FormulaNotFound";

  constructor(readonly formulaId: string) {
    super(`Formula '${formulaId}' not found`);
    this.name = "FormulaNotFoundError";
  }
}

/** Thrown by FormulaApi when an expression does not compile. */
export class FormulaRegistrationError extends Error {
  constructor(
    readonly formulaId: string,
    readonly expression: string,
    readonly parseError: ParseError
  ) {
    super(`Failed to register formula '${expression}'`, { cause: parseError });
    this.name = "FormulaRegistrationError";
  }
}
