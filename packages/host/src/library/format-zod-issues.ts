// ─── Zod Issue Formatter ───────────────────────────────────────────
// Turns the schema issues of a rejected formula library into the
// single line FormulaLibrary logs. A library with many bad entries
// reports the first few and counts the rest.

/** The part of a Zod issue the library log line needs. */
export interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

export const MAX_REPORTED_ISSUES = 5;

/** `formulas.3.expression`, or `(root)` when the document itself is wrong. */
export function formatIssuePath(path: ZodIssueLike["path"]): string {
  return path.length > 0 ? path.join(".") : "(root)";
}

/**
 * @example
 * formatZodIssues([{ path: ["formulas", 0, "id"], message: "Required" }])
 * // => "Validation failed: formulas.0.id: Required"
 */
export function formatZodIssues(
  issues: readonly ZodIssueLike[],
  limit: number = MAX_REPORTED_ISSUES
): string {
  const shown = issues.slice(0, Math.max(0, limit));
  const details = shown.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`);
  const hidden = issues.length - shown.length;
  if (hidden > 0) {
    details.push(`and ${hidden} more`);
  }
  return `Validation failed: ${details.join("; ")}`;
}
