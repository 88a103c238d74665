// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of formula library JSON files.
// Raw JSON enters here; typed data leaves.

import { z } from "zod";

// ─── Primitives ────────────────────────────────────────────────────

const NonBlankString = (field: string) =>
  z.string().refine((value) => value.trim().length > 0, {
    message: `${field} must not be blank`,
  });

// ─── Library ───────────────────────────────────────────────────────

export const FormulaDefinitionSchema = z.object({
  id: NonBlankString("id"),
  expression: NonBlankString("expression"),
});

export const FormulaLibrarySchema = z.object({
  formulas: z.array(FormulaDefinitionSchema),
});

/** Inferred type from the Zod schema. Mirrors FormulaLibraryDocument. */
export type ParsedFormulaLibrary = z.infer<typeof FormulaLibrarySchema>;

/**
 * Parses raw JSON into a validated formula library.
 * Returns the parsed data or throws a ZodError with detailed issues.
 */
export function parseFormulaLibrary(raw: unknown): ParsedFormulaLibrary {
  return FormulaLibrarySchema.parse(raw);
}

/** Safe parse variant. Returns a discriminated result instead of throwing. */
export function safeParseFormulaLibrary(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedFormulaLibrary> {
  return FormulaLibrarySchema.safeParse(raw);
}
