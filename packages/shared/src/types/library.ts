// ─── Formula Library Types ─────────────────────────────────────────
// The plain (id, expression) pairs that registries import and export.
// Only source text is ever persisted, never the compiled tree.

/** A formula as stored in a library file. */
export interface FormulaDefinition {
  readonly id: string;
  readonly expression: string;
}

/** The document shape of a formula library file. */
export interface FormulaLibraryDocument {
  readonly formulas: readonly FormulaDefinition[];
}
