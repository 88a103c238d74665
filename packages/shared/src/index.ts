// ─── @formula-engine/shared ────────────────────────────────────────
// Pure TypeScript formula engine. No framework dependencies.
// Re-exports the parser, evaluator, random providers and the library schema.

export * from "./types/index.js";
export * from "./engine/index.js";
export * from "./schema/index.js";
