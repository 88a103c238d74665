// ─── @formula-engine/host ──────────────────────────────────────────
// Collaborators around the core engine: registry, runner, the cached
// FormulaApi entry point and JSON library import/export.

export { FormulaRegistry, type FormulaRegistryOptions } from "./registry/formula-registry.js";
export {
  FormulaRunner,
  formatRunnerStats,
  type FormulaRunnerOptions,
  type InputEntry,
  type RunnerResult,
  type RunnerStats,
} from "./runner/formula-runner.js";
export {
  FormulaApi,
  FormulaRequest,
  defaultFormulaApi,
  formulaCacheId,
  type FormulaApiOptions,
} from "./api/formula-api.js";
export { FormulaLibrary, type FormulaLibraryOptions } from "./library/formula-library.js";
export { formatZodIssues, formatIssuePath, MAX_REPORTED_ISSUES, type ZodIssueLike } from "./library/format-zod-issues.js";
export { FormulaNotFoundError, FormulaRegistrationError } from "./errors.js";
export {
  createConsoleLogger,
  silentLogger,
  describeError,
  type FormulaLogger,
} from "./logging/logger.js";
