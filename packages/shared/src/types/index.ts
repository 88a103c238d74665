export type { FormulaDefinition, FormulaLibraryDocument } from "./library.js";
