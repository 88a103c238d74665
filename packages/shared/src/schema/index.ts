export {
  FormulaDefinitionSchema,
  FormulaLibrarySchema,
  parseFormulaLibrary,
  safeParseFormulaLibrary,
  type ParsedFormulaLibrary,
} from "./validation.js";
