export { parseFormula, FormulaParser, type ParseResult, type ParserOptions } from "./parser.js";
export { Formula } from "./formula.js";
export { BindingContext, bindingEntries, type Bindings } from "./binding-context.js";
export { evaluateNode, isTruthy, EQUALITY_EPSILON, type EvaluationResult, type EvaluationOptions } from "./evaluator.js";
export { ParseError, EvaluationError, buildSourceContext, type ParseErrorKind, type EvaluationErrorKind, type SourceContext } from "./errors.js";
export { tokenize, type Token, type TokenKind } from "./tokenizer.js";
export { roundHalfEven, clamp, clamp01, lerp } from "./functions.js";
export { DefaultRandomProvider, SeededRandomProvider, FixedRandomProvider, type RandomProvider } from "./random.js";
export { SeededRng, createRng } from "./prng.js";
export type * from "./ast.js";
