/**
 * Grid Formula Engine - Formula Module Exports
 */

export { FormulaError, isFormulaError } from './FormulaError.js';
export type { FormulaErrorCode, FormulaResult } from './FormulaError.js';

export { tokenize } from './Tokenizer.js';
export type { Token } from './Tokenizer.js';

export {
  parseFormula,
  balanceParentheses,
  isFunctionName,
  SUPPORTED_FUNCTIONS,
} from './FormulaParser.js';
export type { AST, BinaryOp, CallNode, FunctionArg, FunctionName } from './FormulaParser.js';

export { FUNCTIONS, roundTo } from './FormulaFunctions.js';
export type { ArgEntry, FormulaFunction } from './FormulaFunctions.js';

export {
  evaluateFormula,
  formatNumber,
  parseNumericLiteral,
  lookupFrom,
} from './FormulaEvaluator.js';
export type { CellValueSource } from './FormulaEvaluator.js';

export { DependencyGraph, extractDependencies } from './DependencyGraph.js';
export type { DependencyInfo, CalculationOrder, ExtractOptions } from './DependencyGraph.js';
