/**
 * Grid Formula Engine - Formula Errors
 *
 * Every failure while evaluating a single formula is one of these codes.
 * `CircularReference` is only ever raised at the grid level, since a single
 * formula cannot see the rest of the graph.
 */

export type FormulaErrorCode =
  | 'InvalidFormula'
  | 'InvalidReference'
  | 'DivisionByZero'
  | 'InvalidFunction'
  | 'InvalidRange'
  | 'CircularReference';

export class FormulaError extends Error {
  readonly code: FormulaErrorCode;

  constructor(code: FormulaErrorCode, message: string) {
    super(message);
    this.name = 'FormulaError';
    this.code = code;
  }
}

export function isFormulaError(value: unknown): value is FormulaError {
  return value instanceof FormulaError;
}

/**
 * Result of evaluating one formula. Errors are values, not exceptions.
 */
export type FormulaResult =
  | { ok: true; value: string }
  | { ok: false; error: FormulaError };
