/**
 * Grid Formula Engine - Input Normalization
 *
 * Rewrites raw user text before it is stored:
 * - formulas get their missing ')' appended
 * - whole numbers lose decimals and leading zeros ("007" -> "7", "1.0" -> "1")
 * - other numbers use the default float form ("1.50" -> "1.5")
 * - anything else, padded numbers included, is stored unchanged
 */

import { isFormulaInput } from '../types/index.js';
import { balanceParentheses } from '../formula/FormulaParser.js';
import { formatNumber, parseNumericLiteral } from '../formula/FormulaEvaluator.js';

export function normalizeInput(input: string): string {
  if (isFormulaInput(input)) {
    return balanceParentheses(input);
  }

  // Padded text is not a number literal and stays as typed
  if (input !== input.trim()) return input;

  const value = parseNumericLiteral(input);
  if (value === null) return input;

  return Number.isInteger(value) ? formatNumber(value) : String(value);
}
