/**
 * Grid Formula Engine - Formula Evaluator
 *
 * Evaluates a marker-free formula body against a source of cell values and
 * produces the formatted display string.
 *
 * Non-numeric cell text is handled differently by context:
 * - inside a function argument it counts as 0 (and is not counted by COUNT)
 * - as a bare operand of arithmetic it fails the whole formula
 */

import { CellRef, GridDimensions } from '../types/index.js';
import { boundingBox } from '../reference/CellReference.js';
import { FormulaError, FormulaResult, isFormulaError } from './FormulaError.js';
import { AST, BinaryOp, CallNode, FunctionArg, balanceParentheses, parseFormula } from './FormulaParser.js';
import { ArgEntry, FUNCTIONS } from './FormulaFunctions.js';

type BinaryNode = Extract<AST, { type: 'bin' }>;

// =============================================================================
// Value Source
// =============================================================================

/**
 * Read access to the current display text of cells.
 * `undefined` and whitespace-only text both mean "empty".
 */
export interface CellValueSource {
  getCellValue(row: number, col: number): string | undefined;
  /** Extent of readable cells; ranges are clipped to it when present */
  readonly dimensions?: GridDimensions;
}

/**
 * Adapt a plain lookup callback to a CellValueSource.
 */
export function lookupFrom(
  fn: (row: number, col: number) => string | undefined,
  dimensions?: GridDimensions
): CellValueSource {
  return { getCellValue: fn, dimensions };
}

// =============================================================================
// Number Handling
// =============================================================================

const NUMERIC_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse text that is entirely a decimal number literal, surrounding
 * whitespace allowed. Returns null for anything else ("12abc", "", "1,000").
 */
export function parseNumericLiteral(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMERIC_LITERAL.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Whole numbers print without decimals, everything else with up to six
 * significant digits and no trailing zeros.
 */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    // toFixed switches to exponent notation from 1e21 up
    return Math.abs(value) < 1e21 ? value.toFixed(0) : BigInt(value).toString();
  }
  return String(Number(value.toPrecision(6)));
}

// =============================================================================
// Evaluation
// =============================================================================

function evaluateNode(node: AST, source: CellValueSource): number {
  switch (node.type) {
    case 'num':
      return node.value;

    case 'ref':
      return resolveOperand(node.ref, source);

    case 'unary': {
      const operand = evaluateNode(node.operand, source);
      return node.op === '-' ? -operand : operand;
    }

    case 'bin':
      return evaluateBinary(node, source);

    case 'call':
      return evaluateCall(node, source);
  }
}

/**
 * Operator chains ("1+2+3+…") parse left-deep; the left spine is walked in a
 * loop so chain length does not grow the stack.
 */
function evaluateBinary(node: BinaryNode, source: CellValueSource): number {
  const chain: BinaryNode[] = [];
  let current: AST = node;
  while (current.type === 'bin') {
    chain.push(current);
    current = current.left;
  }

  let value = evaluateNode(current, source);
  for (let i = chain.length - 1; i >= 0; i--) {
    value = applyOperator(chain[i].op, value, evaluateNode(chain[i].right, source));
  }
  return value;
}

function applyOperator(op: BinaryOp, left: number, right: number): number {
  switch (op) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0) {
        throw new FormulaError('DivisionByZero', 'Division by zero');
      }
      return left / right;
  }
}

/**
 * A bare reference used as an arithmetic operand.
 */
function resolveOperand(ref: CellRef, source: CellValueSource): number {
  const text = source.getCellValue(ref.row, ref.col);
  if (text === undefined || text.trim() === '') return 0;

  const value = parseNumericLiteral(text);
  if (value === null) {
    throw new FormulaError('InvalidFormula', `Cell value is not a number: ${text.trim()}`);
  }
  return value;
}

function evaluateCall(node: CallNode, source: CellValueSource): number {
  const entries: ArgEntry[] = [];
  for (const arg of node.segments[0]) {
    collectEntries(arg, source, entries);
  }
  return FUNCTIONS[node.name](entries, evaluateSecondary(node.segments[1], source));
}

/**
 * The value after the first ';' (ROUND's decimal places). Only a lone
 * number or nested call counts; anything else reads as absent.
 */
function evaluateSecondary(segment: FunctionArg[] | undefined, source: CellValueSource): number | null {
  if (!segment || segment.length !== 1) return null;
  const [arg] = segment;
  return arg.kind === 'scalar' ? evaluateNode(arg.node, source) : null;
}

function collectEntries(arg: FunctionArg, source: CellValueSource, out: ArgEntry[]): void {
  switch (arg.kind) {
    case 'scalar':
      out.push({ value: evaluateNode(arg.node, source), numeric: true });
      return;

    case 'cell': {
      const text = source.getCellValue(arg.ref.row, arg.ref.col);
      const value = text === undefined ? null : parseNumericLiteral(text);
      out.push(value === null ? { value: 0, numeric: false } : { value, numeric: true });
      return;
    }

    case 'range': {
      const box = boundingBox(arg.start, arg.end);
      const dims = source.dimensions;
      const endRow = dims ? Math.min(box.endRow, dims.rows - 1) : box.endRow;
      const endCol = dims ? Math.min(box.endCol, dims.cols - 1) : box.endCol;
      for (let row = box.startRow; row <= endRow; row++) {
        for (let col = box.startCol; col <= endCol; col++) {
          const text = source.getCellValue(row, col);
          if (text === undefined || text.trim() === '') continue;
          const value = parseNumericLiteral(text);
          out.push(value === null ? { value: 0, numeric: false } : { value, numeric: true });
        }
      }
      return;
    }
  }
}

/**
 * Evaluate a formula body (without the leading '=').
 *
 * Formula failures come back as `{ ok: false }`; any other exception is a
 * bug and propagates.
 */
export function evaluateFormula(formula: string, source: CellValueSource): FormulaResult {
  try {
    const ast = parseFormula(balanceParentheses(formula));
    const value = evaluateNode(ast, source);

    if (Number.isNaN(value)) {
      throw new FormulaError('InvalidFormula', 'Result is not a number');
    }
    if (!Number.isFinite(value)) {
      throw new FormulaError('DivisionByZero', 'Result is infinite');
    }

    return { ok: true, value: formatNumber(value) };
  } catch (error) {
    if (isFormulaError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
