/**
 * Grid Formula Engine - Core Type Definitions
 */

// ============================================================================
// Cell Types
// ============================================================================

/**
 * The unit of grid state.
 *
 * `input` is the raw user text: empty, a plain literal, or a formula starting
 * with {@link FORMULA_MARKER}. `displayValue` and `hasError` are derived by
 * recalculation and are never edited directly.
 */
export interface Cell {
  /** Raw user text */
  input: string;
  /** Last computed/formatted value shown to the user */
  displayValue: string;
  /** True when the formula failed or the cell sits on/behind a reference cycle */
  hasError: boolean;
}

/** Leading character that marks formula input */
export const FORMULA_MARKER = '=';

/** Value shown in any cell whose formula could not be evaluated */
export const ERROR_SENTINEL = '#ERROR';

export function createEmptyCell(): Cell {
  return { input: '', displayValue: '', hasError: false };
}

export function isFormulaInput(input: string): boolean {
  return input.startsWith(FORMULA_MARKER);
}

// ============================================================================
// Cell Reference Types
// ============================================================================

export interface CellRef {
  row: number;
  col: number;
}

export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/** Key format: "row_col" */
export type CellKey = string;

export function cellKey(row: number, col: number): CellKey {
  return `${row}_${col}`;
}

export function parseKey(key: CellKey): CellRef {
  const [row, col] = key.split('_').map(Number);
  return { row, col };
}

// ============================================================================
// Grid Types
// ============================================================================

export interface GridDimensions {
  rows: number;
  cols: number;
}

export function inBounds(dims: GridDimensions, row: number, col: number): boolean {
  return row >= 0 && row < dims.rows && col >= 0 && col < dims.cols;
}
