/**
 * Grid Formula Engine - Cell Reference Codec
 *
 * Converts between A1-style labels and zero-based coordinates.
 * Columns use bijective base-26 (A=0 … Z=25, AA=26, AB=27, …).
 */

import { CellRef, CellRange } from '../types/index.js';
import { FormulaError } from '../formula/FormulaError.js';

const REFERENCE_PATTERN = /^([A-Z]+)([0-9]+)$/;

/**
 * Convert column letters to a zero-based column index.
 */
export function columnLabelToIndex(label: string): number {
  const letters = label.toUpperCase();
  if (!/^[A-Z]+$/.test(letters)) {
    throw new FormulaError('InvalidReference', `Invalid column label: ${label}`);
  }

  let col = 0;
  for (let i = 0; i < letters.length; i++) {
    col = col * 26 + (letters.charCodeAt(i) - 64);
  }
  return col - 1;
}

/**
 * Convert a zero-based column index to column letters.
 */
export function columnIndexToLabel(index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new FormulaError('InvalidReference', `Invalid column index: ${index}`);
  }

  let label = '';
  let c = index + 1;
  while (c > 0) {
    const remainder = (c - 1) % 26;
    label = String.fromCharCode(65 + remainder) + label;
    c = Math.floor((c - 1) / 26);
  }
  return label;
}

/**
 * Decode a label like "AA12" into `{ row: 11, col: 26 }`.
 * Letters are case-insensitive; the row must be a positive integer.
 */
export function decodeReference(label: string): CellRef {
  const match = REFERENCE_PATTERN.exec(label.toUpperCase());
  if (!match) {
    throw new FormulaError('InvalidReference', `Invalid cell reference: ${label}`);
  }

  const rowNum = parseInt(match[2], 10);
  if (!Number.isSafeInteger(rowNum) || rowNum <= 0) {
    throw new FormulaError('InvalidReference', `Invalid row number in reference: ${label}`);
  }

  return { row: rowNum - 1, col: columnLabelToIndex(match[1]) };
}

/**
 * Encode zero-based coordinates as an uppercase label.
 */
export function encodeReference(row: number, col: number): string {
  if (!Number.isInteger(row) || row < 0) {
    throw new FormulaError('InvalidReference', `Invalid row index: ${row}`);
  }
  return columnIndexToLabel(col) + (row + 1);
}

/**
 * Non-throwing variant of {@link decodeReference}.
 */
export function parseCellReference(label: string): CellRef | null {
  try {
    return decodeReference(label.trim());
  } catch (error) {
    if (error instanceof FormulaError) return null;
    throw error;
  }
}

/**
 * Parse "A1:B10" (or a single "A1") into a normalized bounding box.
 */
export function parseRangeReference(text: string): CellRange | null {
  const parts = text.split(':');

  if (parts.length === 1) {
    const cell = parseCellReference(parts[0]);
    if (!cell) return null;
    return { startRow: cell.row, startCol: cell.col, endRow: cell.row, endCol: cell.col };
  }

  if (parts.length === 2) {
    const start = parseCellReference(parts[0]);
    const end = parseCellReference(parts[1]);
    if (!start || !end) return null;
    return boundingBox(start, end);
  }

  return null;
}

/**
 * Inclusive rectangle spanned by two corners, in either order.
 */
export function boundingBox(a: CellRef, b: CellRef): CellRange {
  return {
    startRow: Math.min(a.row, b.row),
    startCol: Math.min(a.col, b.col),
    endRow: Math.max(a.row, b.row),
    endCol: Math.max(a.col, b.col),
  };
}
