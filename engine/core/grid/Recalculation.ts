/**
 * Grid Formula Engine - Full-Grid Recalculation
 *
 * One pass over a 2-D cell array:
 * 1. Plain cells show their input.
 * 2. Formula cells go into a fresh dependency graph.
 * 3. Kahn's algorithm gives the evaluation order; whatever it cannot reach
 *    is on a cycle (or behind one) and shows the error sentinel unevaluated.
 * 4. The rest are evaluated in order, each reading the display values of
 *    the cells before it.
 */

import {
  Cell,
  CellRef,
  ERROR_SENTINEL,
  GridDimensions,
  cellKey,
  isFormulaInput,
  parseKey,
} from '../types/index.js';
import { FormulaError } from '../formula/FormulaError.js';
import { DependencyGraph, extractDependencies } from '../formula/DependencyGraph.js';
import { CellValueSource, evaluateFormula } from '../formula/FormulaEvaluator.js';

/**
 * How a range argument contributes edges:
 * - `expanded`: every cell of the range
 * - `endpoints`: only the two corner labels written in the formula
 */
export type RangeDependencyMode = 'expanded' | 'endpoints';

export interface RecomputeOptions {
  rangeDependencies?: RangeDependencyMode;
}

export interface CellEvaluationError {
  cell: CellRef;
  error: FormulaError;
}

export interface RecomputeResult {
  /** Number of formula cells evaluated */
  evaluatedCount: number;
  /** Formula cells in the order they were evaluated */
  order: CellRef[];
  /** Formula cells flagged as circular, row-major */
  circular: CellRef[];
  /** Formula cells whose evaluation failed */
  errors: CellEvaluationError[];
  /** Time taken in ms */
  duration: number;
}

function dimensionsOf(cells: Cell[][]): GridDimensions {
  let cols = 0;
  for (const row of cells) {
    cols = Math.max(cols, row.length);
  }
  return { rows: cells.length, cols };
}

/**
 * Display values of a cell array as a value source. Missing cells read as empty.
 */
export function displayValueSource(cells: Cell[][]): CellValueSource {
  return {
    getCellValue: (row, col) => cells[row]?.[col]?.displayValue,
    dimensions: dimensionsOf(cells),
  };
}

function markCircular(cell: Cell): void {
  cell.displayValue = ERROR_SENTINEL;
  cell.hasError = true;
}

/**
 * Recompute every cell of `cells` in place.
 */
export function recomputeGrid(cells: Cell[][], options: RecomputeOptions = {}): RecomputeResult {
  const startTime = performance.now();
  const expandRanges = (options.rangeDependencies ?? 'expanded') === 'expanded';
  const bounds = dimensionsOf(cells);
  const graph = new DependencyGraph();

  // Build graph
  cells.forEach((rowCells, row) => {
    rowCells.forEach((cell, col) => {
      if (!isFormulaInput(cell.input)) {
        cell.displayValue = cell.input;
        cell.hasError = false;
        return;
      }
      const precedents = extractDependencies(cell.input.slice(1), { expandRanges, bounds });
      graph.setDependencies(
        cellKey(row, col),
        precedents.map((ref) => cellKey(ref.row, ref.col))
      );
    });
  });

  const { order, circular } = graph.getCalculationOrder();

  const circularRefs = circular.map(parseKey);
  for (const { row, col } of circularRefs) {
    markCircular(cells[row][col]);
  }

  // Evaluate in dependency order
  const source = displayValueSource(cells);
  const orderRefs = order.map(parseKey);
  const errors: CellEvaluationError[] = [];

  for (const ref of orderRefs) {
    const cell = cells[ref.row][ref.col];
    const result = evaluateFormula(cell.input.slice(1), source);
    if (result.ok) {
      cell.displayValue = result.value;
      cell.hasError = false;
    } else {
      cell.displayValue = ERROR_SENTINEL;
      cell.hasError = true;
      errors.push({ cell: ref, error: result.error });
    }
  }

  return {
    evaluatedCount: orderRefs.length,
    order: orderRefs,
    circular: circularRefs,
    errors,
    duration: performance.now() - startTime,
  };
}
