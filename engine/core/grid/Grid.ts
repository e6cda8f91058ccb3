/**
 * Grid Formula Engine - Grid
 *
 * Owns a fixed-size array of cells and keeps display values consistent
 * with inputs. Every edit is followed by a full recompute; there is no
 * dirty tracking.
 */

import {
  Cell,
  CellRange,
  ERROR_SENTINEL,
  GridDimensions,
  createEmptyCell,
  inBounds,
  isFormulaInput,
} from '../types/index.js';
import { CellValueSource, evaluateFormula } from '../formula/FormulaEvaluator.js';
import { normalizeInput } from './InputNormalization.js';
import {
  RangeDependencyMode,
  RecomputeResult,
  recomputeGrid,
} from './Recalculation.js';

// =============================================================================
// Configuration
// =============================================================================

export interface GridConfig {
  /** Number of rows */
  rows?: number;
  /** Number of columns */
  cols?: number;
  /** How range arguments contribute dependency edges */
  rangeDependencies?: RangeDependencyMode;
}

export const DEFAULT_GRID_CONFIG: Required<GridConfig> = {
  rows: 20,
  cols: 10,
  rangeDependencies: 'expanded',
};

export interface GridEvents {
  /** Called after every full recompute */
  onRecalculate?: (result: RecomputeResult) => void;
  /** Called for each edited cell once the edit has been recalculated */
  onCellChange?: (row: number, col: number, cell: Readonly<Cell>) => void;
}

export interface CellEdit {
  row: number;
  col: number;
  input: string;
}

export interface GridStats {
  rows: number;
  cols: number;
  nonEmptyCells: number;
  formulaCells: number;
  errorCells: number;
  recalculations: number;
}

export class GridBoundsError extends Error {
  readonly row: number;
  readonly col: number;

  constructor(row: number, col: number, dims: GridDimensions) {
    super(`Cell (${row}, ${col}) is outside the ${dims.rows}x${dims.cols} grid`);
    this.name = 'GridBoundsError';
    this.row = row;
    this.col = col;
  }
}

// =============================================================================
// Grid
// =============================================================================

export class Grid implements CellValueSource {
  private cells: Cell[][];
  private config: Required<GridConfig>;
  private events: GridEvents = {};
  private recalculations = 0;

  constructor(config: GridConfig = {}, events: GridEvents = {}) {
    this.config = { ...DEFAULT_GRID_CONFIG, ...config };
    if (!Number.isInteger(this.config.rows) || this.config.rows < 1 ||
        !Number.isInteger(this.config.cols) || this.config.cols < 1) {
      throw new RangeError(`Invalid grid size: ${this.config.rows}x${this.config.cols}`);
    }
    this.events = events;
    this.cells = Grid.createCells(this.config);
  }

  private static createCells(dims: GridDimensions): Cell[][] {
    return Array.from({ length: dims.rows }, () =>
      Array.from({ length: dims.cols }, createEmptyCell)
    );
  }

  get rows(): number {
    return this.config.rows;
  }

  get cols(): number {
    return this.config.cols;
  }

  get dimensions(): GridDimensions {
    return { rows: this.config.rows, cols: this.config.cols };
  }

  /**
   * Set event handlers
   */
  setEventHandlers(events: GridEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // Editing
  // ===========================================================================

  /**
   * Store new input for one cell and recompute the grid.
   */
  applyEdit(row: number, col: number, input: string): RecomputeResult {
    return this.applyEdits([{ row, col, input }]);
  }

  /**
   * Store several inputs (a paste or a multi-cell delete) with one recompute.
   * Bounds are checked for every edit before any cell changes.
   */
  applyEdits(edits: CellEdit[]): RecomputeResult {
    for (const edit of edits) {
      this.assertInBounds(edit.row, edit.col);
    }

    for (const edit of edits) {
      this.cells[edit.row][edit.col].input = normalizeInput(edit.input);
      this.evaluateCell(edit.row, edit.col);
    }

    const result = this.recompute();

    if (this.events.onCellChange) {
      for (const edit of edits) {
        this.events.onCellChange(edit.row, edit.col, this.getCell(edit.row, edit.col));
      }
    }

    return result;
  }

  /**
   * Evaluate one cell from the current display values of the others.
   * Values it reads may be stale; the next recompute is authoritative.
   */
  evaluateCell(row: number, col: number): Readonly<Cell> {
    const cell = this.cellAt(row, col);

    if (!isFormulaInput(cell.input)) {
      cell.displayValue = cell.input;
      cell.hasError = false;
      return { ...cell };
    }

    const result = evaluateFormula(cell.input.slice(1), this);
    if (result.ok) {
      cell.displayValue = result.value;
      cell.hasError = false;
    } else {
      cell.displayValue = ERROR_SENTINEL;
      cell.hasError = true;
    }
    return { ...cell };
  }

  /**
   * Full recompute of every cell.
   */
  recompute(): RecomputeResult {
    const result = recomputeGrid(this.cells, {
      rangeDependencies: this.config.rangeDependencies,
    });
    this.recalculations++;
    this.events.onRecalculate?.(result);
    return result;
  }

  /**
   * Empty every cell, or only those inside `range` (clipped to the grid).
   */
  clear(range?: CellRange): RecomputeResult {
    const startRow = Math.max(0, range?.startRow ?? 0);
    const startCol = Math.max(0, range?.startCol ?? 0);
    const endRow = Math.min(this.rows - 1, range?.endRow ?? this.rows - 1);
    const endCol = Math.min(this.cols - 1, range?.endCol ?? this.cols - 1);

    const edits: CellEdit[] = [];
    for (let row = startRow; row <= endRow; row++) {
      for (let col = startCol; col <= endCol; col++) {
        if (this.cells[row][col].input !== '') {
          edits.push({ row, col, input: '' });
        }
      }
    }
    return this.applyEdits(edits);
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  getCell(row: number, col: number): Readonly<Cell> {
    return { ...this.cellAt(row, col) };
  }

  getDisplayValue(row: number, col: number): string {
    return this.cellAt(row, col).displayValue;
  }

  getInput(row: number, col: number): string {
    return this.cellAt(row, col).input;
  }

  /**
   * Lookup used by formulas. Coordinates outside the grid read as empty.
   */
  getCellValue(row: number, col: number): string | undefined {
    if (!inBounds(this.dimensions, row, col)) return undefined;
    return this.cells[row][col].displayValue;
  }

  /**
   * Visit every cell with non-empty input, row-major.
   */
  forEachCell(callback: (cell: Readonly<Cell>, row: number, col: number) => void): void {
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        const cell = this.cells[row][col];
        if (cell.input !== '') {
          callback({ ...cell }, row, col);
        }
      }
    }
  }

  /**
   * Bounding box of all cells with input, or null when the grid is empty.
   */
  getUsedRange(): CellRange | null {
    let range: CellRange | null = null;
    this.forEachCell((_cell, row, col) => {
      if (!range) {
        range = { startRow: row, startCol: col, endRow: row, endCol: col };
        return;
      }
      range.startCol = Math.min(range.startCol, col);
      range.endRow = Math.max(range.endRow, row);
      range.endCol = Math.max(range.endCol, col);
    });
    return range;
  }

  /**
   * Get statistics
   */
  getStats(): GridStats {
    let nonEmptyCells = 0;
    let formulaCells = 0;
    let errorCells = 0;
    this.forEachCell((cell) => {
      nonEmptyCells++;
      if (isFormulaInput(cell.input)) formulaCells++;
      if (cell.hasError) errorCells++;
    });

    return {
      rows: this.rows,
      cols: this.cols,
      nonEmptyCells,
      formulaCells,
      errorCells,
      recalculations: this.recalculations,
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private assertInBounds(row: number, col: number): void {
    if (!Number.isInteger(row) || !Number.isInteger(col) || !inBounds(this.dimensions, row, col)) {
      throw new GridBoundsError(row, col, this.dimensions);
    }
  }

  private cellAt(row: number, col: number): Cell {
    this.assertInBounds(row, col);
    return this.cells[row][col];
  }
}

/**
 * Create a grid with default configuration
 */
export function createGrid(config?: GridConfig, events?: GridEvents): Grid {
  return new Grid(config, events);
}
