/**
 * Grid Formula Engine - Formula Dependency Graph
 *
 * Directed graph between formula cells, rebuilt on every full recompute.
 * An edge A -> B means "A's formula references B".
 *
 * Key features:
 * - Textual extraction of the cells a formula mentions
 * - Topological calculation order (Kahn's algorithm)
 * - Cycle members and their dependents reported as circular
 */

import {
  CellKey,
  CellRef,
  GridDimensions,
  cellKey,
  inBounds,
} from '../types/index.js';
import { boundingBox, parseCellReference } from '../reference/CellReference.js';

// ===========================================================================
// Formula Reference Extraction
// ===========================================================================

export interface ExtractOptions {
  /** Also report every interior cell of each `REF:REF` range */
  expandRanges?: boolean;
  /** Drop coordinates outside these dimensions */
  bounds?: GridDimensions;
}

// A label directly after a digit or '.' is the exponent of a number ("1E5")
const REFERENCE_SCAN = /(?<![0-9.])[A-Z]+[0-9]+/g;
const RANGE_SCAN = /(?<![0-9.])([A-Z]+[0-9]+):([A-Z]+[0-9]+)/g;

/**
 * Cells a formula mentions, in order of first appearance and without
 * duplicates. Purely textual: by default `SUM(A1:A3)` yields A1 and A3 only.
 */
export function extractDependencies(formula: string, options: ExtractOptions = {}): CellRef[] {
  const seen = new Set<CellKey>();
  const result: CellRef[] = [];

  const add = (ref: CellRef): void => {
    if (options.bounds && !inBounds(options.bounds, ref.row, ref.col)) return;
    const key = cellKey(ref.row, ref.col);
    if (seen.has(key)) return;
    seen.add(key);
    result.push(ref);
  };

  for (const match of formula.matchAll(REFERENCE_SCAN)) {
    const ref = parseCellReference(match[0]);
    if (ref) add(ref);
  }

  if (options.expandRanges) {
    for (const match of formula.matchAll(RANGE_SCAN)) {
      const start = parseCellReference(match[1]);
      const end = parseCellReference(match[2]);
      if (!start || !end) continue;

      const box = boundingBox(start, end);
      const endRow = options.bounds ? Math.min(box.endRow, options.bounds.rows - 1) : box.endRow;
      const endCol = options.bounds ? Math.min(box.endCol, options.bounds.cols - 1) : box.endCol;
      for (let row = box.startRow; row <= endRow; row++) {
        for (let col = box.startCol; col <= endCol; col++) {
          add({ row, col });
        }
      }
    }
  }

  return result;
}

// ===========================================================================
// Dependency Graph
// ===========================================================================

export interface DependencyInfo {
  /** Cells that this cell's formula references */
  precedents: Set<CellKey>;
  /** Formula cells that reference this cell */
  dependents: Set<CellKey>;
}

export interface CalculationOrder {
  /** Formula cells in a safe evaluation order */
  order: CellKey[];
  /** Formula cells on a cycle or depending on one, in registration order */
  circular: CellKey[];
}

export class DependencyGraph {
  /** Map of cell -> its dependency info */
  private graph: Map<CellKey, DependencyInfo> = new Map();

  /** Cells registered through setDependencies, in registration order */
  private formulaCells: Set<CellKey> = new Set();

  // ===========================================================================
  // Dependency Management
  // ===========================================================================

  /**
   * Register a formula cell and the cells its formula references.
   * Precedents that never get registered themselves are constants and add
   * nothing to the calculation order.
   */
  setDependencies(cell: CellKey, precedents: CellKey[]): void {
    this.removeDependencies(cell);

    const info = this.ensure(cell);
    for (const precedent of precedents) {
      info.precedents.add(precedent);
      this.ensure(precedent).dependents.add(cell);
    }
    this.formulaCells.add(cell);
  }

  /**
   * Forget a cell's formula. Its dependents keep pointing at it.
   */
  removeDependencies(cell: CellKey): void {
    const info = this.graph.get(cell);
    if (!info) return;

    for (const precedent of info.precedents) {
      const precedentInfo = this.graph.get(precedent);
      if (!precedentInfo) continue;
      precedentInfo.dependents.delete(cell);
      if (precedentInfo.precedents.size === 0 && precedentInfo.dependents.size === 0) {
        this.graph.delete(precedent);
      }
    }

    info.precedents.clear();
    this.formulaCells.delete(cell);

    if (info.dependents.size === 0) {
      this.graph.delete(cell);
    }
  }

  hasFormula(cell: CellKey): boolean {
    return this.formulaCells.has(cell);
  }

  /**
   * Get direct precedents (cells that this cell references)
   */
  getPrecedents(cell: CellKey): CellKey[] {
    return Array.from(this.graph.get(cell)?.precedents ?? []);
  }

  /**
   * Get direct dependents (formula cells that reference this cell)
   */
  getDependents(cell: CellKey): CellKey[] {
    return Array.from(this.graph.get(cell)?.dependents ?? []);
  }

  // ===========================================================================
  // Calculation Order
  // ===========================================================================

  /**
   * Kahn's algorithm over formula cells. In-degree counts precedents that
   * are formula cells, a self-reference included, so a cell on a cycle or
   * downstream of one never reaches zero and ends up in `circular`.
   */
  getCalculationOrder(): CalculationOrder {
    const inDegree = new Map<CellKey, number>();
    for (const cell of this.formulaCells) {
      let count = 0;
      for (const precedent of this.getPrecedents(cell)) {
        if (this.formulaCells.has(precedent)) count++;
      }
      inDegree.set(cell, count);
    }

    const queue: CellKey[] = [];
    for (const [cell, degree] of inDegree) {
      if (degree === 0) queue.push(cell);
    }

    for (let head = 0; head < queue.length; head++) {
      for (const dependent of this.getDependents(queue[head])) {
        const degree = inDegree.get(dependent);
        if (degree === undefined) continue;
        inDegree.set(dependent, degree - 1);
        if (degree - 1 === 0) queue.push(dependent);
      }
    }

    const ordered = new Set(queue);
    const circular = Array.from(this.formulaCells).filter((cell) => !ordered.has(cell));
    return { order: queue, circular };
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Clear the entire graph
   */
  clear(): void {
    this.graph.clear();
    this.formulaCells.clear();
  }

  /**
   * Get statistics about the graph
   */
  getStats(): {
    totalCells: number;
    formulaCells: number;
    totalEdges: number;
  } {
    let totalEdges = 0;
    for (const info of this.graph.values()) {
      totalEdges += info.precedents.size;
    }

    return {
      totalCells: this.graph.size,
      formulaCells: this.formulaCells.size,
      totalEdges,
    };
  }

  /**
   * Debug: Print the graph
   */
  debug(): void {
    console.log('=== Dependency Graph ===');
    for (const [cell, info] of this.graph) {
      console.log(`${cell}${this.formulaCells.has(cell) ? ' (formula)' : ''}:`);
      console.log(`  Precedents: ${Array.from(info.precedents).join(', ') || 'none'}`);
      console.log(`  Dependents: ${Array.from(info.dependents).join(', ') || 'none'}`);
    }
  }

  private ensure(cell: CellKey): DependencyInfo {
    let info = this.graph.get(cell);
    if (!info) {
      info = { precedents: new Set(), dependents: new Set() };
      this.graph.set(cell, info);
    }
    return info;
  }
}
