/**
 * Grid Formula Engine
 *
 * A formula evaluator and recalculation core for small fixed-size grids:
 * - A1-style references and rectangular ranges
 * - Arithmetic with standard precedence and built-in aggregate functions
 * - Dependency graph with cycle detection and topological recompute
 *
 * @example
 * ```typescript
 * import { Grid } from 'gridcalc-engine';
 *
 * const grid = new Grid({ rows: 20, cols: 10 });
 *
 * grid.applyEdit(0, 0, '10');
 * grid.applyEdit(1, 0, '32');
 * grid.applyEdit(2, 0, '=SUM(A1:A2)');
 *
 * console.log(grid.getDisplayValue(2, 0)); // "42"
 * ```
 */

export * from './core/index.js';
