/**
 * Grid Formula Engine - Grid Module Exports
 */

export { Grid, GridBoundsError, DEFAULT_GRID_CONFIG, createGrid } from './Grid.js';
export type { GridConfig, GridEvents, GridStats, CellEdit } from './Grid.js';
export { recomputeGrid, displayValueSource } from './Recalculation.js';
export type {
  RangeDependencyMode,
  RecomputeOptions,
  RecomputeResult,
  CellEvaluationError,
} from './Recalculation.js';
export { normalizeInput } from './InputNormalization.js';
