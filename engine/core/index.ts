/**
 * Grid Formula Engine - Core Module Exports
 *
 * This is the main entry point for the formula and recalculation core.
 */

// Types - export all
export * from './types/index.js';

// Reference Codec
export {
  decodeReference,
  encodeReference,
  columnLabelToIndex,
  columnIndexToLabel,
  parseCellReference,
  parseRangeReference,
  boundingBox,
} from './reference/CellReference.js';

// Formula Engine
export * from './formula/index.js';

// Grid Recalculation
export * from './grid/index.js';
