/**
 * Grid Formula Engine - Built-in Functions
 *
 * Every function receives its resolved primary arguments as entries. `numeric`
 * is false for entries that stand in for empty or non-numeric cells; those still
 * count as 0 for arithmetic aggregates but are excluded from COUNT.
 */

import { FunctionName } from './FormulaParser.js';

export interface ArgEntry {
  value: number;
  numeric: boolean;
}

export type FormulaFunction = (entries: ArgEntry[], secondary: number | null) => number;

const values = (entries: ArgEntry[]): number[] => entries.map((e) => e.value);

/**
 * Round half away from zero.
 */
export function roundTo(value: number, places: number): number {
  const factor = Math.pow(10, places);
  if (!Number.isFinite(factor) || factor === 0) return value;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

export const FUNCTIONS: Record<FunctionName, FormulaFunction> = {
  SUM: (entries) => values(entries).reduce((a, b) => a + b, 0),

  // No entries gives 0, not the multiplicative identity
  PRODUCT: (entries) =>
    entries.length === 0 ? 0 : values(entries).reduce((a, b) => a * b, 1),

  AVERAGE: (entries) =>
    entries.length === 0 ? 0 : values(entries).reduce((a, b) => a + b, 0) / entries.length,

  MIN: (entries) =>
    entries.length === 0 ? 0 : values(entries).reduce((a, b) => Math.min(a, b), Infinity),

  MAX: (entries) =>
    entries.length === 0 ? 0 : values(entries).reduce((a, b) => Math.max(a, b), -Infinity),

  COUNT: (entries) => entries.filter((e) => e.numeric).length,

  ABS: (entries) => (entries.length === 0 ? 0 : Math.abs(entries[0].value)),

  ROUND: (entries, secondary) => {
    if (entries.length === 0) return 0;
    const places = secondary !== null && Number.isInteger(secondary) ? secondary : 0;
    return roundTo(entries[0].value, places);
  },
};
