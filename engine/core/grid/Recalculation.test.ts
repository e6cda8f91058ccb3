/**
 * Grid Formula Engine - Recalculation Tests
 *
 * Covers:
 * - recomputeGrid on bare cell arrays
 * - Range dependency modes (expanded vs endpoints)
 * - Derived state reset for plain cells
 */

import { describe, it, expect } from 'vitest';
import { recomputeGrid, displayValueSource } from './Recalculation.js';
import { normalizeInput } from './InputNormalization.js';
import { Cell } from '../types/index.js';

function cell(input: string): Cell {
  return { input, displayValue: '', hasError: false };
}

/**
 *   | A        | B
 * 1 | 10       | =SUM(A1:A3)
 * 2 | =A1*2    |
 * 3 | 30       |
 */
function rangeSheet(): Cell[][] {
  return [
    [cell('10'), cell('=SUM(A1:A3)')],
    [cell('=A1*2'), cell('')],
    [cell('30'), cell('')],
  ];
}

describe('recomputeGrid', () => {
  it('should order range interiors before the range reader by default', () => {
    const cells = rangeSheet();
    const result = recomputeGrid(cells);

    expect(result.order).toEqual([
      { row: 1, col: 0 },
      { row: 0, col: 1 },
    ]);
    expect(cells[0][1].displayValue).toBe('60');
    expect(cells[1][0].displayValue).toBe('20');
  });

  it('should only see range endpoints in endpoints mode', () => {
    const cells = rangeSheet();
    const result = recomputeGrid(cells, { rangeDependencies: 'endpoints' });

    // B1 runs first and still sees A2 as empty
    expect(result.order).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
    ]);
    expect(cells[0][1].displayValue).toBe('40');
    expect(cells[1][0].displayValue).toBe('20');
  });

  it('should reset derived state of plain cells', () => {
    const cells = [[{ input: '5', displayValue: '#ERROR', hasError: true }]];
    recomputeGrid(cells);
    expect(cells[0][0]).toEqual({ input: '5', displayValue: '5', hasError: false });
  });

  it('should mark circular cells without evaluating them', () => {
    const cells = [[cell('=B1'), cell('=A1'), cell('=1+1')]];
    const result = recomputeGrid(cells);

    expect(result.circular).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
    ]);
    expect(result.evaluatedCount).toBe(1);
    expect(cells[0].map((c) => c.displayValue)).toEqual(['#ERROR', '#ERROR', '2']);
    expect(result.errors).toEqual([]);
  });

  it('should collect evaluation errors', () => {
    const cells = [[cell('=1/0'), cell('=FOO(1)')]];
    const result = recomputeGrid(cells);

    expect(result.errors.map((e) => e.error.code)).toEqual(['DivisionByZero', 'InvalidFunction']);
    expect(cells[0].every((c) => c.hasError)).toBe(true);
  });

  it('should accept ragged rows', () => {
    const cells = [[cell('1'), cell('2')], [cell('=SUM(A1:B1)')]];
    recomputeGrid(cells);
    expect(cells[1][0].displayValue).toBe('3');
  });
});

describe('displayValueSource', () => {
  it('should read missing cells as undefined', () => {
    const source = displayValueSource([[{ input: '1', displayValue: '1', hasError: false }]]);
    expect(source.getCellValue(0, 0)).toBe('1');
    expect(source.getCellValue(0, 1)).toBeUndefined();
    expect(source.getCellValue(3, 0)).toBeUndefined();
    expect(source.dimensions).toEqual({ rows: 1, cols: 1 });
  });
});

describe('normalizeInput', () => {
  it('should rewrite numbers and close formulas', () => {
    expect(normalizeInput('0042')).toBe('42');
    expect(normalizeInput('2.50')).toBe('2.5');
    expect(normalizeInput('.5')).toBe('0.5');
    expect(normalizeInput('=(1+2')).toBe('=(1+2)');
    expect(normalizeInput('')).toBe('');
    expect(normalizeInput('1,000')).toBe('1,000');
    expect(normalizeInput(' 7 ')).toBe(' 7 ');
    expect(normalizeInput('\t1.50')).toBe('\t1.50');
    expect(normalizeInput('1e21')).toBe('1000000000000000000000');
  });
});
