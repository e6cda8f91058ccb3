/**
 * Grid Formula Engine - Formula Evaluator Tests
 *
 * Covers:
 * - Arithmetic with precedence and float division
 * - Division by zero
 * - Range semantics (direction, empty vs non-numeric cells)
 * - Bare reference vs function argument handling of text
 * - Built-in functions and their empty-argument results
 * - Nested calls and result formatting
 */

import { describe, it, expect } from 'vitest';
import {
  evaluateFormula,
  formatNumber,
  parseNumericLiteral,
  lookupFrom,
  CellValueSource,
} from './FormulaEvaluator.js';
import { decodeReference } from '../reference/CellReference.js';
import { cellKey } from '../types/index.js';

// =============================================================================
// Test Helpers
// =============================================================================

function sheet(values: Record<string, string> = {}): CellValueSource {
  const cells = new Map<string, string>();
  for (const [label, value] of Object.entries(values)) {
    const { row, col } = decodeReference(label);
    cells.set(cellKey(row, col), value);
  }
  return lookupFrom((row, col) => cells.get(cellKey(row, col)));
}

function evaluate(formula: string, values: Record<string, string> = {}): string {
  const result = evaluateFormula(formula, sheet(values));
  return result.ok ? result.value : `error:${result.error.code}`;
}

// =============================================================================
// Arithmetic
// =============================================================================

describe('evaluateFormula', () => {
  describe('arithmetic', () => {
    it('should follow standard precedence', () => {
      expect(evaluate('5+3')).toBe('8');
      expect(evaluate('1+2*3')).toBe('7');
      expect(evaluate('(5+3)*2')).toBe('16');
      expect(evaluate('10-4-3')).toBe('3');
      expect(evaluate('2*3+4*5')).toBe('26');
    });

    it('should always divide as floating point', () => {
      expect(evaluate('7/2')).toBe('3.5');
      expect(evaluate('1/3')).toBe('0.333333');
      expect(evaluate('2/3')).toBe('0.666667');
    });

    it('should apply unary signs', () => {
      expect(evaluate('-(2+3)')).toBe('-5');
      expect(evaluate('--2')).toBe('2');
      expect(evaluate('+4*-2')).toBe('-8');
    });

    it('should read exponent literals', () => {
      expect(evaluate('1e3+1')).toBe('1001');
      expect(evaluate('2.5E-1*4')).toBe('1');
    });

    it('should close missing parentheses before parsing', () => {
      expect(evaluate('(1+2*3')).toBe('7');
      expect(evaluate('SUM(A1:A3', { A1: '10', A2: '20', A3: '30' })).toBe('60');
    });
  });

  describe('division by zero', () => {
    it('should fail on a literal zero divisor', () => {
      expect(evaluate('1/0')).toBe('error:DivisionByZero');
      expect(evaluate('0/0')).toBe('error:DivisionByZero');
    });

    it('should fail when the divisor is an empty cell', () => {
      expect(evaluate('A1/B1', { A1: '10' })).toBe('error:DivisionByZero');
    });

    it('should fail when the divisor is a function returning zero', () => {
      expect(evaluate('1/SUM()')).toBe('error:DivisionByZero');
    });

    it('should treat an overflowing result as infinite', () => {
      expect(evaluate('1e308*10')).toBe('error:DivisionByZero');
    });
  });

  // ===========================================================================
  // References
  // ===========================================================================

  describe('bare references', () => {
    it('should use numeric cell text', () => {
      expect(evaluate('A1+B1', { A1: '10', B1: '2.5' })).toBe('12.5');
      expect(evaluate('A1*2', { A1: ' 42 ' })).toBe('84');
      expect(evaluate('A1', { A1: '1e3' })).toBe('1000');
    });

    it('should read empty and missing cells as 0', () => {
      expect(evaluate('A1+5')).toBe('5');
      expect(evaluate('A1+5', { A1: '   ' })).toBe('5');
    });

    it('should fail on non-numeric cell text', () => {
      expect(evaluate('A1+1', { A1: 'hello' })).toBe('error:InvalidFormula');
      expect(evaluate('A1+1', { A1: '#ERROR' })).toBe('error:InvalidFormula');
      expect(evaluate('A1', { A1: '12abc' })).toBe('error:InvalidFormula');
    });
  });

  describe('ranges', () => {
    const column = { A1: '10', A2: '20', A3: '30' };

    it('should ignore range direction', () => {
      expect(evaluate('SUM(A1:A3)', column)).toBe('60');
      expect(evaluate('SUM(A3:A1)', column)).toBe('60');
    });

    it('should cover rectangular blocks', () => {
      const block = { A1: '1', B1: '2', A2: '3', B2: '4' };
      expect(evaluate('SUM(A1:B2)', block)).toBe('10');
      expect(evaluate('SUM(B2:A1)', block)).toBe('10');
      expect(evaluate('PRODUCT(A1:B2)', block)).toBe('24');
      expect(evaluate('COUNT(A1:C3)', block)).toBe('4');
    });

    it('should skip empty cells entirely', () => {
      const gap = { A1: '10', A3: '30' };
      expect(evaluate('SUM(A1:A3)', gap)).toBe('40');
      expect(evaluate('COUNT(A1:A3)', gap)).toBe('2');
      expect(evaluate('AVERAGE(A1:A3)', gap)).toBe('20');
      expect(evaluate('PRODUCT(A1:A3)', gap)).toBe('300');
      expect(evaluate('MIN(A1:A3)', gap)).toBe('10');
    });

    it('should count non-numeric text as 0 but not in COUNT', () => {
      const mixed = { A1: 'hello', A2: '5' };
      expect(evaluate('SUM(A1:A2)', mixed)).toBe('5');
      expect(evaluate('COUNT(A1:A2)', mixed)).toBe('1');
      expect(evaluate('AVERAGE(A1:A2)', mixed)).toBe('2.5');
      expect(evaluate('MIN(A1:A2)', mixed)).toBe('0');
    });

    it('should read a cell showing the error sentinel as text', () => {
      expect(evaluate('SUM(A1,2)', { A1: '#ERROR' })).toBe('2');
    });
  });

  // ===========================================================================
  // Functions
  // ===========================================================================

  describe('functions', () => {
    it('should mix literals, references and ranges in one call', () => {
      expect(evaluate('SUM(A1:A2, 5, B1)', { A1: '1', A2: '2', B1: '3' })).toBe('11');
      expect(evaluate('MAX(-5, -2, A1)', { A1: '-9' })).toBe('-2');
      expect(evaluate('MIN(4, A1:A2)', { A1: '7', A2: '-1' })).toBe('-1');
    });

    it('should accept function names in any case', () => {
      expect(evaluate('sum(1,2)+Max(3,4)')).toBe('7');
    });

    it('should count single references only when numeric', () => {
      expect(evaluate('COUNT(A1, B1, C1, 4)', { A1: '1', B1: 'x' })).toBe('2');
    });

    it('should return 0 for every function without arguments', () => {
      for (const name of ['SUM', 'PRODUCT', 'AVERAGE', 'MIN', 'MAX', 'COUNT', 'ABS', 'ROUND']) {
        expect(evaluate(`${name}()`)).toBe('0');
      }
      expect(evaluate('PRODUCT(A1:A3)')).toBe('0');
    });

    it('should take the absolute value of the first argument', () => {
      expect(evaluate('ABS(-3)')).toBe('3');
      expect(evaluate('ABS(A1, -10)', { A1: '-4.5' })).toBe('4.5');
    });

    it('should round half away from zero', () => {
      expect(evaluate('ROUND(2.5)')).toBe('3');
      expect(evaluate('ROUND(-2.5)')).toBe('-3');
      expect(evaluate('ROUND(1.25;1)')).toBe('1.3');
      expect(evaluate('ROUND(-1.25;1)')).toBe('-1.3');
      expect(evaluate('ROUND(A1;2)', { A1: '3.14159' })).toBe('3.14');
    });

    it('should use 0 places when the places segment is not an integer', () => {
      expect(evaluate('ROUND(3.7;1.5)')).toBe('4');
      expect(evaluate('ROUND(3.7;A1)', { A1: '1' })).toBe('4');
      expect(evaluate('ROUND(3.14159;SUM(1,1))')).toBe('3.14');
    });

    it('should ignore everything after the first semicolon for aggregates', () => {
      expect(evaluate('SUM(1,2;100)')).toBe('3');
    });

    it('should report unknown functions', () => {
      expect(evaluate('MEDIAN(1,2)')).toBe('error:InvalidFunction');
      expect(evaluate('SUM(FOO(1))')).toBe('error:InvalidFunction');
    });

    it('should report malformed ranges', () => {
      expect(evaluate('SUM(A1:)')).toBe('error:InvalidRange');
      expect(evaluate('SUM(A1:zz)')).toBe('error:InvalidReference');
    });
  });

  describe('nested calls', () => {
    it('should resolve inner calls first', () => {
      const values = { A1: '2', A2: '3', B1: '4', B2: '5' };
      expect(evaluate('MIN(SUM(A1:A2);PRODUCT(B1:B2))', values)).toBe('5');
      expect(evaluate('MAX(SUM(A1:A2), PRODUCT(B1:B2))', values)).toBe('20');
    });

    it('should keep full precision between nested calls', () => {
      expect(evaluate('SUM(AVERAGE(1,2,2),0)*3')).toBe('5');
    });
  });

  describe('large inputs', () => {
    it('should only visit range cells inside the source dimensions', () => {
      let lookups = 0;
      const small = lookupFrom((row, col) => {
        lookups++;
        return row === 1 && col === 1 ? '4' : '1';
      }, { rows: 2, cols: 2 });

      const result = evaluateFormula('SUM(A1:XFD1048576)', small);
      expect(result).toEqual({ ok: true, value: '7' });
      expect(lookups).toBe(4);
    });

    it('should evaluate long operator chains', () => {
      const chain = Array.from({ length: 20000 }, () => '1').join('+');
      expect(evaluate(chain)).toBe('20000');
    });

    it('should evaluate nested calls up to the nesting limit', () => {
      expect(evaluate(`${'ABS('.repeat(100)}-5${')'.repeat(100)}`)).toBe('5');
    });
  });

  describe('error propagation', () => {
    it('should rethrow errors that are not formula errors', () => {
      const broken = lookupFrom(() => {
        throw new Error('lookup failed');
      });
      expect(() => evaluateFormula('A1+1', broken)).toThrow('lookup failed');
    });
  });
});

// =============================================================================
// Number helpers
// =============================================================================

describe('formatNumber', () => {
  it('should print whole numbers without decimals', () => {
    expect(formatNumber(8)).toBe('8');
    expect(formatNumber(-12)).toBe('-12');
    expect(formatNumber(-0)).toBe('0');
  });

  it('should print every digit of very large whole numbers', () => {
    expect(formatNumber(1e21)).toBe('1000000000000000000000');
    expect(formatNumber(-(2 ** 70))).toBe('-1180591620717411303424');
  });

  it('should print up to six significant digits', () => {
    expect(formatNumber(3.5)).toBe('3.5');
    expect(formatNumber(1 / 3)).toBe('0.333333');
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(123456.789)).toBe('123457');
  });
});

describe('parseNumericLiteral', () => {
  it('should accept plain decimal literals', () => {
    expect(parseNumericLiteral('42')).toBe(42);
    expect(parseNumericLiteral(' -3.5 ')).toBe(-3.5);
    expect(parseNumericLiteral('.5')).toBe(0.5);
    expect(parseNumericLiteral('+7')).toBe(7);
    expect(parseNumericLiteral('1e3')).toBe(1000);
    expect(parseNumericLiteral('007')).toBe(7);
  });

  it('should reject everything else', () => {
    for (const text of ['', '  ', '12abc', '1,000', 'Infinity', '0x10', '1e999', '-', '.']) {
      expect(parseNumericLiteral(text)).toBeNull();
    }
  });
});
