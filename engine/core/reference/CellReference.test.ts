/**
 * Grid Formula Engine - Cell Reference Codec Tests
 *
 * Covers:
 * - Column label <-> index conversion (bijective base-26)
 * - Decoding and encoding of A1-style labels
 * - Round trips
 * - Non-throwing parsers used by the harness
 */

import { describe, it, expect } from 'vitest';
import {
  columnLabelToIndex,
  columnIndexToLabel,
  decodeReference,
  encodeReference,
  parseCellReference,
  parseRangeReference,
  boundingBox,
} from './CellReference.js';
import { FormulaError } from '../formula/FormulaError.js';

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FormulaError) return error.code;
    throw error;
  }
  return undefined;
}

describe('CellReference', () => {
  // ===========================================================================
  // Columns
  // ===========================================================================

  describe('columns', () => {
    it('should map single letters to 0-25', () => {
      expect(columnLabelToIndex('A')).toBe(0);
      expect(columnLabelToIndex('B')).toBe(1);
      expect(columnLabelToIndex('Z')).toBe(25);
    });

    it('should continue past Z without a zero digit', () => {
      expect(columnLabelToIndex('AA')).toBe(26);
      expect(columnLabelToIndex('AB')).toBe(27);
      expect(columnLabelToIndex('AZ')).toBe(51);
      expect(columnLabelToIndex('BA')).toBe(52);
      expect(columnLabelToIndex('ZZ')).toBe(701);
      expect(columnLabelToIndex('AAA')).toBe(702);
    });

    it('should accept lowercase letters', () => {
      expect(columnLabelToIndex('ab')).toBe(27);
    });

    it('should convert indices back to labels', () => {
      expect(columnIndexToLabel(0)).toBe('A');
      expect(columnIndexToLabel(25)).toBe('Z');
      expect(columnIndexToLabel(26)).toBe('AA');
      expect(columnIndexToLabel(701)).toBe('ZZ');
      expect(columnIndexToLabel(702)).toBe('AAA');
    });

    it('should reject invalid columns', () => {
      expect(codeOf(() => columnLabelToIndex('A1'))).toBe('InvalidReference');
      expect(codeOf(() => columnLabelToIndex(''))).toBe('InvalidReference');
      expect(codeOf(() => columnIndexToLabel(-1))).toBe('InvalidReference');
      expect(codeOf(() => columnIndexToLabel(1.5))).toBe('InvalidReference');
    });
  });

  // ===========================================================================
  // Decode / Encode
  // ===========================================================================

  describe('decodeReference', () => {
    it('should decode to zero-based coordinates', () => {
      expect(decodeReference('A1')).toEqual({ row: 0, col: 0 });
      expect(decodeReference('C5')).toEqual({ row: 4, col: 2 });
      expect(decodeReference('AA12')).toEqual({ row: 11, col: 26 });
    });

    it('should normalize case before decoding', () => {
      expect(decodeReference('aa12')).toEqual({ row: 11, col: 26 });
      expect(decodeReference('b2')).toEqual({ row: 1, col: 1 });
    });

    it('should reject row zero', () => {
      expect(codeOf(() => decodeReference('A0'))).toBe('InvalidReference');
    });

    it('should reject labels that do not match letters+digits', () => {
      for (const label of ['', 'A', '12', '1A', 'A-1', 'A1B', '$A$1', 'A 1']) {
        expect(codeOf(() => decodeReference(label))).toBe('InvalidReference');
      }
    });
  });

  describe('encodeReference', () => {
    it('should produce uppercase labels with 1-based rows', () => {
      expect(encodeReference(0, 0)).toBe('A1');
      expect(encodeReference(11, 26)).toBe('AA12');
      expect(encodeReference(99, 701)).toBe('ZZ100');
    });

    it('should reject negative coordinates', () => {
      expect(codeOf(() => encodeReference(-1, 0))).toBe('InvalidReference');
      expect(codeOf(() => encodeReference(0, -1))).toBe('InvalidReference');
    });
  });

  describe('round trips', () => {
    it('should encode(decode(label)) back to the label', () => {
      for (const label of ['A1', 'J20', 'Z9', 'AA1', 'AZ33', 'ZZ100', 'AAA1', 'XFD1048576']) {
        const { row, col } = decodeReference(label);
        expect(encodeReference(row, col)).toBe(label);
      }
    });

    it('should decode(encode(row, col)) back to the coordinates', () => {
      for (const [row, col] of [[0, 0], [19, 9], [5, 25], [0, 26], [123, 702], [7, 18277]]) {
        expect(decodeReference(encodeReference(row, col))).toEqual({ row, col });
      }
    });
  });

  // ===========================================================================
  // Non-throwing parsers
  // ===========================================================================

  describe('parseCellReference', () => {
    it('should trim and decode', () => {
      expect(parseCellReference(' b3 ')).toEqual({ row: 2, col: 1 });
    });

    it('should return null instead of throwing', () => {
      expect(parseCellReference('A0')).toBeNull();
      expect(parseCellReference('hello')).toBeNull();
    });
  });

  describe('parseRangeReference', () => {
    it('should normalize reversed corners', () => {
      expect(parseRangeReference('B3:A1')).toEqual({ startRow: 0, startCol: 0, endRow: 2, endCol: 1 });
    });

    it('should treat a single cell as a 1x1 range', () => {
      expect(parseRangeReference('C2')).toEqual({ startRow: 1, startCol: 2, endRow: 1, endCol: 2 });
    });

    it('should reject malformed ranges', () => {
      expect(parseRangeReference('A1:')).toBeNull();
      expect(parseRangeReference('A1:B2:C3')).toBeNull();
      expect(parseRangeReference('A1:X')).toBeNull();
    });
  });

  describe('boundingBox', () => {
    it('should be independent of corner order', () => {
      const a = { row: 4, col: 0 };
      const b = { row: 1, col: 3 };
      expect(boundingBox(a, b)).toEqual(boundingBox(b, a));
      expect(boundingBox(a, b)).toEqual({ startRow: 1, startCol: 0, endRow: 4, endCol: 3 });
    });
  });
});
