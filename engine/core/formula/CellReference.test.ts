/**
 * CellReference Tests
 *
 * - Column letter codec
 * - Address parsing and formatting
 * - Range parsing and bounded expansion
 */

import { describe, it, expect } from 'vitest';
import {
  columnToLetters,
  lettersToColumn,
  parseCellAddress,
  formatCellAddress,
  parseRangeAddress,
  formatRangeAddress,
  rangeCellCount,
  expandRange,
} from './CellReference.js';
import { FormulaErrors, MAX_COLS } from '../types/index.js';

describe('CellReference', () => {
  // ===========================================================================
  // Column letters
  // ===========================================================================

  describe('column letters', () => {
    it('should convert indices to letters', () => {
      expect(columnToLetters(0)).toBe('A');
      expect(columnToLetters(25)).toBe('Z');
      expect(columnToLetters(26)).toBe('AA');
      expect(columnToLetters(701)).toBe('ZZ');
      expect(columnToLetters(702)).toBe('AAA');
      expect(columnToLetters(MAX_COLS - 1)).toBe('XFD');
    });

    it('should convert letters to indices in any case', () => {
      expect(lettersToColumn('A')).toBe(0);
      expect(lettersToColumn('z')).toBe(25);
      expect(lettersToColumn('aa')).toBe(26);
      expect(lettersToColumn('XFD')).toBe(MAX_COLS - 1);
    });

    it('should reject non-letters', () => {
      expect(lettersToColumn('')).toBe(-1);
      expect(lettersToColumn('A1')).toBe(-1);
      expect(() => columnToLetters(-1)).toThrow('Invalid column index: -1');
    });
  });

  // ===========================================================================
  // Addresses
  // ===========================================================================

  describe('addresses', () => {
    it('should parse A1-style addresses', () => {
      expect(parseCellAddress('A1')).toEqual({ row: 0, col: 0 });
      expect(parseCellAddress('b3')).toEqual({ row: 2, col: 1 });
      expect(parseCellAddress('$C$10')).toEqual({ row: 9, col: 2 });
    });

    it('should reject malformed or out-of-sheet addresses', () => {
      expect(parseCellAddress('A0')).toBeNull();
      expect(parseCellAddress('1A')).toBeNull();
      expect(parseCellAddress('XFE1')).toBeNull();
      expect(parseCellAddress('A1048577')).toBeNull();
    });

    it('should format addresses', () => {
      expect(formatCellAddress(0, 0)).toBe('A1');
      expect(formatCellAddress(9, 27)).toBe('AB10');
    });
  });

  // ===========================================================================
  // Ranges
  // ===========================================================================

  describe('ranges', () => {
    it('should normalize corners given in any order', () => {
      expect(parseRangeAddress('C3:A1')).toEqual({ startRow: 0, startCol: 0, endRow: 2, endCol: 2 });
      expect(parseRangeAddress('B2')).toEqual({ startRow: 1, startCol: 1, endRow: 1, endCol: 1 });
      expect(parseRangeAddress('A1:B2:C3')).toBeNull();
    });

    it('should format single cells without a colon', () => {
      expect(formatRangeAddress({ startRow: 0, startCol: 0, endRow: 0, endCol: 0 })).toBe('A1');
      expect(formatRangeAddress({ startRow: 0, startCol: 0, endRow: 4, endCol: 1 })).toBe('A1:B5');
    });

    it('should expand row-major', () => {
      const range = { startRow: 0, startCol: 0, endRow: 1, endCol: 1 };
      expect(rangeCellCount(range)).toBe(4);
      expect(expandRange(range)).toEqual({
        ok: true,
        cells: [
          { row: 0, col: 0 },
          { row: 0, col: 1 },
          { row: 1, col: 0 },
          { row: 1, col: 1 },
        ],
      });
    });

    it('should fail with #REF! past the ceiling', () => {
      const range = { startRow: 0, startCol: 0, endRow: 9, endCol: 0 };
      expect(expandRange(range, 10).ok).toBe(true);
      expect(expandRange(range, 9)).toEqual({ ok: false, error: FormulaErrors.REF });
    });

    it('should reject a whole column without enumerating it', () => {
      const column = parseRangeAddress('A1:A1048576');
      expect(column).not.toBeNull();
      if (column) {
        expect(expandRange(column)).toEqual({ ok: false, error: '#REF!' });
      }
    });
  });
});
