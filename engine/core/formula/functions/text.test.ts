/**
 * Text Function Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SpreadsheetEngine } from '../../SpreadsheetEngine.js';
import { FormulaErrors } from '../../types/index.js';

describe('text functions', () => {
  let sheet: SpreadsheetEngine;

  beforeEach(() => {
    sheet = new SpreadsheetEngine();
    sheet.setCellContent(0, 0, 'a');
    sheet.setCellContent(0, 2, 'c');
  });

  describe('joining', () => {
    it('should concatenate values and ranges', () => {
      expect(sheet.evaluateFormula('=CONCAT("a", 1, TRUE)')).toBe('a1TRUE');
      expect(sheet.evaluateFormula('=CONCAT(A1:C1)')).toBe('ac');
      expect(sheet.evaluateFormula('="x"&2&FALSE')).toBe('x2FALSE');
    });

    it('should join with a delimiter, skipping empties on request', () => {
      expect(sheet.evaluateFormula('=TEXTJOIN(",", TRUE, A1:C1)')).toBe('a,c');
      expect(sheet.evaluateFormula('=TEXTJOIN(",", FALSE, A1:C1)')).toBe('a,,c');
      expect(sheet.evaluateFormula('=TEXTJOIN("-", , "a", "", "b")')).toBe('a-b');
    });

    it('should propagate errors inside joined ranges', () => {
      sheet.setCellContent(0, 1, '=1/0');
      expect(sheet.evaluateFormula('=CONCAT(A1:C1)')).toBe(FormulaErrors.DIV_ZERO);
    });
  });

  describe('case and spacing', () => {
    it('should change case', () => {
      expect(sheet.evaluateFormula('=UPPER("MiXed")')).toBe('MIXED');
      expect(sheet.evaluateFormula('=LOWER("MiXed")')).toBe('mixed');
      expect(sheet.evaluateFormula('=PROPER("hello wORLD")')).toBe('Hello World');
      expect(sheet.evaluateFormula('=PROPER("o\'neil")')).toBe("O'Neil");
    });

    it('should trim and collapse spaces', () => {
      expect(sheet.evaluateFormula('=TRIM("  a   b ")')).toBe('a b');
    });

    it('should measure text and numbers', () => {
      expect(sheet.evaluateFormula('=LEN("hello")')).toBe(5);
      expect(sheet.evaluateFormula('=LEN(12345)')).toBe(5);
      expect(sheet.evaluateFormula('=LEN(B1)')).toBe(0);
    });
  });

  describe('slicing', () => {
    it('should take from the left and right', () => {
      expect(sheet.evaluateFormula('=LEFT("abc")')).toBe('a');
      expect(sheet.evaluateFormula('=LEFT("abc", 2)')).toBe('ab');
      expect(sheet.evaluateFormula('=RIGHT("abc", 2)')).toBe('bc');
      expect(sheet.evaluateFormula('=RIGHT("abc", 0)')).toBe('');
      expect(sheet.evaluateFormula('=LEFT("abc", -1)')).toBe(FormulaErrors.VALUE);
    });

    it('should take from the middle with 1-based positions', () => {
      expect(sheet.evaluateFormula('=MID("abcdef", 2, 3)')).toBe('bcd');
      expect(sheet.evaluateFormula('=MID("abc", 0, 1)')).toBe(FormulaErrors.VALUE);
    });
  });

  describe('replacing', () => {
    it('should replace by position', () => {
      expect(sheet.evaluateFormula('=REPLACE("abcdef", 2, 3, "X")')).toBe('aXef');
    });

    it('should substitute every occurrence or only one', () => {
      expect(sheet.evaluateFormula('=SUBSTITUTE("a-b-c", "-", "+")')).toBe('a+b+c');
      expect(sheet.evaluateFormula('=SUBSTITUTE("a-b-c", "-", "+", 2)')).toBe('a-b+c');
      expect(sheet.evaluateFormula('=SUBSTITUTE("a-b-c", "-", "+", 5)')).toBe('a-b-c');
      expect(sheet.evaluateFormula('=SUBSTITUTE("abc", "", "x")')).toBe('abc');
      expect(sheet.evaluateFormula('=SUBSTITUTE("abc", "b", "x", 0)')).toBe(FormulaErrors.VALUE);
    });
  });
});
