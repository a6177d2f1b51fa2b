/**
 * Math & Trig Function Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SpreadsheetEngine } from '../../SpreadsheetEngine.js';
import { FormulaErrors } from '../../types/index.js';
import { ModuleBus } from '../../dispatch/ModuleBus.js';
import type { FunctionDefinition } from '../FunctionRegistry.js';
import { MATH_FUNCTIONS } from './math.js';

function definition(name: string): FunctionDefinition {
  const found = MATH_FUNCTIONS.find(fn => fn.name === name);
  if (!found) throw new Error(`Missing function: ${name}`);
  return found;
}

describe('math functions', () => {
  let sheet: SpreadsheetEngine;

  beforeEach(() => {
    sheet = new SpreadsheetEngine();
    sheet.setCellContent(0, 0, '1');
    sheet.setCellContent(1, 0, '2');
    sheet.setCellContent(2, 0, 'x');
  });

  // ===========================================================================
  // Aggregates
  // ===========================================================================

  describe('aggregates', () => {
    it('should sum direct arguments and ranges', () => {
      expect(sheet.evaluateFormula('=SUM(1, 2, 3)')).toBe(6);
      expect(sheet.evaluateFormula('=SUM(A1:A3)')).toBe(3);
      expect(sheet.evaluateFormula('=SUM(A1:A3, "4", TRUE)')).toBe(8);
    });

    it('should average and count only numbers', () => {
      expect(sheet.evaluateFormula('=AVERAGE(1, 2, 3, 4)')).toBe(2.5);
      expect(sheet.evaluateFormula('=COUNT(A1:A3)')).toBe(2);
    });

    it('should fail AVERAGE with #DIV/0! when nothing is numeric', () => {
      expect(sheet.evaluateFormula('=AVERAGE(B1:B3)')).toBe(FormulaErrors.DIV_ZERO);
    });

    it('should give 0 for MIN and MAX of nothing', () => {
      expect(sheet.evaluateFormula('=MIN(3, 1, 2)')).toBe(1);
      expect(sheet.evaluateFormula('=MAX(A1:A3)')).toBe(2);
      expect(sheet.evaluateFormula('=MAX(B1:B2)')).toBe(0);
    });

    it('should take MIN and MAX of a range with a million elements', () => {
      const values = Array.from({ length: 1_000_000 }, (_, i) => (i * 7919) % 1_000_003);
      values[500_000] = -5;
      values[750_000] = 2_000_000;
      const context = { evaluate: () => null, bus: new ModuleBus() };

      expect(definition('MIN').implementation([values], context)).toBe(-5);
      expect(definition('MAX').implementation([values], context)).toBe(2_000_000);
    });

    it('should propagate errors from arguments', () => {
      expect(sheet.evaluateFormula('=SUM(1, 1/0)')).toBe(FormulaErrors.DIV_ZERO);
      sheet.setCellContent(3, 0, '=1/0');
      expect(sheet.evaluateFormula('=SUM(A1:A4)')).toBe(FormulaErrors.DIV_ZERO);
    });
  });

  // ===========================================================================
  // Single-number functions
  // ===========================================================================

  describe('rounding', () => {
    it('should round half away from zero', () => {
      expect(sheet.evaluateFormula('=ROUND(2.5)')).toBe(3);
      expect(sheet.evaluateFormula('=ROUND(-2.5)')).toBe(-3);
      expect(sheet.evaluateFormula('=ROUND(3.14159, 2)')).toBe(3.14);
    });

    it('should floor for INT and FLOOR, and ceil for CEILING', () => {
      expect(sheet.evaluateFormula('=INT(-2.5)')).toBe(-3);
      expect(sheet.evaluateFormula('=FLOOR(2.7)')).toBe(2);
      expect(sheet.evaluateFormula('=CEILING(2.1)')).toBe(3);
      expect(sheet.evaluateFormula('=ABS(-3)')).toBe(3);
    });
  });

  describe('domain errors', () => {
    it('should give #NUM! outside the domain', () => {
      expect(sheet.evaluateFormula('=SQRT(-1)')).toBe(FormulaErrors.NUM);
      expect(sheet.evaluateFormula('=LN(0)')).toBe(FormulaErrors.NUM);
      expect(sheet.evaluateFormula('=LOG10(-5)')).toBe(FormulaErrors.NUM);
    });

    it('should give #VALUE! for non-numeric text and wrong arity', () => {
      expect(sheet.evaluateFormula('=ABS("x")')).toBe(FormulaErrors.VALUE);
      expect(sheet.evaluateFormula('=ABS(1, 2)')).toBe(FormulaErrors.VALUE);
      expect(sheet.evaluateFormula('=SUM()')).toBe(FormulaErrors.VALUE);
    });

    it('should reject a range where one number is expected', () => {
      expect(sheet.evaluateFormula('=ABS(A1:A2)')).toBe(FormulaErrors.VALUE);
    });
  });

  describe('POWER, MOD and PI', () => {
    it('should raise to a power', () => {
      expect(sheet.evaluateFormula('=POWER(2, 10)')).toBe(1024);
      expect(sheet.evaluateFormula('=SQRT(16)')).toBe(4);
      expect(sheet.evaluateFormula('=LOG10(1000)')).toBe(3);
    });

    it('should take the sign of the divisor in MOD', () => {
      expect(sheet.evaluateFormula('=MOD(7, 3)')).toBe(1);
      expect(sheet.evaluateFormula('=MOD(-3, 2)')).toBe(1);
      expect(sheet.evaluateFormula('=MOD(3, -2)')).toBe(-1);
      expect(sheet.evaluateFormula('=MOD(5, 0)')).toBe(FormulaErrors.DIV_ZERO);
    });

    it('should return pi', () => {
      expect(sheet.evaluateFormula('=PI()')).toBe(Math.PI);
    });
  });

  describe('trig', () => {
    it('should work in radians', () => {
      expect(sheet.evaluateFormula('=SIN(0)')).toBe(0);
      expect(sheet.evaluateFormula('=COS(0)')).toBe(1);
      expect(sheet.evaluateFormula('=ATAN(1)*4')).toBeCloseTo(Math.PI, 12);
      expect(sheet.evaluateFormula('=ASIN(2)')).toBe(FormulaErrors.NUM);
    });
  });
});
