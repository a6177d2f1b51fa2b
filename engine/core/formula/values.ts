/**
 * Tabula Engine - Value Coercion
 *
 * Shared by the evaluator's operators and the built-in functions.
 * Every helper that can fail returns the error sentinel in place of
 * its result; callers check with isFormulaError.
 */

import { CellContent, FormulaValue, FormulaErrors, isFormulaError } from '../types/index.js';

/** A function argument: a scalar, or the row-major values of a range */
export type FunctionArg = FormulaValue | FormulaValue[];

const NUMERIC_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse text that is entirely a number (surrounding whitespace allowed).
 */
export function parseNumericText(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMERIC_TEXT.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Interpret non-formula cell content: numeric text becomes a number,
 * blank text becomes empty, anything else is returned as is.
 */
export function parseLiteral(content: CellContent): FormulaValue {
  if (typeof content !== 'string') return content;
  if (content.trim() === '') return null;
  return parseNumericText(content) ?? content;
}

export function toNumber(value: FormulaValue): number | string {
  if (value === null) return 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (isFormulaError(value)) return value;
  return parseNumericText(value) ?? FormulaErrors.VALUE;
}

/**
 * Coerce to an integer, truncating toward zero.
 */
export function toInteger(value: FormulaValue): number | string {
  const n = toNumber(value);
  return typeof n === 'number' ? Math.trunc(n) : n;
}

export function toText(value: FormulaValue): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  return String(value);
}

export function toBoolean(value: FormulaValue): boolean | string {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (isFormulaError(value)) return value;

  const upper = value.trim().toUpperCase();
  if (upper === 'TRUE') return true;
  if (upper === 'FALSE') return false;

  const n = parseNumericText(value);
  return n === null ? FormulaErrors.VALUE : n !== 0;
}

// =============================================================================
// Comparison
// =============================================================================

function typeRank(value: number | string | boolean): number {
  if (typeof value === 'number') return 0;
  if (typeof value === 'string') return 1;
  return 2;
}

function emptyLike(other: FormulaValue): number | string | boolean {
  if (typeof other === 'string') return '';
  if (typeof other === 'boolean') return false;
  return 0;
}

/**
 * Order two non-error values: numbers < text < booleans, text compared
 * case-insensitively. Empty takes the zero value of the other side's type.
 * @returns negative, zero or positive
 */
export function compareValues(a: FormulaValue, b: FormulaValue): number {
  const left = a ?? emptyLike(b);
  const right = b ?? emptyLike(a);

  const rankDiff = typeRank(left) - typeRank(right);
  if (rankDiff !== 0) return rankDiff;

  if (typeof left === 'string' && typeof right === 'string') {
    const l = left.toLowerCase();
    const r = right.toLowerCase();
    return l < r ? -1 : l > r ? 1 : 0;
  }

  const l = Number(left);
  const r = Number(right);
  return l < r ? -1 : l > r ? 1 : 0;
}

// =============================================================================
// Argument helpers
// =============================================================================

export function flattenArgs(args: FunctionArg[]): FormulaValue[] {
  const values: FormulaValue[] = [];
  for (const arg of args) {
    if (Array.isArray(arg)) {
      values.push(...arg);
    } else {
      values.push(arg);
    }
  }
  return values;
}

export function firstError(values: FormulaValue[]): string | undefined {
  return values.find(isFormulaError);
}

/**
 * Numbers for an aggregate. Range elements count only when numeric;
 * direct arguments also accept numeric text and booleans. Empty and
 * non-numeric text are skipped. The first error encountered is returned
 * in place of the list.
 */
export function collectNumbers(args: FunctionArg[]): number[] | string {
  const numbers: number[] = [];

  for (const arg of args) {
    if (Array.isArray(arg)) {
      for (const value of arg) {
        if (isFormulaError(value)) return value;
        if (typeof value === 'number') numbers.push(value);
      }
      continue;
    }

    if (arg === null) continue;
    if (isFormulaError(arg)) return arg;
    if (typeof arg === 'number') {
      numbers.push(arg);
    } else if (typeof arg === 'boolean') {
      numbers.push(arg ? 1 : 0);
    } else {
      const n = parseNumericText(arg);
      if (n !== null) numbers.push(n);
    }
  }

  return numbers;
}

/**
 * A scalar argument. Ranges are not accepted where one value is expected.
 */
export function scalarArg(arg: FunctionArg | undefined): FormulaValue {
  if (arg === undefined) return null;
  if (Array.isArray(arg)) return FormulaErrors.VALUE;
  return arg;
}

/**
 * Reject NaN and infinities produced by a computation.
 */
export function finite(n: number): number | string {
  return Number.isFinite(n) ? n : FormulaErrors.NUM;
}
