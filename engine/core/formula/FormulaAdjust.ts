/**
 * Tabula Engine - Formula Reference Adjustment
 *
 * Shifts relative references when a formula is filled or copied to
 * another cell. Absolute parts ($A, $1) stay fixed. Structural edits do
 * not call this; formula text survives row/column inserts unchanged.
 */

import { MAX_COLS, MAX_ROWS } from '../types/index.js';
import { columnToLetters, lettersToColumn } from './CellReference.js';
import { tokenize, Token, FormulaSyntaxError } from './Tokenizer.js';

const REFERENCE_PARTS = /^(\$?)([A-Za-z]+)(\$?)([0-9]+)$/;

function clamp(value: number, max: number): number {
  return Math.min(Math.max(value, 0), max - 1);
}

/**
 * Shift one A1-style reference. Returns the input unchanged when it is
 * not a reference. Shifted indices clamp to the sheet edges.
 */
export function shiftReference(ref: string, rowDelta: number, colDelta: number): string {
  const match = REFERENCE_PARTS.exec(ref);
  if (!match) return ref;

  const [, colAbsolute, letters, rowAbsolute, digits] = match;
  let col = lettersToColumn(letters);
  let row = parseInt(digits, 10) - 1;
  if (col < 0 || col >= MAX_COLS || row < 0 || row >= MAX_ROWS) return ref;

  if (colAbsolute === '') col = clamp(col + colDelta, MAX_COLS);
  if (rowAbsolute === '') row = clamp(row + rowDelta, MAX_ROWS);

  return `${colAbsolute}${columnToLetters(col)}${rowAbsolute}${row + 1}`;
}

/**
 * Shift every cell reference in formula text by (rowDelta, colDelta).
 * Function names, string literals and spacing are left as written.
 * Non-formula text, and formulas that do not tokenize, come back unchanged.
 */
export function shiftFormulaReferences(formula: string, rowDelta: number, colDelta: number): string {
  if (!formula.startsWith('=')) return formula;

  let tokens: Token[];
  try {
    tokens = tokenize(formula.slice(1));
  } catch (error) {
    if (error instanceof FormulaSyntaxError) return formula;
    throw error;
  }

  let result = formula;
  // Right to left so earlier offsets stay valid
  for (let i = tokens.length - 1; i >= 0; i--) {
    const token = tokens[i];
    if (token.type !== 'identifier') continue;
    if (tokens[i + 1]?.type === 'lparen') continue;

    const shifted = shiftReference(token.value, rowDelta, colDelta);
    if (shifted === token.value) continue;

    const start = token.position + 1;
    result = result.slice(0, start) + shifted + result.slice(start + token.value.length);
  }
  return result;
}
