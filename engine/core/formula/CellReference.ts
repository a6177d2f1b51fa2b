/**
 * Tabula Engine - Cell Reference Resolution
 *
 * A1-style addresses <-> zero-based (row, col), and bounded range expansion.
 *
 * Column letters are bijective base-26: A=1 ... Z=26, AA=27, shifted down
 * by one to give the zero-based grid index.
 */

import {
  CellRef,
  CellRange,
  FormulaErrors,
  MAX_ROWS,
  MAX_COLS,
} from '../types/index.js';

/** Default ceiling on the number of cells a single range may expand to */
export const DEFAULT_MAX_RANGE_CELLS = 10_000;

const ADDRESS_PATTERN = /^\$?([A-Za-z]+)\$?([0-9]+)$/;

/**
 * Convert a zero-based column index to letters (0 -> "A", 26 -> "AA").
 */
export function columnToLetters(col: number): string {
  if (!Number.isInteger(col) || col < 0) {
    throw new RangeError(`Invalid column index: ${col}`);
  }

  let letters = '';
  let n = col + 1;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

/**
 * Convert column letters to a zero-based index ("A" -> 0, "AA" -> 26).
 * Returns -1 for anything that is not a run of ASCII letters.
 */
export function lettersToColumn(letters: string): number {
  if (!/^[A-Za-z]+$/.test(letters)) return -1;

  let col = 0;
  const upper = letters.toUpperCase();
  for (let i = 0; i < upper.length; i++) {
    col = col * 26 + (upper.charCodeAt(i) - 64);
  }
  return col - 1;
}

/**
 * Parse an A1-style address. `$` markers are accepted and ignored.
 * @returns CellRef, or null when malformed or outside the sheet
 */
export function parseCellAddress(address: string): CellRef | null {
  const match = ADDRESS_PATTERN.exec(address.trim());
  if (!match) return null;

  const col = lettersToColumn(match[1]);
  const row = parseInt(match[2], 10) - 1;

  if (row < 0 || row >= MAX_ROWS || col < 0 || col >= MAX_COLS) {
    return null;
  }
  return { row, col };
}

/**
 * True when text is shaped like an address, whether or not it lies on
 * the sheet ("XFE1" and "A0" qualify, "foo" does not).
 */
export function isAddressSyntax(text: string): boolean {
  return ADDRESS_PATTERN.test(text.trim());
}

export function isCellAddress(text: string): boolean {
  return parseCellAddress(text) !== null;
}

/**
 * Format (row, col) as an A1-style address.
 */
export function formatCellAddress(row: number, col: number): string {
  return `${columnToLetters(col)}${row + 1}`;
}

/**
 * Build a range from two corners given in any order.
 */
export function normalizeRange(a: CellRef, b: CellRef): CellRange {
  return {
    startRow: Math.min(a.row, b.row),
    startCol: Math.min(a.col, b.col),
    endRow: Math.max(a.row, b.row),
    endCol: Math.max(a.col, b.col),
  };
}

/**
 * Parse "A1:B10" (or a single address) into a normalized range.
 */
export function parseRangeAddress(text: string): CellRange | null {
  const parts = text.split(':');
  if (parts.length > 2) return null;

  const start = parseCellAddress(parts[0]);
  const end = parts.length === 2 ? parseCellAddress(parts[1]) : start;
  if (!start || !end) return null;

  return normalizeRange(start, end);
}

export function formatRangeAddress(range: CellRange): string {
  const start = formatCellAddress(range.startRow, range.startCol);
  if (range.startRow === range.endRow && range.startCol === range.endCol) {
    return start;
  }
  return `${start}:${formatCellAddress(range.endRow, range.endCol)}`;
}

export function rangeCellCount(range: CellRange): number {
  return (range.endRow - range.startRow + 1) * (range.endCol - range.startCol + 1);
}

export type RangeExpansion =
  | { ok: true; cells: CellRef[] }
  | { ok: false; error: typeof FormulaErrors.REF };

/**
 * Expand a range into row-major cell references.
 *
 * The size is checked before anything is allocated: a range over
 * `maxCells` fails with #REF! without enumerating a single cell.
 */
export function expandRange(
  range: CellRange,
  maxCells: number = DEFAULT_MAX_RANGE_CELLS
): RangeExpansion {
  if (rangeCellCount(range) > maxCells) {
    return { ok: false, error: FormulaErrors.REF };
  }

  const cells: CellRef[] = [];
  for (let row = range.startRow; row <= range.endRow; row++) {
    for (let col = range.startCol; col <= range.endCol; col++) {
      cells.push({ row, col });
    }
  }
  return { ok: true, cells };
}
