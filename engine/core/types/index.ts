/**
 * Tabula Engine - Core Type Definitions
 */

// ============================================================================
// Cell Types
// ============================================================================

/**
 * What a cell holds. A string with a leading "=" is formula text;
 * everything else is a literal.
 */
export type CellContent = string | number | boolean | null;

/** Result of evaluating a cell or formula. Error sentinels are strings. */
export type FormulaValue = string | number | boolean | null;

export interface CellStyle {
  /** Font color (hex) */
  fontColor?: string;
  /** Background color (hex) */
  backgroundColor?: string;
  bold?: boolean;
  italic?: boolean;
  horizontalAlign?: 'left' | 'center' | 'right';
}

export function isFormulaText(content: CellContent | undefined): content is string {
  return typeof content === 'string' && content.startsWith('=');
}

// ============================================================================
// Cell Reference Types
// ============================================================================

export interface CellRef {
  row: number;
  col: number;
}

export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/** Key format: "row_col" */
export type CellKey = string;

export function cellKey(row: number, col: number): CellKey {
  return `${row}_${col}`;
}

export function parseKey(key: CellKey): CellRef {
  const separator = key.indexOf('_');
  return {
    row: Number(key.slice(0, separator)),
    col: Number(key.slice(separator + 1)),
  };
}

export function rangeContains(range: CellRange, row: number, col: number): boolean {
  return row >= range.startRow && row <= range.endRow &&
         col >= range.startCol && col <= range.endCol;
}

// ============================================================================
// Error Sentinels
// ============================================================================

export const FormulaErrors = {
  /** Formula text could not be parsed */
  PARSE: '#PARSE!',
  /** Address out of bounds or range over the cell ceiling */
  REF: '#REF!',
  /** Address re-entered while its own evaluation was in flight */
  CYCLE: '#CYCLE!',
  /** Nested evaluation deeper than the configured limit */
  DEPTH: '#DEPTH!',
  /** Too many cell evaluations under one top-level call */
  LIMIT: '#LIMIT!',
  /** Unknown function name */
  NAME: '#NAME?',
  /** No handler registered for a cross-module operation */
  UNKNOWN_OPERATION: '#OP?',
  /** Operand of the wrong type */
  VALUE: '#VALUE!',
  DIV_ZERO: '#DIV/0!',
  /** Result outside the numeric domain (NaN, Infinity) */
  NUM: '#NUM!',
  /** Anything else that failed while computing */
  ERROR: '#ERROR!',
} as const;

export type FormulaError = typeof FormulaErrors[keyof typeof FormulaErrors];

const GUARD_ERRORS: ReadonlySet<string> = new Set([
  FormulaErrors.CYCLE,
  FormulaErrors.DEPTH,
  FormulaErrors.LIMIT,
]);

/**
 * Any string with a leading "#" produced by evaluation is an error,
 * including sentinels coming back from external handlers.
 */
export function isFormulaError(value: unknown): value is `#${string}` {
  return typeof value === 'string' && value.startsWith('#');
}

/** Errors raised by a resource guard rather than by the computation itself */
export function isGuardError(value: unknown): value is `#${string}` {
  return typeof value === 'string' && GUARD_ERRORS.has(value);
}

// ============================================================================
// Collaborator Contracts
// ============================================================================

/**
 * The grid as seen by the evaluator.
 */
export interface GridContext {
  /**
   * Evaluate the cell at (row, col). `visited` holds the addresses whose
   * evaluation is currently in flight; re-entering one yields #CYCLE!.
   */
  evaluateCell(row: number, col: number, visited: Set<CellKey>): FormulaValue;
  /** Raw content as stored (formula text or literal), null when empty */
  getCellRaw(row: number, col: number): CellContent;
}

/**
 * A sparse store keyed by cell address. Structural edits re-key every
 * store registered with them.
 */
export interface AddressKeyedStore<T> {
  get(row: number, col: number): T | undefined;
  set(row: number, col: number, value: T): void;
  delete(row: number, col: number): boolean;
  /** Snapshot of all populated entries */
  entries(): Array<[CellRef, T]>;
  readonly size: number;
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_ROWS = 1_048_576;
export const MAX_COLS = 16_384;
