/**
 * Tabula Engine - Cell Metadata Store
 *
 * Sparse address-keyed storage for anything attached to a cell (styles,
 * notes, validation, ...). Only populated addresses take memory.
 *
 * Key features:
 * - O(1) access via Map<"row_col", T>
 * - Row/column indexes for per-row and per-column queries
 * - Used range tracked lazily
 *
 * Structural edit commands re-key every registered store through the
 * AddressKeyedStore interface; stores never shift themselves.
 */

import {
  AddressKeyedStore,
  CellKey,
  CellRange,
  CellRef,
  cellKey,
  parseKey,
} from '../types/index.js';

export class CellMetadataStore<T> implements AddressKeyedStore<T> {
  /** Name shown in stats and dumps */
  readonly name: string;

  /** Main storage: Map<"row_col", T> */
  private cells: Map<CellKey, T> = new Map();

  /** Row index: Map<row, Set<col>> */
  private rowIndex: Map<number, Set<number>> = new Map();

  /** Column index: Map<col, Set<row>> */
  private colIndex: Map<number, Set<number>> = new Map();

  private _usedRange: CellRange | null = null;
  private _boundsDirty = false;

  constructor(name: string = 'metadata') {
    this.name = name;
  }

  // ===========================================================================
  // Entry Operations
  // ===========================================================================

  get(row: number, col: number): T | undefined {
    return this.cells.get(cellKey(row, col));
  }

  has(row: number, col: number): boolean {
    return this.cells.has(cellKey(row, col));
  }

  set(row: number, col: number, value: T): void {
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0) {
      throw new RangeError(`Invalid cell address: (${row}, ${col})`);
    }

    this.cells.set(cellKey(row, col), value);

    let rowCols = this.rowIndex.get(row);
    if (!rowCols) {
      rowCols = new Set();
      this.rowIndex.set(row, rowCols);
    }
    rowCols.add(col);

    let colRows = this.colIndex.get(col);
    if (!colRows) {
      colRows = new Set();
      this.colIndex.set(col, colRows);
    }
    colRows.add(row);

    // Grow the used range in place; shrinking waits for the next query
    if (this._usedRange && !this._boundsDirty) {
      this._usedRange = {
        startRow: Math.min(this._usedRange.startRow, row),
        startCol: Math.min(this._usedRange.startCol, col),
        endRow: Math.max(this._usedRange.endRow, row),
        endCol: Math.max(this._usedRange.endCol, col),
      };
    } else {
      this._boundsDirty = true;
    }
  }

  /**
   * @returns true if an entry was removed
   */
  delete(row: number, col: number): boolean {
    if (!this.cells.delete(cellKey(row, col))) {
      return false;
    }

    const rowCols = this.rowIndex.get(row);
    if (rowCols) {
      rowCols.delete(col);
      if (rowCols.size === 0) {
        this.rowIndex.delete(row);
      }
    }

    const colRows = this.colIndex.get(col);
    if (colRows) {
      colRows.delete(row);
      if (colRows.size === 0) {
        this.colIndex.delete(col);
      }
    }

    this._boundsDirty = true;
    return true;
  }

  /**
   * Snapshot of all entries, row-major.
   */
  entries(): Array<[CellRef, T]> {
    const result: Array<[CellRef, T]> = [];
    for (const [key, value] of this.cells) {
      result.push([parseKey(key), value]);
    }
    result.sort(([a], [b]) => a.row - b.row || a.col - b.col);
    return result;
  }

  get size(): number {
    return this.cells.size;
  }

  clear(): void {
    this.cells.clear();
    this.rowIndex.clear();
    this.colIndex.clear();
    this._usedRange = null;
    this._boundsDirty = false;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Entries in one row, keyed by column */
  getRow(row: number): Map<number, T> {
    const result = new Map<number, T>();
    const cols = this.rowIndex.get(row);
    if (cols) {
      for (const col of cols) {
        const value = this.cells.get(cellKey(row, col));
        if (value !== undefined) {
          result.set(col, value);
        }
      }
    }
    return result;
  }

  /** Entries in one column, keyed by row */
  getColumn(col: number): Map<number, T> {
    const result = new Map<number, T>();
    const rows = this.colIndex.get(col);
    if (rows) {
      for (const row of rows) {
        const value = this.cells.get(cellKey(row, col));
        if (value !== undefined) {
          result.set(row, value);
        }
      }
    }
    return result;
  }

  /**
   * Smallest range covering every entry, or null when empty.
   */
  getUsedRange(): CellRange | null {
    if (this._boundsDirty) {
      this._usedRange = this.computeUsedRange();
      this._boundsDirty = false;
    }
    return this._usedRange ? { ...this._usedRange } : null;
  }

  private computeUsedRange(): CellRange | null {
    if (this.cells.size === 0) return null;

    const range: CellRange = {
      startRow: Infinity,
      startCol: Infinity,
      endRow: -1,
      endCol: -1,
    };
    for (const row of this.rowIndex.keys()) {
      range.startRow = Math.min(range.startRow, row);
      range.endRow = Math.max(range.endRow, row);
    }
    for (const col of this.colIndex.keys()) {
      range.startCol = Math.min(range.startCol, col);
      range.endCol = Math.max(range.endCol, col);
    }
    return range;
  }
}
