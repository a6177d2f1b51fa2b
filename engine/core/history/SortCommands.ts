/**
 * Tabula Engine - Sort Command
 *
 * Reorders the rows of a block by one or more key columns. Every store
 * handed to the command moves with its row, so styles stay with the
 * content they format. Only the block moves; cells outside it are not
 * touched.
 *
 * Rows compare on evaluated values. Blanks sort last in either order,
 * and rows with equal keys keep their original order. The row order is
 * fixed on the first apply, so redo repeats the same permutation.
 *
 * Formula text is moved as written; references inside it are not rewritten.
 *
 * @example
 * const cmd = new SortRangeCommand([content, styles], range, [{ column: 0, order: 'asc' }], read);
 * cmd.apply();   // rows of range reordered by column A
 * cmd.revert();  // block restored entry for entry
 */

import { CellRange, CellRef, FormulaValue, MAX_COLS, MAX_ROWS } from '../types/index.js';
import { formatRangeAddress } from '../formula/CellReference.js';
import { compareValues } from '../formula/values.js';
import { Command, OperationType, generateCommandId } from './UndoRedoManager.js';
import type { StructuralStore } from './StructuralCommands.js';

export type SortOrder = 'asc' | 'desc';

export interface SortKey {
  /** Zero-based sheet column; must lie inside the sorted range */
  column: number;
  order: SortOrder;
}

export interface SortOptions {
  /** Leave the first row of the range in place (default: false) */
  hasHeader?: boolean;
}

/** Evaluated value at an address */
export type SortValueReader = (row: number, col: number) => FormulaValue;

type Entry = [CellRef, unknown];

/** Rough bytes per captured entry */
const ENTRY_SIZE_ESTIMATE = 64;

function isBlank(value: FormulaValue): boolean {
  return value === null || value === '';
}

function compareKey(a: FormulaValue, b: FormulaValue, order: SortOrder): number {
  const aBlank = isBlank(a);
  const bBlank = isBlank(b);
  if (aBlank || bBlank) {
    if (aBlank === bBlank) return 0;
    return aBlank ? 1 : -1;
  }
  const result = compareValues(a, b);
  return order === 'asc' ? result : -result;
}

function isValidRange(range: CellRange): boolean {
  const { startRow, startCol, endRow, endCol } = range;
  return [startRow, startCol, endRow, endCol].every(Number.isInteger) &&
    startRow >= 0 && startCol >= 0 &&
    startRow <= endRow && startCol <= endCol &&
    endRow < MAX_ROWS && endCol < MAX_COLS;
}

export class SortRangeCommand implements Command {
  readonly id: string;
  readonly type: OperationType = 'sortRange';
  readonly description: string;
  readonly timestamp: number;

  readonly range: CellRange;

  private readonly stores: ReadonlyArray<StructuralStore>;
  private readonly keys: ReadonlyArray<SortKey>;
  private readonly readValue: SortValueReader;
  /** First row that moves; the header row, when there is one, stays */
  private readonly firstRow: number;

  /** Target row for each source row, fixed by the first apply */
  private targets: Map<number, number> | null = null;
  /** Block entries before the sort, one list per store */
  private captured: Entry[][] = [];
  private applied = false;

  constructor(
    stores: ReadonlyArray<StructuralStore>,
    range: CellRange,
    keys: ReadonlyArray<SortKey>,
    readValue: SortValueReader,
    options: SortOptions = {}
  ) {
    if (!isValidRange(range)) {
      throw new RangeError(
        `Invalid sort range: (${range.startRow}, ${range.startCol}) to (${range.endRow}, ${range.endCol})`
      );
    }
    if (keys.length === 0) {
      throw new RangeError('Sort needs at least one key column');
    }
    for (const key of keys) {
      if (!Number.isInteger(key.column) || key.column < range.startCol || key.column > range.endCol) {
        throw new RangeError(`Sort column outside range: ${key.column}`);
      }
    }

    this.id = generateCommandId();
    this.timestamp = Date.now();
    this.range = { ...range };
    this.stores = stores;
    this.keys = keys.map(key => ({ ...key }));
    this.readValue = readValue;
    this.firstRow = range.startRow + (options.hasHeader ? 1 : 0);
    this.description = `Sort ${formatRangeAddress(range)}`;
  }

  apply(): void {
    if (this.applied) {
      throw new Error(`Command already applied: ${this.description}`);
    }

    const targets = this.targets ?? this.computeTargets();
    this.targets = targets;

    this.captured = this.stores.map(store => {
      const block = this.blockEntries(store);
      for (const [ref] of block) {
        store.delete(ref.row, ref.col);
      }
      for (const [ref, value] of block) {
        store.set(targets.get(ref.row) ?? ref.row, ref.col, value);
      }
      return block;
    });
    this.applied = true;
  }

  revert(): void {
    if (!this.applied) {
      throw new Error(`Command has not been applied: ${this.description}`);
    }

    this.stores.forEach((store, i) => {
      for (const [ref] of this.blockEntries(store)) {
        store.delete(ref.row, ref.col);
      }
      for (const [ref, value] of this.captured[i] ?? []) {
        store.set(ref.row, ref.col, value);
      }
    });
    this.captured = [];
    this.applied = false;
  }

  getMemorySize(): number {
    const entries = this.captured.reduce((sum, list) => sum + list.length, 0);
    return 100 + entries * ENTRY_SIZE_ESTIMATE;
  }

  /** Zero-based source rows in their sorted order, or null before the first apply */
  getRowOrder(): number[] | null {
    if (!this.targets) return null;
    const order: number[] = [];
    for (const [source, target] of this.targets) {
      order[target - this.firstRow] = source;
    }
    return order;
  }

  private blockEntries(store: StructuralStore): Entry[] {
    const { endRow, startCol, endCol } = this.range;
    return store.entries().filter(([ref]) =>
      ref.row >= this.firstRow && ref.row <= endRow && ref.col >= startCol && ref.col <= endCol
    );
  }

  private computeTargets(): Map<number, number> {
    const rows: Array<{ row: number; values: FormulaValue[] }> = [];
    for (let row = this.firstRow; row <= this.range.endRow; row++) {
      rows.push({ row, values: this.keys.map(key => this.readValue(row, key.column)) });
    }

    rows.sort((a, b) => {
      for (let i = 0; i < this.keys.length; i++) {
        const result = compareKey(a.values[i], b.values[i], this.keys[i].order);
        if (result !== 0) return result;
      }
      return a.row - b.row;
    });

    const targets = new Map<number, number>();
    rows.forEach(({ row }, i) => targets.set(row, this.firstRow + i));
    return targets;
  }
}
