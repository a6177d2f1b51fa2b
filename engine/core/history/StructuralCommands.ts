/**
 * Tabula Engine - Structural Edit Commands
 *
 * Insert and remove whole rows or columns. Every store handed to a
 * command is re-keyed together, so content, styles and any other
 * address-keyed metadata stay aligned.
 *
 * Re-keying touches populated entries only: collect the entries that
 * move, delete them all, then write them all back at their new
 * addresses. Deleting first means no entry can overwrite another that
 * has not moved yet.
 *
 * Formula text is moved as written; references inside it are not rewritten.
 *
 * @example
 * const cmd = new InsertRowsCommand([content, styles], 1, 2);
 * cmd.apply();   // (1,1) -> (3,1)
 * cmd.revert();  // (3,1) -> (1,1)
 */

import { AddressKeyedStore, CellRef, MAX_COLS, MAX_ROWS } from '../types/index.js';
import { columnToLetters } from '../formula/CellReference.js';
import { Command, OperationType, generateCommandId } from './UndoRedoManager.js';

type Axis = 'row' | 'col';

type Entry = [CellRef, unknown];

/** Any store, whatever it holds */
export type StructuralStore = AddressKeyedStore<unknown>;

// =============================================================================
// Re-keying
// =============================================================================

function indexOn(ref: CellRef, axis: Axis): number {
  return axis === 'row' ? ref.row : ref.col;
}

function moved(ref: CellRef, axis: Axis, delta: number): CellRef {
  return axis === 'row'
    ? { row: ref.row + delta, col: ref.col }
    : { row: ref.row, col: ref.col + delta };
}

function entriesWhere(store: StructuralStore, axis: Axis, test: (index: number) => boolean): Entry[] {
  return store.entries().filter(([ref]) => test(indexOn(ref, axis)));
}

function deleteAll(store: StructuralStore, entries: Entry[]): void {
  for (const [ref] of entries) {
    store.delete(ref.row, ref.col);
  }
}

function setAll(store: StructuralStore, entries: Entry[]): void {
  for (const [ref, value] of entries) {
    store.set(ref.row, ref.col, value);
  }
}

/**
 * Move every entry whose index on `axis` is >= `from` by `delta`.
 */
function shiftFrom(store: StructuralStore, axis: Axis, from: number, delta: number): void {
  const moving = entriesWhere(store, axis, index => index >= from);
  deleteAll(store, moving);
  setAll(store, moving.map(([ref, value]): Entry => [moved(ref, axis, delta), value]));
}

// =============================================================================
// Base Command
// =============================================================================

/** Rough bytes per captured entry */
const ENTRY_SIZE_ESTIMATE = 64;

abstract class StructuralCommand implements Command {
  readonly id: string;
  readonly type: OperationType;
  readonly description: string;
  readonly timestamp: number;

  readonly position: number;
  readonly count: number;

  protected readonly axis: Axis;
  protected readonly stores: ReadonlyArray<StructuralStore>;

  /** Entries taken out by the last apply, one list per store */
  protected captured: Entry[][] = [];

  private applied = false;

  constructor(
    type: OperationType,
    axis: Axis,
    stores: ReadonlyArray<StructuralStore>,
    position: number,
    count: number
  ) {
    const limit = axis === 'row' ? MAX_ROWS : MAX_COLS;
    if (!Number.isInteger(position) || position < 0 || position >= limit) {
      throw new RangeError(`Invalid ${axis} position: ${position}`);
    }
    if (!Number.isInteger(count) || count < 1) {
      throw new RangeError(`Invalid ${axis} count: ${count}`);
    }

    this.id = generateCommandId();
    this.type = type;
    this.axis = axis;
    this.stores = stores;
    this.position = position;
    this.count = count;
    this.timestamp = Date.now();
    this.description = this.describe();
  }

  apply(): void {
    if (this.applied) {
      throw new Error(`Command already applied: ${this.description}`);
    }
    this.captured = this.stores.map(store => this.applyTo(store));
    this.applied = true;
  }

  revert(): void {
    if (!this.applied) {
      throw new Error(`Command has not been applied: ${this.description}`);
    }
    this.stores.forEach((store, i) => this.revertOn(store, this.captured[i] ?? []));
    this.captured = [];
    this.applied = false;
  }

  getMemorySize(): number {
    const entries = this.captured.reduce((sum, list) => sum + list.length, 0);
    return 100 + entries * ENTRY_SIZE_ESTIMATE;
  }

  /** Entries held for revert, across all stores */
  getCapturedCount(): number {
    return this.captured.reduce((sum, list) => sum + list.length, 0);
  }

  protected get limit(): number {
    return this.axis === 'row' ? MAX_ROWS : MAX_COLS;
  }

  protected label(index: number): string {
    return this.axis === 'row' ? `row ${index + 1}` : `column ${columnToLetters(index)}`;
  }

  /** Mutate one store and return the entries it took out */
  protected abstract applyTo(store: StructuralStore): Entry[];

  /** Undo applyTo on one store */
  protected abstract revertOn(store: StructuralStore, captured: Entry[]): void;

  protected abstract describe(): string;
}

// =============================================================================
// Insert
// =============================================================================

abstract class InsertCommand extends StructuralCommand {
  /**
   * Entries at index >= position move by +count. Entries pushed past
   * the sheet edge are taken out and kept for revert.
   */
  protected override applyTo(store: StructuralStore): Entry[] {
    const overflow = entriesWhere(
      store,
      this.axis,
      index => index >= this.position && index + this.count >= this.limit
    );
    deleteAll(store, overflow);
    shiftFrom(store, this.axis, this.position, this.count);
    return overflow;
  }

  /**
   * Entries at index >= position+count move back by -count. Anything
   * written into the inserted band since apply is discarded.
   */
  protected override revertOn(store: StructuralStore, overflow: Entry[]): void {
    const end = this.position + this.count;
    deleteAll(store, entriesWhere(store, this.axis, index => index >= this.position && index < end));
    shiftFrom(store, this.axis, end, -this.count);
    setAll(store, overflow);
  }

  protected override describe(): string {
    const unit = this.axis === 'row' ? 'row' : 'column';
    return `Insert ${this.count} ${unit}${this.count === 1 ? '' : 's'} at ${this.label(this.position)}`;
  }
}

export class InsertRowsCommand extends InsertCommand {
  constructor(stores: ReadonlyArray<StructuralStore>, position: number, count: number) {
    super('insertRows', 'row', stores, position, count);
  }
}

export class InsertColumnsCommand extends InsertCommand {
  constructor(stores: ReadonlyArray<StructuralStore>, position: number, count: number) {
    super('insertCols', 'col', stores, position, count);
  }
}

// =============================================================================
// Remove
// =============================================================================

abstract class RemoveCommand extends StructuralCommand {
  /**
   * Entries in [position, position+count) are taken out; entries past
   * the band move by -count.
   */
  protected override applyTo(store: StructuralStore): Entry[] {
    const end = this.position + this.count;
    const removed = entriesWhere(store, this.axis, index => index >= this.position && index < end);
    deleteAll(store, removed);
    shiftFrom(store, this.axis, end, -this.count);
    return removed;
  }

  /**
   * Entries at index >= position move by +count, then the removed
   * entries return to their original addresses.
   */
  protected override revertOn(store: StructuralStore, removed: Entry[]): void {
    shiftFrom(store, this.axis, this.position, this.count);
    setAll(store, removed);
  }

  protected override describe(): string {
    const unit = this.axis === 'row' ? 'row' : 'column';
    return `Remove ${this.count} ${unit}${this.count === 1 ? '' : 's'} at ${this.label(this.position)}`;
  }
}

export class RemoveRowsCommand extends RemoveCommand {
  constructor(stores: ReadonlyArray<StructuralStore>, position: number, count: number) {
    super('removeRows', 'row', stores, position, count);
  }
}

export class RemoveColumnsCommand extends RemoveCommand {
  constructor(stores: ReadonlyArray<StructuralStore>, position: number, count: number) {
    super('removeCols', 'col', stores, position, count);
  }
}
