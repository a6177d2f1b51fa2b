/**
 * Tabula Engine - Cell Edit Commands
 *
 * Single-address writes to one store, undoable. The previous value is
 * read on apply, so a command can be built ahead of time.
 */

import { AddressKeyedStore, CellContent, CellStyle } from '../types/index.js';
import { formatCellAddress } from '../formula/CellReference.js';
import { Command, OperationType, generateCommandId } from './UndoRedoManager.js';

/**
 * Write `next` (or clear, when undefined) at one address.
 */
class SetEntryCommand<T> implements Command {
  readonly id: string;
  readonly type: OperationType;
  readonly description: string;
  readonly timestamp: number;

  readonly row: number;
  readonly col: number;

  private store: AddressKeyedStore<T>;
  private next: T | undefined;
  private previous: T | undefined;
  private applied = false;

  constructor(
    type: OperationType,
    description: string,
    store: AddressKeyedStore<T>,
    row: number,
    col: number,
    next: T | undefined
  ) {
    this.id = generateCommandId();
    this.type = type;
    this.description = description;
    this.timestamp = Date.now();
    this.store = store;
    this.row = row;
    this.col = col;
    this.next = next;
  }

  apply(): void {
    if (this.applied) {
      throw new Error(`Command already applied: ${this.description}`);
    }
    this.previous = this.store.get(this.row, this.col);
    this.write(this.next);
    this.applied = true;
  }

  revert(): void {
    if (!this.applied) {
      throw new Error(`Command has not been applied: ${this.description}`);
    }
    this.write(this.previous);
    this.applied = false;
  }

  getMemorySize(): number {
    return 200;
  }

  private write(value: T | undefined): void {
    if (value === undefined) {
      this.store.delete(this.row, this.col);
    } else {
      this.store.set(this.row, this.col, value);
    }
  }
}

export class SetCellContentCommand extends SetEntryCommand<CellContent> {
  constructor(store: AddressKeyedStore<CellContent>, row: number, col: number, content: CellContent) {
    super(
      'setCellContent',
      `Edit ${formatCellAddress(row, col)}`,
      store,
      row,
      col,
      content === null || content === '' ? undefined : content
    );
  }
}

export class SetCellStyleCommand extends SetEntryCommand<CellStyle> {
  /**
   * @param style - Complete style to store, or null to clear it
   */
  constructor(store: AddressKeyedStore<CellStyle>, row: number, col: number, style: CellStyle | null) {
    super(
      'setCellStyle',
      `Format ${formatCellAddress(row, col)}`,
      store,
      row,
      col,
      style === null ? undefined : { ...style }
    );
  }
}
