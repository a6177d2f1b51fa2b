/**
 * Tabula Engine - Main Spreadsheet Engine
 *
 * Central orchestrator that ties together the engine components:
 * - SparseDataStore for cell content
 * - CellMetadataStore for styles, plus any stores callers register
 * - FormulaEngine for evaluation, with this engine as its grid context
 * - ModuleBus for functions answered by other subsystems
 * - UndoRedoManager for every edit, structural or not
 */

import {
  CellContent,
  CellKey,
  CellRange,
  CellStyle,
  FormulaErrors,
  FormulaValue,
  GridContext,
  MAX_COLS,
  MAX_ROWS,
  cellKey,
  isFormulaText,
} from './types/index.js';
import { SparseDataStore, DataStoreStats } from './data/SparseDataStore.js';
import { CellMetadataStore } from './data/CellMetadataStore.js';
import { FormulaEngine, EvaluatorConfig } from './formula/FormulaEngine.js';
import type { FunctionRegistry } from './formula/FunctionRegistry.js';
import { parseLiteral, toText } from './formula/values.js';
import { ModuleBus } from './dispatch/ModuleBus.js';
import { UndoRedoManager, Command, UndoRedoState } from './history/UndoRedoManager.js';
import {
  InsertRowsCommand,
  RemoveRowsCommand,
  InsertColumnsCommand,
  RemoveColumnsCommand,
  StructuralStore,
} from './history/StructuralCommands.js';
import { SetCellContentCommand, SetCellStyleCommand } from './history/CellCommands.js';
import { SortRangeCommand, SortKey, SortOptions } from './history/SortCommands.js';

export interface SpreadsheetEngineConfig extends EvaluatorConfig {
  /** Undo steps kept (default: 100) */
  maxHistory?: number;
  /** Bus shared with other subsystems (default: a new, empty bus) */
  bus?: ModuleBus;
  /** Function table (default: the built-in registry) */
  registry?: FunctionRegistry;
}

export interface SpreadsheetEngineEvents {
  /** Content at an address changed through setCellContent */
  onCellChange?: (row: number, col: number, content: CellContent) => void;
  /** A structural edit was applied, undone or redone */
  onStructureChange?: (command: Command, direction: 'apply' | 'undo' | 'redo') => void;
  onUndo?: (command: Command) => void;
  onRedo?: (command: Command) => void;
}

export interface SpreadsheetStats extends DataStoreStats {
  styleCount: number;
  metadataStoreCount: number;
  undoCount: number;
  redoCount: number;
  functionCount: number;
  operationCount: number;
}

const STRUCTURAL_TYPES: ReadonlySet<string> = new Set([
  'insertRows',
  'removeRows',
  'insertCols',
  'removeCols',
]);

export class SpreadsheetEngine implements GridContext {
  // Core components
  private dataStore: SparseDataStore;
  private styleStore: CellMetadataStore<CellStyle>;
  private metadataStores: StructuralStore[] = [];
  private formulaEngine: FormulaEngine;
  private history: UndoRedoManager;
  private bus: ModuleBus;

  // Event callbacks
  private events: SpreadsheetEngineEvents = {};

  constructor(config: SpreadsheetEngineConfig = {}) {
    this.dataStore = new SparseDataStore();
    this.styleStore = new CellMetadataStore<CellStyle>('styles');
    this.bus = config.bus ?? new ModuleBus();

    this.formulaEngine = new FormulaEngine(this, {
      maxDepth: config.maxDepth,
      maxRangeCells: config.maxRangeCells,
      maxEvaluations: config.maxEvaluations,
      registry: config.registry,
      bus: this.bus,
    });

    this.history = new UndoRedoManager({ maxHistory: config.maxHistory });
  }

  setEventHandlers(events: SpreadsheetEngineEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // Grid Context
  // ===========================================================================

  /**
   * Evaluate one cell. An address already in `visited` is part of a
   * cycle and yields #CYCLE!; otherwise it stays in `visited` exactly
   * while its own formula is being evaluated.
   */
  evaluateCell(row: number, col: number, visited: Set<CellKey>): FormulaValue {
    const key = cellKey(row, col);
    if (visited.has(key)) {
      return FormulaErrors.CYCLE;
    }

    const content = this.dataStore.getCell(row, col);
    if (!isFormulaText(content)) {
      return parseLiteral(content);
    }

    visited.add(key);
    try {
      return this.formulaEngine.evaluate(content, visited);
    } finally {
      visited.delete(key);
    }
  }

  getCellRaw(row: number, col: number): CellContent {
    return this.dataStore.getCell(row, col);
  }

  // ===========================================================================
  // Cell Operations
  // ===========================================================================

  /**
   * Set content (formula text or a literal). Null or "" clears the cell.
   * @throws RangeError for an address outside the sheet
   */
  setCellContent(row: number, col: number, content: CellContent): void {
    assertAddress(row, col);
    this.history.execute(new SetCellContentCommand(this.dataStore, row, col, content));
    this.emitCellChange(row, col);
  }

  /** Evaluated value of a cell */
  getCellValue(row: number, col: number): FormulaValue {
    return this.evaluateCell(row, col, new Set());
  }

  /** Evaluated value as text: empty cells give "", booleans TRUE/FALSE */
  getCellDisplayValue(row: number, col: number): string {
    return toText(this.getCellValue(row, col));
  }

  /**
   * Evaluate formula text or a literal against this sheet without
   * storing it anywhere.
   */
  evaluateFormula(content: CellContent): FormulaValue {
    return this.formulaEngine.evaluate(content);
  }

  // ===========================================================================
  // Styles & Metadata
  // ===========================================================================

  /**
   * Merge style properties into the cell's current style.
   */
  setCellStyle(row: number, col: number, style: Partial<CellStyle>): void {
    assertAddress(row, col);
    const merged: CellStyle = { ...this.styleStore.get(row, col), ...style };
    this.history.execute(new SetCellStyleCommand(this.styleStore, row, col, merged));
  }

  clearCellStyle(row: number, col: number): void {
    if (!this.styleStore.has(row, col)) return;
    this.history.execute(new SetCellStyleCommand(this.styleStore, row, col, null));
  }

  getCellStyle(row: number, col: number): CellStyle | null {
    const style = this.styleStore.get(row, col);
    return style ? { ...style } : null;
  }

  /**
   * Add a store that structural edits must keep aligned with the grid.
   * @throws Error if the store is already registered
   */
  registerMetadataStore(store: StructuralStore): void {
    if (store === this.dataStore || store === this.styleStore || this.metadataStores.includes(store)) {
      throw new Error('Metadata store already registered');
    }
    this.metadataStores.push(store);
  }

  unregisterMetadataStore(store: StructuralStore): boolean {
    const index = this.metadataStores.indexOf(store);
    if (index === -1) return false;
    this.metadataStores.splice(index, 1);
    return true;
  }

  // ===========================================================================
  // Row/Column Operations
  // ===========================================================================

  insertRows(position: number, count: number): void {
    this.runStructural(new InsertRowsCommand(this.getStructuralStores(), position, count));
  }

  removeRows(position: number, count: number): void {
    this.runStructural(new RemoveRowsCommand(this.getStructuralStores(), position, count));
  }

  insertColumns(position: number, count: number): void {
    this.runStructural(new InsertColumnsCommand(this.getStructuralStores(), position, count));
  }

  removeColumns(position: number, count: number): void {
    this.runStructural(new RemoveColumnsCommand(this.getStructuralStores(), position, count));
  }

  // ===========================================================================
  // Sorting
  // ===========================================================================

  /**
   * Reorder the rows of `range` by its key columns as one undo step.
   * Styles and registered metadata move with their rows.
   */
  sortRange(range: CellRange, keys: SortKey[], options: SortOptions = {}): void {
    this.history.execute(new SortRangeCommand(
      this.getStructuralStores(),
      range,
      keys,
      (row, col) => this.getCellValue(row, col),
      options
    ));
  }

  // ===========================================================================
  // Undo/Redo
  // ===========================================================================

  /**
   * @returns false when there was nothing to undo
   */
  undo(): boolean {
    const command = this.history.undo();
    if (!command) return false;
    this.emitHistory(command, 'undo');
    return true;
  }

  /**
   * @returns false when there was nothing to redo
   */
  redo(): boolean {
    const command = this.history.redo();
    if (!command) return false;
    this.emitHistory(command, 'redo');
    return true;
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  getHistoryState(): UndoRedoState {
    return this.history.getState();
  }

  /**
   * Group the edits made inside `fn` into one undo step.
   */
  batch(description: string, fn: () => void): void {
    this.history.beginBatch(description);
    try {
      fn();
    } catch (error) {
      this.history.cancelBatch(true);
      throw error;
    }
    this.history.endBatch();
  }

  // ===========================================================================
  // Data Import/Export
  // ===========================================================================

  /**
   * Replace the sheet with a 2D array of content, row 0 first.
   * Loading is not an undo step; history starts empty afterwards.
   */
  loadFromArray(data: CellContent[][]): void {
    this.clear();

    for (let row = 0; row < data.length; row++) {
      const rowData = data[row];
      for (let col = 0; col < rowData.length; col++) {
        assertAddress(row, col);
        this.dataStore.set(row, col, rowData[col]);
      }
    }
  }

  /**
   * Export from A1 to the last used cell. Values are evaluated unless
   * `includeFormulas` is set, in which case formula text is kept.
   */
  toArray(options?: { includeFormulas?: boolean }): FormulaValue[][] {
    const used = this.dataStore.getUsedRange();
    if (!used) return [];

    const result: FormulaValue[][] = [];
    for (let row = 0; row <= used.endRow; row++) {
      const rowData: FormulaValue[] = [];
      for (let col = 0; col <= used.endCol; col++) {
        const content = this.dataStore.getCell(row, col);
        rowData.push(
          options?.includeFormulas && isFormulaText(content)
            ? content
            : this.getCellValue(row, col)
        );
      }
      result.push(rowData);
    }
    return result;
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Remove all content, styles, registered metadata and history.
   */
  clear(): void {
    this.dataStore.clear();
    this.styleStore.clear();
    for (const store of this.metadataStores) {
      for (const [ref] of store.entries()) {
        store.delete(ref.row, ref.col);
      }
    }
    this.history.clear();
  }

  getStats(): SpreadsheetStats {
    const historyState = this.history.getState();
    return {
      ...this.dataStore.getStats(),
      styleCount: this.styleStore.size,
      metadataStoreCount: this.metadataStores.length,
      undoCount: historyState.undoCount,
      redoCount: historyState.redoCount,
      functionCount: this.formulaEngine.getRegistry().size,
      operationCount: this.bus.listOperations().length,
    };
  }

  getBus(): ModuleBus {
    return this.bus;
  }

  /**
   * Underlying components for advanced usage
   */
  getComponents(): {
    dataStore: SparseDataStore;
    styleStore: CellMetadataStore<CellStyle>;
    formulaEngine: FormulaEngine;
    history: UndoRedoManager;
    bus: ModuleBus;
  } {
    return {
      dataStore: this.dataStore,
      styleStore: this.styleStore,
      formulaEngine: this.formulaEngine,
      history: this.history,
      bus: this.bus,
    };
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private getStructuralStores(): StructuralStore[] {
    return [this.dataStore, this.styleStore, ...this.metadataStores];
  }

  private runStructural(command: Command): void {
    this.history.execute(command);
    this.notify('onStructureChange', () => this.events.onStructureChange?.(command, 'apply'));
  }

  private emitHistory(command: Command, direction: 'undo' | 'redo'): void {
    if (direction === 'undo') {
      this.notify('onUndo', () => this.events.onUndo?.(command));
    } else {
      this.notify('onRedo', () => this.events.onRedo?.(command));
    }
    if (STRUCTURAL_TYPES.has(command.type)) {
      this.notify('onStructureChange', () => this.events.onStructureChange?.(command, direction));
    }
  }

  private emitCellChange(row: number, col: number): void {
    const content = this.dataStore.getCell(row, col);
    this.notify('onCellChange', () => this.events.onCellChange?.(row, col, content));
  }

  private notify(name: keyof SpreadsheetEngineEvents, call: () => void): void {
    try {
      call();
    } catch (error) {
      console.error(`Spreadsheet ${name} listener error:`, error);
    }
  }
}

function assertAddress(row: number, col: number): void {
  if (!Number.isInteger(row) || row < 0 || row >= MAX_ROWS ||
      !Number.isInteger(col) || col < 0 || col >= MAX_COLS) {
    throw new RangeError(`Cell address out of bounds: (${row}, ${col})`);
  }
}
