/**
 * Tabula Engine - History Module Exports
 */

export {
  UndoRedoManager,
  createUndoRedoManager,
  BatchCommandImpl,
  generateCommandId,
} from './UndoRedoManager.js';

export type {
  Command,
  BatchCommand,
  OperationType,
  UndoRedoState,
  UndoRedoEvents,
  UndoRedoConfig,
} from './UndoRedoManager.js';

export {
  InsertRowsCommand,
  RemoveRowsCommand,
  InsertColumnsCommand,
  RemoveColumnsCommand,
} from './StructuralCommands.js';
export type { StructuralStore } from './StructuralCommands.js';

export { SetCellContentCommand, SetCellStyleCommand } from './CellCommands.js';

export { SortRangeCommand } from './SortCommands.js';
export type { SortKey, SortOrder, SortOptions, SortValueReader } from './SortCommands.js';
