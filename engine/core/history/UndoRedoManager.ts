/**
 * Tabula Engine - Undo/Redo Manager (Command Pattern)
 *
 * Each mutation is a Command with apply() and revert(). The manager keeps
 * the undo and redo stacks, groups commands into batches, and trims old
 * history past the configured limit.
 *
 * Design:
 * - Commands capture whatever they need to revert at construction or on
 *   first apply, so redo/undo can repeat any number of times
 * - Batches revert their children in reverse order
 * - A new command clears the redo stack
 */

// =============================================================================
// Types - Command Interface
// =============================================================================

export type OperationType =
  | 'setCellContent'
  | 'setCellStyle'
  | 'insertRows'
  | 'removeRows'
  | 'insertCols'
  | 'removeCols'
  | 'sortRange'
  | 'batch'
  | 'custom';

/**
 * Every undoable operation implements this interface.
 */
export interface Command {
  /** Unique command ID */
  readonly id: string;
  /** Command type for categorization */
  readonly type: OperationType;
  /** Human-readable description */
  readonly description: string;
  /** Timestamp when command was created */
  readonly timestamp: number;

  /** Perform the mutation (also used for redo) */
  apply(): void;

  /** Restore the state from before apply() */
  revert(): void;

  /** Rough size in bytes, for history accounting */
  getMemorySize(): number;
}

export interface BatchCommand extends Command {
  readonly type: 'batch';
  readonly commands: ReadonlyArray<Command>;
}

// =============================================================================
// Types - State & Events
// =============================================================================

export interface UndoRedoState {
  canUndo: boolean;
  canRedo: boolean;
  undoCount: number;
  redoCount: number;
  /** Description of the command undo() would revert */
  undoDescription: string | null;
  /** Description of the command redo() would apply */
  redoDescription: string | null;
  /** Total memory estimate (bytes) */
  memoryUsage: number;
}

export interface UndoRedoEvents {
  onRecord?: (command: Command) => void;
  onUndo?: (command: Command) => void;
  onRedo?: (command: Command) => void;
  onStateChange?: (state: UndoRedoState) => void;
}

export interface UndoRedoConfig {
  /** Maximum number of undo steps kept (default: 100) */
  maxHistory?: number;
}

// =============================================================================
// Command Implementations
// =============================================================================

let commandIdCounter = 0;

export function generateCommandId(): string {
  return `cmd_${++commandIdCounter}_${Date.now()}`;
}

/**
 * Groups commands into one undo step.
 */
export class BatchCommandImpl implements BatchCommand {
  readonly id: string;
  readonly type = 'batch' as const;
  readonly description: string;
  readonly timestamp: number;
  readonly commands: ReadonlyArray<Command>;

  constructor(description: string, commands: Command[]) {
    this.id = generateCommandId();
    this.description = description;
    this.timestamp = Date.now();
    this.commands = commands;
  }

  apply(): void {
    for (const cmd of this.commands) {
      cmd.apply();
    }
  }

  revert(): void {
    for (let i = this.commands.length - 1; i >= 0; i--) {
      this.commands[i].revert();
    }
  }

  getMemorySize(): number {
    return this.commands.reduce((sum, cmd) => sum + cmd.getMemorySize(), 0);
  }
}

// =============================================================================
// Undo/Redo Manager
// =============================================================================

export class UndoRedoManager {
  /** Most recent at end */
  private undoStack: Command[] = [];

  /** Most recent at end */
  private redoStack: Command[] = [];

  private events: UndoRedoEvents = {};

  private config: Required<UndoRedoConfig>;

  /** Open batches, innermost last */
  private batchStack: Array<{ description: string; commands: Command[] }> = [];

  constructor(config: UndoRedoConfig = {}) {
    this.config = {
      maxHistory: config.maxHistory ?? 100,
    };
    if (!Number.isInteger(this.config.maxHistory) || this.config.maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${this.config.maxHistory}`);
    }
  }

  setEventHandlers(events: UndoRedoEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // State Queries
  // ===========================================================================

  getState(): UndoRedoState {
    return {
      canUndo: this.canUndo(),
      canRedo: this.canRedo(),
      undoCount: this.undoStack.length,
      redoCount: this.redoStack.length,
      undoDescription: this.undoStack[this.undoStack.length - 1]?.description ?? null,
      redoDescription: this.redoStack[this.redoStack.length - 1]?.description ?? null,
      memoryUsage: this.getMemoryUsage(),
    };
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  isInBatch(): boolean {
    return this.batchStack.length > 0;
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Apply a command and record it for undo. If apply() throws, nothing
   * is recorded and the error propagates.
   */
  execute(command: Command): void {
    command.apply();
    this.record(command);
  }

  /**
   * Record a command that has already been applied.
   */
  record(command: Command): void {
    const batch = this.batchStack[this.batchStack.length - 1];
    if (batch) {
      batch.commands.push(command);
      return;
    }
    this.pushCommand(command);
  }

  // ===========================================================================
  // Undo/Redo Operations
  // ===========================================================================

  /**
   * Revert the last command.
   * @returns the reverted command, or null when there is nothing to undo
   */
  undo(): Command | null {
    const command = this.undoStack.pop();
    if (!command) return null;

    command.revert();
    this.redoStack.push(command);

    this.emit('onUndo', command);
    this.notifyStateChange();
    return command;
  }

  /**
   * Re-apply the last undone command.
   * @returns the re-applied command, or null when there is nothing to redo
   */
  redo(): Command | null {
    const command = this.redoStack.pop();
    if (!command) return null;

    command.apply();
    this.undoStack.push(command);

    this.emit('onRedo', command);
    this.notifyStateChange();
    return command;
  }

  undoMultiple(count: number): Command[] {
    const undone: Command[] = [];
    for (let i = 0; i < count; i++) {
      const cmd = this.undo();
      if (!cmd) break;
      undone.push(cmd);
    }
    return undone;
  }

  redoMultiple(count: number): Command[] {
    const redone: Command[] = [];
    for (let i = 0; i < count; i++) {
      const cmd = this.redo();
      if (!cmd) break;
      redone.push(cmd);
    }
    return redone;
  }

  // ===========================================================================
  // Batch Operations
  // ===========================================================================

  /**
   * Begin a batch. Commands recorded until endBatch() become one undo
   * step. Batches nest.
   */
  beginBatch(description: string): void {
    this.batchStack.push({ description, commands: [] });
  }

  /**
   * Close the innermost batch. Empty batches leave no history.
   */
  endBatch(): void {
    const batch = this.batchStack.pop();
    if (!batch || batch.commands.length === 0) return;

    this.record(new BatchCommandImpl(batch.description, batch.commands));
  }

  /**
   * Drop the innermost batch without recording it, optionally reverting
   * the commands it already applied.
   */
  cancelBatch(revert: boolean = false): void {
    const batch = this.batchStack.pop();
    if (!batch || !revert) return;

    for (let i = batch.commands.length - 1; i >= 0; i--) {
      batch.commands[i].revert();
    }
  }

  // ===========================================================================
  // History Management
  // ===========================================================================

  /** Most recent first */
  getUndoHistory(): Array<{ id: string; description: string; timestamp: number }> {
    return this.undoStack
      .map(cmd => ({ id: cmd.id, description: cmd.description, timestamp: cmd.timestamp }))
      .reverse();
  }

  /** Most recent first */
  getRedoHistory(): Array<{ id: string; description: string; timestamp: number }> {
    return this.redoStack
      .map(cmd => ({ id: cmd.id, description: cmd.description, timestamp: cmd.timestamp }))
      .reverse();
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.batchStack = [];
    this.notifyStateChange();
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private pushCommand(command: Command): void {
    this.redoStack = [];
    this.undoStack.push(command);

    // Oldest steps fall off the bottom
    if (this.undoStack.length > this.config.maxHistory) {
      this.undoStack.splice(0, this.undoStack.length - this.config.maxHistory);
    }

    this.emit('onRecord', command);
    this.notifyStateChange();
  }

  private getMemoryUsage(): number {
    let total = 0;
    for (const cmd of this.undoStack) total += cmd.getMemorySize();
    for (const cmd of this.redoStack) total += cmd.getMemorySize();
    return total;
  }

  private emit(event: 'onRecord' | 'onUndo' | 'onRedo', command: Command): void {
    const handler = this.events[event];
    if (!handler) return;
    try {
      handler(command);
    } catch (error) {
      console.error(`Undo/redo ${event} handler error:`, error);
    }
  }

  private notifyStateChange(): void {
    const handler = this.events.onStateChange;
    if (!handler) return;
    try {
      handler(this.getState());
    } catch (error) {
      console.error('Undo/redo state listener error:', error);
    }
  }
}

export function createUndoRedoManager(config?: UndoRedoConfig): UndoRedoManager {
  return new UndoRedoManager(config);
}
