/**
 * Tabula Harness - Runner
 *
 * Executes parsed commands against a SpreadsheetEngine and produces
 * structured output. The engine's bus carries the bundled cipher handlers
 * unless the config turns them off.
 */

import {
  CellStyle,
  FormulaValue,
  ModuleBus,
  SortOrder,
  SpreadsheetEngine,
  columnToLetters,
  compareValues,
  formatCellAddress,
  lettersToColumn,
  parseCellAddress,
  parseRangeAddress,
} from '@tabula/engine';
import { registerCipherHandlers } from '@tabula/ciphers';
import {
  AssertOutput,
  DEFAULT_CONFIG,
  EchoOutput,
  ErrorOutput,
  HarnessConfig,
  InfoOutput,
  OptionValue,
  Output,
  ParsedCommand,
  ResultOutput,
  StatsOutput,
  TableOutput,
  ValueOutput,
} from './types.js';
import { CommandParser } from './CommandParser.js';
import { formatOutput } from './OutputFormatter.js';

const HORIZONTAL_ALIGNS: ReadonlyArray<NonNullable<CellStyle['horizontalAlign']>> = ['left', 'center', 'right'];
const SORT_ORDERS: ReadonlyArray<SortOrder> = ['asc', 'desc'];

export class HarnessRunner {
  private config: HarnessConfig;
  private engine: SpreadsheetEngine;
  private parser = new CommandParser();

  private expectError = false;
  private stepCount = 0;

  private outputHandler: (output: Output) => void;

  constructor(
    config: Partial<HarnessConfig> = {},
    outputHandler?: (output: Output) => void
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.outputHandler = outputHandler ?? this.defaultOutputHandler.bind(this);

    const bus = new ModuleBus();
    if (this.config.registerCiphers) {
      registerCipherHandlers(bus);
    }
    this.engine = new SpreadsheetEngine({ bus });
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  /**
   * Execute a single command. Failures become error outputs; nothing
   * is thrown.
   */
  execute(cmd: ParsedCommand): Output {
    if (this.config.echoCommands) {
      this.emit(this.createEcho(cmd.raw, cmd));
    }

    try {
      const result = this.executeCommand(cmd);

      if (this.expectError && cmd.type !== 'ASSERT_ERROR') {
        this.expectError = false;
        return this.createError('Expected error but command succeeded', cmd);
      }
      return result;
    } catch (error) {
      if (this.expectError) {
        this.expectError = false;
        return this.createResult(true, { expectedError: true }, cmd);
      }

      const message = error instanceof Error ? error.message : String(error);
      return this.createError(message, cmd);
    }
  }

  /**
   * Execute commands in order, emitting each output. Stops at QUIT, at
   * the step limit, and at the first error when stopOnError is set.
   */
  executeAll(commands: ParsedCommand[]): Output[] {
    const outputs: Output[] = [];
    this.stepCount = 0;

    for (const cmd of commands) {
      this.stepCount++;
      if (this.stepCount > this.config.maxStepsPerScript) {
        const output = this.createStepLimitError(cmd);
        outputs.push(output);
        this.emit(output);
        break;
      }

      const output = this.execute(cmd);
      outputs.push(output);
      this.emit(output);

      if (output.type === 'error' && this.config.stopOnError) break;
      if (cmd.type === 'QUIT') break;
    }

    return outputs;
  }

  private executeCommand(cmd: ParsedCommand): Output {
    switch (cmd.type) {
      case 'SET': return this.cmdSet(cmd);
      case 'GET': return this.cmdGet(cmd);
      case 'EVAL': return this.cmdEval(cmd);
      case 'STYLE': return this.cmdStyle(cmd);
      case 'GET_STYLE': return this.cmdGetStyle(cmd);
      case 'INSERT_ROWS': return this.cmdStructure(cmd, 'row', 'insert');
      case 'REMOVE_ROWS': return this.cmdStructure(cmd, 'row', 'remove');
      case 'INSERT_COLS': return this.cmdStructure(cmd, 'col', 'insert');
      case 'REMOVE_COLS': return this.cmdStructure(cmd, 'col', 'remove');
      case 'SORT': return this.cmdSort(cmd);
      case 'UNDO': return this.cmdUndo(cmd);
      case 'REDO': return this.cmdRedo(cmd);
      case 'DUMP': return this.cmdDump(cmd);
      case 'STATS': return this.cmdStats(cmd);
      case 'ECHO': return this.createEcho(cmd.argText, cmd);
      case 'ASSERT': return this.cmdAssert(cmd);
      case 'ASSERT_ERROR': return this.cmdAssertError(cmd);
      case 'RESET': return this.cmdReset(cmd);
      case 'QUIT': return this.createInfo('Quitting', cmd);
    }
  }

  // ===========================================================================
  // Cell Commands
  // ===========================================================================

  private cmdSet(cmd: ParsedCommand): Output {
    const match = /^(\S+)\s*(.*)$/s.exec(cmd.argText);
    if (!match) throw new Error('SET requires cell reference');

    const cell = this.requireCell(match[1]);
    const content = unquote(match[2]);

    this.engine.setCellContent(cell.row, cell.col, content === '' ? null : content);
    return this.createResult(true, { cell: formatCellAddress(cell.row, cell.col), content }, cmd);
  }

  private cmdGet(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd.args[0]);
    return this.createValue(cell, {
      raw: this.engine.getCellRaw(cell.row, cell.col),
      value: this.engine.getCellValue(cell.row, cell.col),
      display: this.engine.getCellDisplayValue(cell.row, cell.col),
    }, cmd);
  }

  private cmdEval(cmd: ParsedCommand): Output {
    if (cmd.argText === '') throw new Error('EVAL requires a formula');
    const formula = cmd.argText.startsWith('=') ? cmd.argText : `=${cmd.argText}`;
    return this.createValue(undefined, this.engine.evaluateFormula(formula), cmd);
  }

  // ===========================================================================
  // Style Commands
  // ===========================================================================

  private cmdStyle(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd.args[0]);

    if (cmd.options.clear === true) {
      this.engine.clearCellStyle(cell.row, cell.col);
      return this.createResult(true, { cell: cmd.args[0], cleared: true }, cmd);
    }

    const style = parseStyleOptions(cmd.options);
    if (Object.keys(style).length === 0) {
      throw new Error('STYLE requires at least one property, e.g. bold=true');
    }
    this.engine.setCellStyle(cell.row, cell.col, style);
    return this.createResult(true, { cell: cmd.args[0], style }, cmd);
  }

  private cmdGetStyle(cmd: ParsedCommand): Output {
    const cell = this.requireCell(cmd.args[0]);
    return this.createValue(cell, this.engine.getCellStyle(cell.row, cell.col), cmd);
  }

  // ===========================================================================
  // Structure Commands
  // ===========================================================================

  private cmdStructure(cmd: ParsedCommand, axis: 'row' | 'col', action: 'insert' | 'remove'): Output {
    const [positionArg, countArg] = cmd.args;
    if (positionArg === undefined) {
      throw new Error(`${cmd.type} requires a ${axis === 'row' ? 'row number' : 'column letter'}`);
    }

    const position = axis === 'row' ? parsePositiveInteger(positionArg) - 1 : lettersToColumn(positionArg);
    if (position < 0) {
      throw new Error(`Invalid ${axis === 'row' ? 'row' : 'column'}: ${positionArg}`);
    }
    const count = countArg === undefined ? 1 : parsePositiveInteger(countArg);

    if (axis === 'row') {
      if (action === 'insert') this.engine.insertRows(position, count);
      else this.engine.removeRows(position, count);
    } else {
      if (action === 'insert') this.engine.insertColumns(position, count);
      else this.engine.removeColumns(position, count);
    }

    return this.createResult(true, { description: this.engine.getHistoryState().undoDescription }, cmd);
  }

  /**
   * SORT <range> [by=A,B] [order=asc|desc] [header=true]. Keys default to
   * the range's first column.
   */
  private cmdSort(cmd: ParsedCommand): Output {
    const [rangeRef] = cmd.args;
    if (!rangeRef) throw new Error('SORT requires range reference');
    const range = parseRangeAddress(rangeRef);
    if (!range) throw new Error(`Invalid range: ${rangeRef}`);

    const orderOption = cmd.options.order ?? 'asc';
    const order = SORT_ORDERS.find(candidate => candidate === orderOption);
    if (!order) throw new Error(`order must be one of ${SORT_ORDERS.join(', ')}`);

    const columns = cmd.options.by === undefined
      ? [columnToLetters(range.startCol)]
      : String(cmd.options.by).split(',');
    const keys = columns.map(letters => {
      const column = lettersToColumn(letters);
      if (column < 0) throw new Error(`Invalid column: ${letters}`);
      return { column, order };
    });

    this.engine.sortRange(range, keys, { hasHeader: cmd.options.header === true });
    return this.createResult(true, { description: this.engine.getHistoryState().undoDescription }, cmd);
  }

  // ===========================================================================
  // History Commands
  // ===========================================================================

  private cmdUndo(cmd: ParsedCommand): Output {
    const description = this.engine.getHistoryState().undoDescription;
    const undone = this.engine.undo();
    return this.createResult(undone, { undone: description }, cmd);
  }

  private cmdRedo(cmd: ParsedCommand): Output {
    const description = this.engine.getHistoryState().redoDescription;
    const redone = this.engine.redo();
    return this.createResult(redone, { redone: description }, cmd);
  }

  // ===========================================================================
  // State Inspection Commands
  // ===========================================================================

  /**
   * Table of display values, or stored content with formulas=true.
   */
  private cmdDump(cmd: ParsedCommand): Output {
    const [rangeRef] = cmd.args;
    if (!rangeRef) throw new Error('DUMP requires range reference');

    const range = parseRangeAddress(rangeRef);
    if (!range) throw new Error(`Invalid range: ${rangeRef}`);
    const showFormulas = cmd.options.formulas === true;

    const headers: string[] = [''];
    for (let col = range.startCol; col <= range.endCol; col++) {
      headers.push(columnToLetters(col));
    }

    const rows: string[][] = [];
    for (let row = range.startRow; row <= range.endRow; row++) {
      const rowData: string[] = [String(row + 1)];
      for (let col = range.startCol; col <= range.endCol; col++) {
        rowData.push(showFormulas
          ? String(this.engine.getCellRaw(row, col) ?? '')
          : this.engine.getCellDisplayValue(row, col));
      }
      rows.push(rowData);
    }

    const output: TableOutput = {
      type: 'table',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      headers,
      rows,
    };
    return output;
  }

  private cmdStats(cmd: ParsedCommand): Output {
    const stats = this.engine.getStats();
    const output: StatsOutput = {
      type: 'stats',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      cellCount: stats.cellCount,
      formulaCount: stats.formulaCount,
      styleCount: stats.styleCount,
      undoStackSize: stats.undoCount,
      redoStackSize: stats.redoCount,
      functionCount: stats.functionCount,
      operationCount: stats.operationCount,
    };
    return output;
  }

  // ===========================================================================
  // Utility Commands
  // ===========================================================================

  /**
   * ASSERT <cell> <op> <expected>, compared the way formula comparisons
   * compare values.
   */
  private cmdAssert(cmd: ParsedCommand): Output {
    const [cellRef, operator, expectedArg] = cmd.args;
    if (!cellRef || !operator) throw new Error('ASSERT requires cell, operator, and expected value');

    const cell = this.requireCell(cellRef);
    const actual = this.engine.getCellValue(cell.row, cell.col);
    const expected = parseAssertValue(expectedArg);
    const order = compareValues(actual, expected);

    let passed: boolean;
    switch (operator) {
      case '==':
      case '=':
        passed = order === 0;
        break;
      case '!=':
      case '<>':
        passed = order !== 0;
        break;
      case '>':
        passed = order > 0;
        break;
      case '<':
        passed = order < 0;
        break;
      case '>=':
        passed = order >= 0;
        break;
      case '<=':
        passed = order <= 0;
        break;
      default:
        throw new Error(`Unknown operator: ${operator}`);
    }

    const output: AssertOutput = {
      type: 'assert',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      passed,
      expected,
      actual,
      message: passed ? undefined : `Assertion failed: ${cellRef} ${operator} ${expectedArg ?? 'null'}`,
    };
    return output;
  }

  private cmdAssertError(cmd: ParsedCommand): Output {
    this.expectError = true;
    return this.createInfo('Expecting error on next command', cmd);
  }

  private cmdReset(cmd: ParsedCommand): Output {
    this.engine.clear();
    this.expectError = false;
    return this.createResult(true, { reset: true }, cmd);
  }

  private requireCell(ref: string | undefined): { row: number; col: number } {
    if (!ref) throw new Error('Cell reference required');
    const cell = parseCellAddress(ref);
    if (!cell) throw new Error(`Invalid cell reference: ${ref}`);
    return cell;
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createResult(success: boolean, data: unknown, cmd: ParsedCommand): ResultOutput {
    return {
      type: 'result',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      success,
      data,
    };
  }

  private createValue(
    cell: { row: number; col: number } | undefined,
    value: ValueOutput['value'],
    cmd: ParsedCommand
  ): ValueOutput {
    return {
      type: 'value',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      cell,
      value,
    };
  }

  private createError(message: string, cmd: ParsedCommand): ErrorOutput {
    return {
      type: 'error',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private createStepLimitError(cmd: ParsedCommand): ErrorOutput {
    return {
      ...this.createError(
        `Step limit exceeded: ${this.stepCount} steps (max: ${this.config.maxStepsPerScript})`,
        cmd
      ),
      errorType: 'StepLimitExceeded',
    };
  }

  private createInfo(message: string, cmd: ParsedCommand): InfoOutput {
    return {
      type: 'info',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private createEcho(message: string, cmd: ParsedCommand): EchoOutput {
    return {
      type: 'echo',
      timestamp: Date.now(),
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
  }

  private emit(output: Output): void {
    this.outputHandler(output);
  }

  private defaultOutputHandler(output: Output): void {
    console.log(formatOutput(output, this.config));
  }

  // ===========================================================================
  // CLI Interface Methods
  // ===========================================================================

  onOutput(handler: (output: Output) => void): void {
    this.outputHandler = handler;
  }

  /**
   * Execute one line of input.
   * @returns false after QUIT
   * @throws ParseError for an unknown command
   */
  executeLine(line: string, lineNumber: number = 0): boolean {
    const cmd = this.parser.parse(line, lineNumber);
    if (!cmd) return true;

    const output = this.execute(cmd);
    this.emit(output);
    return cmd.type !== 'QUIT';
  }

  /**
   * Parse a whole script first, then run it.
   * @throws ParseError before anything runs if any line is malformed
   */
  executeScript(script: string): Output[] {
    return this.executeAll(this.parser.parseScript(script));
  }

  getEngine(): SpreadsheetEngine {
    return this.engine;
  }

  getStepCount(): number {
    return this.stepCount;
  }
}

// =============================================================================
// Argument Helpers
// =============================================================================

function unquote(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2 && (trimmed[0] === '"' || trimmed[0] === "'") && trimmed.endsWith(trimmed[0])) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

function parsePositiveInteger(text: string): number {
  if (!/^\d+$/.test(text) || parseInt(text, 10) < 1) {
    throw new Error(`Expected a positive integer, got: ${text}`);
  }
  return parseInt(text, 10);
}

function parseAssertValue(value: string | undefined): FormulaValue {
  if (value === undefined || value === 'null') return null;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return parseFloat(value);
  return value;
}

function parseStyleOptions(options: Record<string, OptionValue>): Partial<CellStyle> {
  const style: Partial<CellStyle> = {};

  for (const [key, value] of Object.entries(options)) {
    switch (key) {
      case 'bold':
      case 'italic':
        if (typeof value !== 'boolean') throw new Error(`${key} must be true or false`);
        style[key] = value;
        break;
      case 'fontColor':
      case 'backgroundColor':
        style[key] = String(value);
        break;
      case 'horizontalAlign': {
        const align = HORIZONTAL_ALIGNS.find(candidate => candidate === value);
        if (!align) throw new Error(`horizontalAlign must be one of ${HORIZONTAL_ALIGNS.join(', ')}`);
        style.horizontalAlign = align;
        break;
      }
      default:
        throw new Error(`Unknown style property: ${key}`);
    }
  }

  return style;
}

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  outputHandler?: (output: Output) => void
): HarnessRunner {
  return new HarnessRunner(config, outputHandler);
}
