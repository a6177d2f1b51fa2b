/**
 * Tabula Harness - Types
 *
 * Command protocol and output types for the line-based harness.
 */

import type { CellStyle, FormulaValue } from '@tabula/engine';

// =============================================================================
// Command Types
// =============================================================================

export type CommandType =
  // Cell operations
  | 'SET'           // SET A1 100 | SET A1 =SUM(B1:B10)
  | 'GET'           // GET A1
  | 'EVAL'          // EVAL =A1*2 (evaluated, not stored)

  // Styles
  | 'STYLE'         // STYLE A1 bold=true fontColor=#ff0000
  | 'GET_STYLE'     // GET_STYLE A1

  // Structure
  | 'INSERT_ROWS'   // INSERT_ROWS 2 [count]  (1-based row)
  | 'REMOVE_ROWS'   // REMOVE_ROWS 2 [count]
  | 'INSERT_COLS'   // INSERT_COLS B [count]
  | 'REMOVE_COLS'   // REMOVE_COLS B [count]
  | 'SORT'          // SORT A1:C10 by=B order=desc header=true

  // History
  | 'UNDO'
  | 'REDO'

  // State inspection
  | 'DUMP'          // DUMP A1:C3
  | 'STATS'

  // Utility
  | 'ECHO'          // ECHO message
  | 'ASSERT'        // ASSERT A1 == 100
  | 'ASSERT_ERROR'  // next command must fail

  // Control
  | 'RESET'
  | 'QUIT';

export type OptionValue = string | boolean | number;

export interface ParsedCommand {
  type: CommandType;
  /** Whitespace-separated arguments, quotes removed */
  args: string[];
  /** key=value arguments */
  options: Record<string, OptionValue>;
  /** Text after the command word, as written */
  argText: string;
  raw: string;
  lineNumber: number;
}

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result'
  | 'value'
  | 'error'
  | 'info'
  | 'stats'
  | 'table'
  | 'assert'
  | 'echo';

export interface OutputBase {
  type: OutputType;
  timestamp: number;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: boolean;
  data?: unknown;
}

export interface CellValueReport {
  /** Content as stored */
  raw: FormulaValue;
  /** Evaluated value */
  value: FormulaValue;
  display: string;
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  cell?: { row: number; col: number };
  value: CellValueReport | FormulaValue | CellStyle | null;
}

export interface ErrorOutput extends OutputBase {
  type: 'error';
  message: string;
  errorType?: 'StepLimitExceeded';
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
}

export interface StatsOutput extends OutputBase {
  type: 'stats';
  cellCount: number;
  formulaCount: number;
  styleCount: number;
  undoStackSize: number;
  redoStackSize: number;
  functionCount: number;
  operationCount: number;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface AssertOutput extends OutputBase {
  type: 'assert';
  passed: boolean;
  expected: FormulaValue;
  actual: FormulaValue;
  message?: string;
}

export interface EchoOutput extends OutputBase {
  type: 'echo';
  message: string;
}

export type Output =
  | ResultOutput
  | ValueOutput
  | ErrorOutput
  | InfoOutput
  | StatsOutput
  | TableOutput
  | AssertOutput
  | EchoOutput;

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** Output format: 'json' (one JSON per line) or 'pretty' (human readable) */
  outputFormat: 'json' | 'pretty';
  /** Include timestamps in pretty output */
  includeTimestamps: boolean;
  /** Stop on first error */
  stopOnError: boolean;
  /** Echo commands before executing */
  echoCommands: boolean;
  /** Show result payloads in pretty output */
  verbose: boolean;
  /** Maximum commands per script execution (default: 10000) */
  maxStepsPerScript: number;
  /** Register the bundled cipher handlers on the engine's bus */
  registerCiphers: boolean;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  includeTimestamps: false,
  stopOnError: false,
  echoCommands: false,
  verbose: false,
  maxStepsPerScript: 10000,
  registerCiphers: true,
};
