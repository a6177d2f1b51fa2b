/**
 * Tabula Harness - Module Exports
 *
 * A line-command harness for driving the engine from scripts and stdin.
 */

export { CommandParser, createCommandParser, ParseError, isComment } from './CommandParser.js';
export { HarnessRunner, createHarnessRunner } from './HarnessRunner.js';
export { formatOutput, formatTable } from './OutputFormatter.js';
export { parseArgs, hasFailures, UsageError } from './CliArgs.js';
export type { CLIArgs } from './CliArgs.js';

export type {
  CommandType,
  ParsedCommand,
  OptionValue,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  CellValueReport,
  ErrorOutput,
  InfoOutput,
  StatsOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';
