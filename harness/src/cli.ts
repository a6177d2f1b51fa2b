#!/usr/bin/env node
/**
 * Tabula Harness - CLI Entry Point
 *
 * Usage:
 *   tsx harness/src/cli.ts [options]
 *   tsx harness/src/cli.ts < script.txt
 *   echo "EVAL =GEMATRIA(\"LIGHT\")" | tsx harness/src/cli.ts --pretty
 *
 * Piped scripts are parsed in full before anything runs. The exit code is
 * 1 when any command failed or any assertion did not pass.
 */

import * as readline from 'node:readline';
import { HarnessRunner, createHarnessRunner } from './HarnessRunner.js';
import { ParseError } from './CommandParser.js';
import { formatOutput } from './OutputFormatter.js';
import { DEFAULT_CONFIG, HarnessConfig, Output } from './types.js';
import { CLIArgs, UsageError, hasFailures, parseArgs } from './CliArgs.js';

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Tabula Harness

USAGE:
  tsx harness/src/cli.ts [options] < script.txt

OPTIONS:
  --pretty          Human-readable output (default: JSON)
  --json            JSON output (one object per line)
  --timestamps      Prefix pretty output with the time
  --stop-on-error   Stop execution on first error
  --echo            Echo commands before executing
  --verbose, -v     Show result payloads in pretty output
  --no-ciphers      Do not register the cipher handlers
  --max-steps <n>   Maximum commands per script (default: ${DEFAULT_CONFIG.maxStepsPerScript})
  --interactive, -i Force interactive mode
  --help, -h        Show this help message

COMMANDS:
  SET <cell> <content>       Set content (number, text, or =formula)
  GET <cell>                 Stored content and evaluated value
  EVAL <formula>             Evaluate without storing
  STYLE <cell> key=value...  bold, italic, fontColor, backgroundColor,
                             horizontalAlign; clear=true removes the style
  GET_STYLE <cell>           Current style
  INSERT_ROWS <row> [n]      Insert n rows before a 1-based row
  REMOVE_ROWS <row> [n]      Remove n rows
  INSERT_COLS <col> [n]      Insert n columns before a column letter
  REMOVE_COLS <col> [n]      Remove n columns
  SORT <range> [by=A,B] [order=asc|desc] [header=true]
                             Sort rows by key columns (default: first column)
  UNDO / REDO
  DUMP <range> [formulas=true]
  STATS
  ECHO <text>
  ASSERT <cell> <op> <value> Operators: == != <> < > <= >=
  ASSERT_ERROR               Expect the next command to fail
  RESET                      Clear the sheet and history
  QUIT

EXAMPLE:
  SET A1 1
  SET B1 2
  SET C1 =SUM(A1:B1)
  ASSERT C1 == 3
  INSERT_ROWS 1
  ASSERT C2 == 3
  UNDO
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  let cliArgs: CLIArgs;
  try {
    cliArgs = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error('Run with --help for usage.');
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config: HarnessConfig = { ...DEFAULT_CONFIG, ...cliArgs.config };
  const runner = createHarnessRunner(config);
  const outputs: Output[] = [];

  runner.onOutput(output => {
    outputs.push(output);
    console.log(formatOutput(output, config));
  });

  if (cliArgs.interactive || process.stdin.isTTY) {
    await runInteractive(runner);
  } else {
    await runPiped(runner);
  }

  if (hasFailures(outputs)) {
    process.exitCode = 1;
  }
}

async function runInteractive(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'tabula> ',
  });

  rl.prompt();
  let lineNumber = 0;

  for await (const line of rl) {
    lineNumber++;
    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      continue;
    }

    try {
      if (!runner.executeLine(line, lineNumber)) break;
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      console.error(error.message);
    }
    rl.prompt();
  }

  rl.close();
}

async function runPiped(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, terminal: false });

  const lines: string[] = [];
  for await (const line of rl) {
    lines.push(line);
  }

  try {
    runner.executeScript(lines.join('\n'));
  } catch (error) {
    if (!(error instanceof ParseError)) throw error;
    console.error(error.message);
    process.exitCode = 2;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exitCode = 1;
});
