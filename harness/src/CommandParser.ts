/**
 * Tabula Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...] [key=value...]
 *
 * Cell Operations:
 *   SET A1 100                             - Set cell content
 *   SET A1 Hello World                     - Text (quotes optional)
 *   SET A1 =SUM(B1:B10)                    - Set formula
 *   GET A1                                 - Stored content and value
 *   EVAL =GEMATRIA("LIGHT")                - Evaluate without storing
 *
 * Styles:
 *   STYLE A1 bold=true backgroundColor=#ffee00
 *   GET_STYLE A1
 *
 * Structure (rows 1-based, columns by letter):
 *   INSERT_ROWS 2 [count] / REMOVE_ROWS 2 [count]
 *   INSERT_COLS B [count] / REMOVE_COLS B [count]
 *   SORT A1:C10 by=B,A order=desc header=true
 *
 * History:
 *   UNDO / REDO
 *
 * State Inspection:
 *   DUMP A1:B10 / STATS
 *
 * Utility:
 *   ECHO text / ASSERT A1 == 6 / ASSERT_ERROR / RESET / QUIT
 *
 * Lines starting with # or // are comments.
 */

import { CommandType, OptionValue, ParsedCommand } from './types.js';

const COMMAND_TYPES: ReadonlyArray<CommandType> = [
  'SET', 'GET', 'EVAL',
  'STYLE', 'GET_STYLE',
  'INSERT_ROWS', 'REMOVE_ROWS', 'INSERT_COLS', 'REMOVE_COLS', 'SORT',
  'UNDO', 'REDO',
  'DUMP', 'STATS',
  'ECHO', 'ASSERT', 'ASSERT_ERROR',
  'RESET', 'QUIT',
];

/** Commands whose argument text is taken verbatim */
const RAW_TEXT_COMMANDS: ReadonlySet<CommandType> = new Set<CommandType>(['SET', 'EVAL', 'ECHO']);

function toCommandType(word: string): CommandType | null {
  return COMMAND_TYPES.find(type => type === word) ?? null;
}

export function isComment(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//');
}

// =============================================================================
// Command Parser
// =============================================================================

export class CommandParser {
  /**
   * Parse a single command line. Blank lines and comments give null.
   * @throws ParseError for an unknown command or an unterminated string
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    if (isComment(line)) return null;
    const trimmed = line.trim();

    const spaceIndex = trimmed.search(/\s/);
    const word = spaceIndex === -1 ? trimmed : trimmed.slice(0, spaceIndex);
    const argText = spaceIndex === -1 ? '' : trimmed.slice(spaceIndex).trim();

    const type = toCommandType(word.toUpperCase());
    if (!type) {
      throw new ParseError(`Unknown command: ${word.toUpperCase()}`, lineNumber, trimmed);
    }

    if (RAW_TEXT_COMMANDS.has(type)) {
      return {
        type,
        args: argText === '' ? [] : argText.split(/\s+/),
        options: {},
        argText,
        raw: trimmed,
        lineNumber,
      };
    }

    const args: string[] = [];
    const options: Record<string, OptionValue> = {};

    for (const token of this.tokenize(argText, lineNumber)) {
      // Only identifier keys make options, so "==" and ">=" stay arguments
      const eqIndex = token.text.indexOf('=');
      const key = eqIndex > 0 ? token.text.substring(0, eqIndex) : '';
      if (!token.quoted && /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(key)) {
        options[key] = this.parseOptionValue(token.text.substring(eqIndex + 1));
      } else {
        args.push(token.text);
      }
    }

    return { type, args, options, argText, raw: trimmed, lineNumber };
  }

  /**
   * Parse multiple lines. Line numbers are 1-based.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i], i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split(/\r?\n/));
  }

  /**
   * Split on whitespace, keeping quoted strings whole.
   */
  private tokenize(text: string, lineNumber: number): Array<{ text: string; quoted: boolean }> {
    const tokens: Array<{ text: string; quoted: boolean }> = [];
    let current = '';
    let quoteChar = '';

    for (let i = 0; i < text.length; i++) {
      const char = text[i];

      if (quoteChar) {
        if (char === quoteChar) {
          tokens.push({ text: current, quoted: true });
          current = '';
          quoteChar = '';
        } else if (char === '\\' && (text[i + 1] === quoteChar || text[i + 1] === '\\')) {
          current += text[i + 1];
          i++;
        } else {
          current += char;
        }
      } else if (char === '"' || char === "'") {
        if (current !== '') {
          tokens.push({ text: current, quoted: false });
          current = '';
        }
        quoteChar = char;
      } else if (char === ' ' || char === '\t') {
        if (current !== '') {
          tokens.push({ text: current, quoted: false });
          current = '';
        }
      } else {
        current += char;
      }
    }

    if (quoteChar) {
      throw new ParseError('Unterminated string', lineNumber, text);
    }
    if (current !== '') {
      tokens.push({ text: current, quoted: false });
    }

    return tokens;
  }

  private parseOptionValue(value: string): OptionValue {
    if (value.toLowerCase() === 'true') return true;
    if (value.toLowerCase() === 'false') return false;
    if (/^-?\d+\.?\d*$/.test(value)) return parseFloat(value);
    return value;
  }
}

// =============================================================================
// Parse Error
// =============================================================================

export class ParseError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Parse error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
