/**
 * Tabula Engine - Formula Tokenizer
 */

export type TokenType =
  | 'number'
  | 'string'
  | 'identifier'  // cell address, function name, TRUE/FALSE
  | 'operator'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'colon'
  | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the first character in the formula body */
  position: number;
}

export class FormulaSyntaxError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.name = 'FormulaSyntaxError';
    this.position = position;
  }
}

const TWO_CHAR_OPERATORS = new Set(['<=', '>=', '<>']);
const ONE_CHAR_OPERATORS = new Set(['+', '-', '*', '/', '^', '&', '=', '<', '>']);

// Sticky: matched in place at lastIndex
const NUMBER_PATTERN = /(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENTIFIER_PATTERN = /[$A-Za-z_][$A-Za-z0-9_]*/y;

function matchAt(pattern: RegExp, text: string, index: number): string | null {
  pattern.lastIndex = index;
  const match = pattern.exec(text);
  return match ? match[0] : null;
}

/**
 * Split formula text (without the leading "=") into tokens.
 * Always ends with an 'eof' token.
 *
 * @throws FormulaSyntaxError on an unterminated string or a stray character
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      i++;
      continue;
    }

    if (ch === '"') {
      const start = i;
      let value = '';
      i++;
      for (;;) {
        if (i >= text.length) {
          throw new FormulaSyntaxError('Unterminated string literal', start);
        }
        if (text[i] === '"') {
          // "" inside a string is an escaped quote
          if (text[i + 1] === '"') {
            value += '"';
            i += 2;
            continue;
          }
          i++;
          break;
        }
        value += text[i];
        i++;
      }
      tokens.push({ type: 'string', value, position: start });
      continue;
    }

    const number = matchAt(NUMBER_PATTERN, text, i);
    if (number !== null) {
      tokens.push({ type: 'number', value: number, position: i });
      i += number.length;
      continue;
    }

    const identifier = matchAt(IDENTIFIER_PATTERN, text, i);
    if (identifier !== null) {
      tokens.push({ type: 'identifier', value: identifier, position: i });
      i += identifier.length;
      continue;
    }

    const pair = text.slice(i, i + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      tokens.push({ type: 'operator', value: pair, position: i });
      i += 2;
      continue;
    }

    if (ONE_CHAR_OPERATORS.has(ch)) {
      tokens.push({ type: 'operator', value: ch, position: i });
      i++;
      continue;
    }

    switch (ch) {
      case '(':
        tokens.push({ type: 'lparen', value: ch, position: i });
        break;
      case ')':
        tokens.push({ type: 'rparen', value: ch, position: i });
        break;
      case ',':
        tokens.push({ type: 'comma', value: ch, position: i });
        break;
      case ':':
        tokens.push({ type: 'colon', value: ch, position: i });
        break;
      default:
        throw new FormulaSyntaxError(`Unexpected character '${ch}'`, i);
    }
    i++;
  }

  tokens.push({ type: 'eof', value: '', position: text.length });
  return tokens;
}
