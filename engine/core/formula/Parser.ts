/**
 * Tabula Engine - Formula Parser
 *
 * Recursive descent over the token stream. Precedence, lowest first:
 *   comparison  = <> < > <= >=
 *   concat      &
 *   additive    + -
 *   multiplicative * /
 *   power       ^            (left-associative)
 *   unary       - +
 *   primary     number | string | TRUE/FALSE | address | range | call | ( expr )
 *
 * Parsing never throws to the caller: malformed input comes back as a
 * failed ParseResult. Nesting (parentheses, call arguments and unary
 * signs) is capped at MAX_NESTING levels.
 */

import { FormulaErrors } from '../types/index.js';
import type { CellRange, FormulaValue } from '../types/index.js';
import { isAddressSyntax, parseCellAddress, normalizeRange } from './CellReference.js';
import { tokenize, Token, FormulaSyntaxError } from './Tokenizer.js';

// =============================================================================
// AST
// =============================================================================

export type ComparisonOperator = '=' | '<>' | '<' | '>' | '<=' | '>=';

export type BinaryOperator = '+' | '-' | '*' | '/' | '^' | '&' | ComparisonOperator;

export type UnaryOperator = '-' | '+';

export interface LiteralNode {
  type: 'literal';
  value: FormulaValue;
}

export interface CellNode {
  type: 'cell';
  row: number;
  col: number;
}

export interface RangeNode {
  type: 'range';
  range: CellRange;
}

export interface BinaryNode {
  type: 'binary';
  operator: BinaryOperator;
  left: AstNode;
  right: AstNode;
}

export interface UnaryNode {
  type: 'unary';
  operator: UnaryOperator;
  operand: AstNode;
}

export interface CallNode {
  type: 'call';
  /** Uppercased function name */
  name: string;
  args: AstNode[];
}

export type AstNode =
  | LiteralNode
  | CellNode
  | RangeNode
  | BinaryNode
  | UnaryNode
  | CallNode;

export type ParseResult =
  | { ok: true; ast: AstNode }
  | { ok: false; message: string; position: number };

/** Deepest accepted nesting of sub-expressions */
export const MAX_NESTING = 256;

const COMPARISON_OPERATORS: readonly ComparisonOperator[] = ['=', '<>', '<', '>', '<=', '>='];

function asComparison(token: Token): ComparisonOperator | undefined {
  if (token.type !== 'operator') return undefined;
  return COMPARISON_OPERATORS.find((op) => op === token.value);
}

// =============================================================================
// Parser
// =============================================================================

class Parser {
  private tokens: Token[];
  private pos = 0;
  private nesting = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): AstNode {
    const node = this.comparison();
    const trailing = this.peek();
    if (trailing.type !== 'eof') {
      throw new FormulaSyntaxError(`Unexpected '${trailing.value}'`, trailing.position);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== 'eof') this.pos++;
    return token;
  }

  private expect(type: Token['type']): Token {
    const token = this.peek();
    if (token.type !== type) {
      const found = token.type === 'eof' ? 'end of formula' : `'${token.value}'`;
      throw new FormulaSyntaxError(`Expected ${type}, found ${found}`, token.position);
    }
    return this.next();
  }

  private enter(token: Token): void {
    this.nesting++;
    if (this.nesting > MAX_NESTING) {
      throw new FormulaSyntaxError(`Formula nested more than ${MAX_NESTING} levels deep`, token.position);
    }
  }

  private leave(): void {
    this.nesting--;
  }

  private isOperator(...values: string[]): boolean {
    const token = this.peek();
    return token.type === 'operator' && values.includes(token.value);
  }

  private comparison(): AstNode {
    this.enter(this.peek());
    let node = this.concatenation();
    let operator = asComparison(this.peek());
    while (operator) {
      this.next();
      node = { type: 'binary', operator, left: node, right: this.concatenation() };
      operator = asComparison(this.peek());
    }
    this.leave();
    return node;
  }

  private concatenation(): AstNode {
    let node = this.additive();
    while (this.isOperator('&')) {
      this.next();
      node = { type: 'binary', operator: '&', left: node, right: this.additive() };
    }
    return node;
  }

  private additive(): AstNode {
    let node = this.multiplicative();
    while (this.isOperator('+', '-')) {
      const operator = this.next().value === '+' ? '+' : '-';
      node = { type: 'binary', operator, left: node, right: this.multiplicative() };
    }
    return node;
  }

  private multiplicative(): AstNode {
    let node = this.power();
    while (this.isOperator('*', '/')) {
      const operator = this.next().value === '*' ? '*' : '/';
      node = { type: 'binary', operator, left: node, right: this.power() };
    }
    return node;
  }

  private power(): AstNode {
    let node = this.unary();
    while (this.isOperator('^')) {
      this.next();
      node = { type: 'binary', operator: '^', left: node, right: this.unary() };
    }
    return node;
  }

  private unary(): AstNode {
    if (this.isOperator('-', '+')) {
      const token = this.next();
      const operator = token.value === '-' ? '-' : '+';
      this.enter(token);
      const operand = this.unary();
      this.leave();
      return { type: 'unary', operator, operand };
    }
    return this.primary();
  }

  private primary(): AstNode {
    const token = this.peek();

    switch (token.type) {
      case 'number':
        this.next();
        return { type: 'literal', value: Number(token.value) };

      case 'string':
        this.next();
        return { type: 'literal', value: token.value };

      case 'lparen': {
        this.next();
        const inner = this.comparison();
        this.expect('rparen');
        return inner;
      }

      case 'identifier':
        return this.identifier();

      case 'eof':
        throw new FormulaSyntaxError('Unexpected end of formula', token.position);

      default:
        throw new FormulaSyntaxError(`Unexpected '${token.value}'`, token.position);
    }
  }

  private identifier(): AstNode {
    const token = this.next();
    const name = token.value;

    if (this.peek().type === 'lparen') {
      if (name.includes('$')) {
        throw new FormulaSyntaxError(`Invalid function name '${name}'`, token.position);
      }
      return this.call(name.toUpperCase());
    }

    const upper = name.toUpperCase();
    if (upper === 'TRUE') return { type: 'literal', value: true };
    if (upper === 'FALSE') return { type: 'literal', value: false };

    if (!isAddressSyntax(name)) {
      throw new FormulaSyntaxError(`Unknown identifier '${name}'`, token.position);
    }
    const start = parseCellAddress(name);

    if (this.peek().type === 'colon') {
      this.next();
      const endToken = this.expect('identifier');
      if (!isAddressSyntax(endToken.value)) {
        throw new FormulaSyntaxError(
          `Expected cell reference after ':', found '${endToken.value}'`,
          endToken.position
        );
      }
      const end = parseCellAddress(endToken.value);
      if (!start || !end) return { type: 'literal', value: FormulaErrors.REF };
      return { type: 'range', range: normalizeRange(start, end) };
    }

    // Well-formed but off the sheet
    if (!start) return { type: 'literal', value: FormulaErrors.REF };
    return { type: 'cell', row: start.row, col: start.col };
  }

  private call(name: string): CallNode {
    this.expect('lparen');
    const args: AstNode[] = [];

    if (this.peek().type === 'rparen') {
      this.next();
      return { type: 'call', name, args };
    }

    for (;;) {
      const token = this.peek();
      // Empty slot: FUNC(a,,b) or FUNC(a,)
      if (token.type === 'comma' || token.type === 'rparen') {
        args.push({ type: 'literal', value: null });
      } else {
        args.push(this.comparison());
      }

      if (this.peek().type === 'comma') {
        this.next();
        continue;
      }
      this.expect('rparen');
      return { type: 'call', name, args };
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse formula text. Accepts the body with or without its leading "=".
 */
export function parseFormula(text: string): ParseResult {
  const body = text.startsWith('=') ? text.slice(1) : text;

  try {
    const tokens = tokenize(body);
    return { ok: true, ast: new Parser(tokens).parse() };
  } catch (error) {
    if (error instanceof FormulaSyntaxError) {
      return { ok: false, message: error.message, position: error.position };
    }
    throw error;
  }
}
