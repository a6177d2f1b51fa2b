import { describe, it, expect } from 'vitest';
import { tokenize, FormulaSyntaxError } from './Tokenizer.js';

function shape(text: string): string[] {
  return tokenize(text).map(token => `${token.type}:${token.value}`);
}

describe('tokenize', () => {
  it('should split operators, numbers and identifiers', () => {
    expect(shape('A1+2.5*B$2')).toEqual([
      'identifier:A1',
      'operator:+',
      'number:2.5',
      'operator:*',
      'identifier:B$2',
      'eof:',
    ]);
  });

  it('should recognize two-character comparisons', () => {
    expect(shape('1<>2<=3>=4')).toEqual([
      'number:1', 'operator:<>', 'number:2', 'operator:<=', 'number:3', 'operator:>=', 'number:4', 'eof:',
    ]);
  });

  it('should read strings with escaped quotes', () => {
    const tokens = tokenize('"say ""hi"""&x');
    expect(tokens[0]).toEqual({ type: 'string', value: 'say "hi"', position: 0 });
    expect(tokens[1]).toEqual({ type: 'operator', value: '&', position: 12 });
  });

  it('should read exponents and leading-dot numbers', () => {
    expect(shape('1e3+.5')).toEqual(['number:1e3', 'operator:+', 'number:.5', 'eof:']);
  });

  it('should emit punctuation tokens with positions', () => {
    const tokens = tokenize('SUM(A1:B2, 3)');
    expect(tokens.map(t => t.type)).toEqual([
      'identifier', 'lparen', 'identifier', 'colon', 'identifier', 'comma', 'number', 'rparen', 'eof',
    ]);
    expect(tokens[6].position).toBe(11);
    expect(tokens[8].position).toBe(13);
  });

  it('should throw on an unterminated string', () => {
    expect(() => tokenize('"abc')).toThrow(FormulaSyntaxError);
    expect(() => tokenize('"abc')).toThrow('Unterminated string literal');
  });

  it('should throw on a stray character with its position', () => {
    try {
      tokenize('1 # 2');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FormulaSyntaxError);
      if (error instanceof FormulaSyntaxError) {
        expect(error.message).toBe("Unexpected character '#'");
        expect(error.position).toBe(2);
      }
    }
  });
});
