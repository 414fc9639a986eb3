import { describe, it, expect } from '@jest/globals';
import { tokenize } from '../src/parsing/lexer';
import { LexError } from '../src/parsing/errors';
import type { Token } from '../src/parsing/tokens';

function brief(tokens: Token[]): [string, string][] {
  return tokens.map(token => [token.kind, token.value]);
}

describe('tokenize', () => {
  describe('Basic tokens', () => {
    it('should tokenize an assignment with positions', () => {
      const tokens = tokenize('x <- 1');

      expect(brief(tokens)).toEqual([
        ['identifier', 'x'],
        ['operator', '<-'],
        ['number', '1'],
        ['eof', ''],
      ]);
      expect(tokens.map(token => token.column)).toEqual([1, 3, 6, 7]);
    });

    it('should report line and column across lines', () => {
      const tokens = tokenize('begin\n  x <- 1\nend');
      const x = tokens[1];

      expect(x?.value).toBe('x');
      expect(x?.line).toBe(2);
      expect(x?.column).toBe(3);
      expect(tokens[4]).toMatchObject({ kind: 'keyword', value: 'end', line: 3, column: 1 });
    });

    it('should lowercase keywords but keep the lexeme', () => {
      const tokens = tokenize('BEGIN End');

      expect(tokens[0]).toMatchObject({ kind: 'keyword', value: 'begin', lexeme: 'BEGIN' });
      expect(tokens[1]).toMatchObject({ kind: 'keyword', value: 'end', lexeme: 'End' });
    });

    it('should keep identifier case', () => {
      expect(tokenize('MergeSort')[0]).toMatchObject({ kind: 'identifier', value: 'MergeSort' });
    });

    it('should read booleans, null and strings', () => {
      expect(brief(tokenize('TRUE false null "done"'))).toEqual([
        ['boolean', 'true'],
        ['boolean', 'false'],
        ['null', 'null'],
        ['string', 'done'],
        ['eof', ''],
      ]);
    });
  });

  describe('Operator glyphs', () => {
    it('should fold every assignment spelling to <-', () => {
      for (const glyph of ['<-', ':=', '←']) {
        const [, operator] = tokenize(`x ${glyph} 2`);
        expect(operator).toMatchObject({ kind: 'operator', value: '<-', lexeme: glyph });
      }
    });

    it('should count an astral arrow as one column', () => {
      const tokens = tokenize('a 🡨 b');

      expect(tokens[1]).toMatchObject({ value: '<-', lexeme: '🡨', column: 3 });
      expect(tokens[2]).toMatchObject({ value: 'b', column: 5 });
      expect(tokens[2]?.span).toEqual({ start: 5, end: 6 });
    });

    it('should normalise comparison and arithmetic glyphs', () => {
      const values = tokenize('a ≤ b ≥ c ≠ d != e × f ÷ g')
        .filter(token => token.kind === 'operator')
        .map(token => token.value);

      expect(values).toEqual(['<=', '>=', '<>', '<>', '*', '/']);
    });

    it('should tell a range from a decimal', () => {
      expect(brief(tokenize('1..n 3.5'))).toEqual([
        ['number', '1'],
        ['operator', '..'],
        ['identifier', 'n'],
        ['number', '3.5'],
        ['eof', ''],
      ]);
    });

    it('should read infinity as an identifier', () => {
      expect(tokenize('∞')[0]).toMatchObject({ kind: 'identifier', value: 'infinity', lexeme: '∞' });
    });
  });

  describe('Dialect words', () => {
    it('should split a field access on the dot', () => {
      expect(brief(tokenize('A.length - 1.5'))).toEqual([
        ['identifier', 'A'],
        ['punctuation', '.'],
        ['identifier', 'length'],
        ['operator', '-'],
        ['number', '1.5'],
        ['eof', ''],
      ]);
    });

    it('should read swap, print and declaration words as keywords', () => {
      const kinds = tokenize('Swap with PRINT let declare').map(token => [token.kind, token.value]);

      expect(kinds).toEqual([
        ['keyword', 'swap'],
        ['keyword', 'with'],
        ['keyword', 'print'],
        ['keyword', 'let'],
        ['keyword', 'declare'],
        ['eof', ''],
      ]);
    });
  });

  describe('Comments', () => {
    it('should skip both comment styles to the end of the line', () => {
      const tokens = tokenize('x <- 1 ► note\n// another\ny <- 2');

      expect(brief(tokens).map(([, value]) => value)).toEqual(['x', '<-', '1', 'y', '<-', '2', '']);
      expect(tokens[3]).toMatchObject({ line: 3, column: 1 });
    });
  });

  describe('Errors', () => {
    it('should reject an unknown character with its position', () => {
      expect(() => tokenize('x <- $')).toThrow(LexError);
      expect(() => tokenize('x <- $')).toThrow("Unrecognized character '$' at line 1, column 6");
    });

    it('should reject an unterminated string', () => {
      expect(() => tokenize('"abc')).toThrow('Unterminated string starting at line 1, column 1');
    });

    it('should expose the error code in its JSON form', () => {
      try {
        tokenize('@');
        throw new Error('expected a LexError');
      } catch (error) {
        expect(error).toBeInstanceOf(LexError);
        if (error instanceof LexError) {
          expect(error.toJSON()).toEqual({
            code: 'LEX_ERROR',
            message: "Unrecognized character '@' at line 1, column 1",
            position: { offset: 0, line: 1, column: 1 },
            character: '@',
          });
        }
      }
    });
  });
});
