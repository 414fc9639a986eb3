import { LexError } from './errors.js';
import { COMMENT_GLYPHS, KEYWORDS, OPERATORS, PUNCTUATION } from './tokens.js';
import type { Token, TokenKind } from './tokens.js';
import type { SourcePosition } from '../types/index.js';

const INFINITY_GLYPH = '∞';

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentifierStart(ch: string): boolean {
  return /^[\p{L}_]$/u.test(ch);
}

function isIdentifierPart(ch: string): boolean {
  return /^[\p{L}\p{N}_]$/u.test(ch);
}

/**
 * Single-pass scanner over code points. Columns count code points, so an
 * astral glyph such as the arrow variant of assignment is one column wide.
 */
export class Lexer {
  private offset = 0;
  private line = 1;
  private column = 1;
  private readonly tokens: Token[] = [];

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    while (this.offset < this.source.length) {
      const ch = this.peekChar();

      if (ch === '\n') {
        this.advance();
        continue;
      }
      if (/\s/u.test(ch)) {
        this.advance();
        continue;
      }
      if (this.startsWithAny(COMMENT_GLYPHS)) {
        this.skipComment();
        continue;
      }
      if (isDigit(ch)) {
        this.readNumber();
        continue;
      }
      if (ch === '"') {
        this.readString();
        continue;
      }
      if (ch === INFINITY_GLYPH) {
        const start = this.position();
        this.advance();
        this.push('identifier', 'infinity', start);
        continue;
      }
      if (isIdentifierStart(ch)) {
        this.readWord();
        continue;
      }
      if (this.readOperator()) {
        continue;
      }
      if (PUNCTUATION.has(ch)) {
        const start = this.position();
        this.advance();
        this.push('punctuation', ch, start);
        continue;
      }

      throw new LexError(ch, this.position());
    }

    const end = this.position();
    this.tokens.push({
      kind: 'eof',
      value: '',
      lexeme: '',
      span: { start: end.offset, end: end.offset },
      line: end.line,
      column: end.column,
    });
    return this.tokens;
  }

  private readNumber(): void {
    const start = this.position();
    while (this.offset < this.source.length && isDigit(this.peekChar())) {
      this.advance();
    }
    // A dot followed by a digit is a decimal point; `1..n` is a range.
    if (this.peekChar() === '.' && isDigit(this.peekChar(1))) {
      this.advance();
      while (this.offset < this.source.length && isDigit(this.peekChar())) {
        this.advance();
      }
    }
    this.push('number', this.source.slice(start.offset, this.offset), start);
  }

  private readString(): void {
    const start = this.position();
    this.advance();
    while (this.offset < this.source.length && this.peekChar() !== '"') {
      if (this.peekChar() === '\n') break;
      this.advance();
    }
    if (this.peekChar() !== '"') {
      throw new LexError('"', start, `Unterminated string starting at line ${start.line}, column ${start.column}`);
    }
    this.advance();
    const lexeme = this.source.slice(start.offset, this.offset);
    this.tokens.push({
      kind: 'string',
      value: lexeme.slice(1, -1),
      lexeme,
      span: { start: start.offset, end: this.offset },
      line: start.line,
      column: start.column,
    });
  }

  private readWord(): void {
    const start = this.position();
    while (this.offset < this.source.length && isIdentifierPart(this.peekChar())) {
      this.advance();
    }
    const lexeme = this.source.slice(start.offset, this.offset);
    const lowered = lexeme.toLowerCase();

    if (lowered === 'true' || lowered === 'false') {
      this.push('boolean', lowered, start);
    } else if (lowered === 'null') {
      this.push('null', lowered, start);
    } else if (KEYWORDS.has(lowered)) {
      this.push('keyword', lowered, start);
    } else {
      this.push('identifier', lexeme, start);
    }
  }

  private readOperator(): boolean {
    for (const [glyph, normalised] of OPERATORS) {
      if (this.source.startsWith(glyph, this.offset)) {
        const start = this.position();
        for (const _ of glyph) this.advance();
        this.push('operator', normalised, start);
        return true;
      }
    }
    return false;
  }

  private skipComment(): void {
    while (this.offset < this.source.length && this.peekChar() !== '\n') {
      this.advance();
    }
  }

  private startsWithAny(glyphs: readonly string[]): boolean {
    return glyphs.some(glyph => this.source.startsWith(glyph, this.offset));
  }

  private peekChar(ahead = 0): string {
    let offset = this.offset;
    for (let i = 0; i < ahead && offset < this.source.length; i++) {
      offset += String.fromCodePoint(this.source.codePointAt(offset) ?? 0).length;
    }
    const code = this.source.codePointAt(offset);
    return code === undefined ? '' : String.fromCodePoint(code);
  }

  private advance(): void {
    const ch = this.peekChar();
    this.offset += ch.length;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
  }

  private position(): SourcePosition {
    return { offset: this.offset, line: this.line, column: this.column };
  }

  private push(kind: TokenKind, value: string, start: SourcePosition): void {
    this.tokens.push({
      kind,
      value,
      lexeme: this.source.slice(start.offset, this.offset),
      span: { start: start.offset, end: this.offset },
      line: start.line,
      column: start.column,
    });
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
