import type { SourceSpan } from '../types/index.js';

export type TokenKind =
  | 'identifier'
  | 'number'
  | 'string'
  | 'boolean'
  | 'null'
  | 'keyword'
  | 'operator'
  | 'punctuation'
  | 'eof';

export interface Token {
  readonly kind: TokenKind;
  /** Normalised text: keywords lowercased, operator glyph variants folded to ASCII. */
  readonly value: string;
  /** Text exactly as it appears in the source. */
  readonly lexeme: string;
  readonly span: SourceSpan;
  readonly line: number;
  readonly column: number;
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  'begin',
  'end',
  'for',
  'to',
  'downto',
  'step',
  'do',
  'while',
  'repeat',
  'until',
  'if',
  'then',
  'else',
  'call',
  'return',
  'and',
  'or',
  'not',
  'div',
  'mod',
  'algorithm',
  'procedure',
  'function',
  'swap',
  'with',
  'print',
  'let',
  'declare',
]);

/**
 * Multi-character operators first so the lexer can match greedily.
 * Values are the normalised spelling.
 */
export const OPERATORS: ReadonlyArray<readonly [string, string]> = [
  ['🡨', '<-'],
  ['<-', '<-'],
  [':=', '<-'],
  ['←', '<-'],
  ['<=', '<='],
  ['>=', '>='],
  ['<>', '<>'],
  ['!=', '<>'],
  ['≤', '<='],
  ['≥', '>='],
  ['≠', '<>'],
  ['..', '..'],
  ['=', '='],
  ['<', '<'],
  ['>', '>'],
  ['+', '+'],
  ['-', '-'],
  ['*', '*'],
  ['×', '*'],
  ['/', '/'],
  ['÷', '/'],
  ['^', '^'],
  ['⌈', '⌈'],
  ['⌉', '⌉'],
  ['⌊', '⌊'],
  ['⌋', '⌋'],
];

export const PUNCTUATION: ReadonlySet<string> = new Set(['(', ')', '[', ']', ',', ';', '.']);

export const COMMENT_GLYPHS: readonly string[] = ['►', '//'];

export function describeToken(token: Token): string {
  if (token.kind === 'eof') return 'end of input';
  return `'${token.lexeme}'`;
}
