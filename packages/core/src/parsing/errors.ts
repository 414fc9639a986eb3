import type { SourcePosition } from '../types/index.js';

export type AnalysisErrorCode = 'LEX_ERROR' | 'PARSE_ERROR';

/**
 * Base class for the errors that stop an analysis before a report exists.
 * Everything after parsing degrades into annotations instead of throwing.
 */
export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;
  readonly position: SourcePosition;

  constructor(message: string, position: SourcePosition) {
    super(message);
    this.name = new.target.name;
    this.position = position;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      message: this.message,
      position: this.position,
    };
  }
}

export class LexError extends AnalysisError {
  readonly code = 'LEX_ERROR';
  readonly character: string;

  constructor(character: string, position: SourcePosition, detail?: string) {
    super(
      detail ??
        `Unrecognized character '${character}' at line ${position.line}, column ${position.column}`,
      position
    );
    this.character = character;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), character: this.character };
  }
}

export class ParseError extends AnalysisError {
  readonly code = 'PARSE_ERROR';
  readonly expected: string;
  readonly found: string;

  constructor(expected: string, found: string, position: SourcePosition) {
    super(
      `Expected ${expected} but found ${found} at line ${position.line}, column ${position.column}`,
      position
    );
    this.expected = expected;
    this.found = found;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), expected: this.expected, found: this.found };
  }
}
