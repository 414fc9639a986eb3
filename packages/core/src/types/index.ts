// Logging types
export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: LogContext;
}

// Source locations
export interface SourcePosition {
  /** Zero-based offset into the source string, in UTF-16 code units. */
  offset: number;
  line: number;
  column: number;
}

export interface SourceSpan {
  start: number;
  end: number;
}

// Explanatory output
export interface MathStep {
  label: string;
  value: string;
}
