import type { LogEntry, LogContext } from '../types/index.js';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
}

export class Logger {
  private verbose: boolean;
  private silent: boolean;

  constructor(options: LoggerOptions | boolean = {}) {
    const resolved = typeof options === 'boolean' ? { verbose: options } : options;
    this.verbose = resolved.verbose ?? false;
    this.silent = resolved.silent ?? false;
  }

  /**
   * A logger that drops every entry, including raw `log` lines.
   */
  static silent(): Logger {
    return new Logger({ silent: true });
  }

  private createLogEntry(level: LogEntry['level'], message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);
    let message = `[${timestamp}] ${level} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      message += ` ${JSON.stringify(entry.context)}`;
    }

    return message;
  }

  // Levelled entries only print in verbose mode; `log` always prints.
  private enabled(): boolean {
    return this.verbose && !this.silent;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled()) return;
    const entry = this.createLogEntry('debug', message, context);
    console.debug(this.formatMessage(entry));
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled()) return;
    const entry = this.createLogEntry('info', message, context);
    console.log(this.formatMessage(entry));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled()) return;
    const entry = this.createLogEntry('warn', message, context);
    console.warn(this.formatMessage(entry));
  }

  error(message: string, context?: LogContext): void {
    if (!this.enabled()) return;
    const entry = this.createLogEntry('error', message, context);
    console.error(this.formatMessage(entry));
  }

  success(message: string, context?: LogContext): void {
    if (!this.enabled()) return;
    const entry = this.createLogEntry('info', `✅ ${message}`, context);
    console.log(this.formatMessage(entry));
  }

  /**
   * Print a line as-is, without timestamp or level.
   */
  log(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  isVerbose(): boolean {
    return this.verbose;
  }
}
