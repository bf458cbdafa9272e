/**
 * Logger abstraction shared by the language server and the CLI
 * Writes to the LSP connection console when one is attached, otherwise to the process console
 */

import type { Connection } from 'vscode-languageserver/node';

/**
 * Log levels
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  VERBOSE = 4
}

/**
 * Context attached to a log line about a file being formatted
 */
export interface LogContext {
  file?: string;
  line?: number;
  operation?: string;
  error?: unknown;
}

export class Logger {
  private connection: Connection | null = null;
  private level: LogLevel = LogLevel.INFO;
  private verboseLogging: boolean = false;

  /**
   * Attach the logger to a language server connection
   */
  initialize(connection: Connection | null, level: LogLevel = LogLevel.INFO, verboseLogging: boolean = false): void {
    this.connection = connection;
    this.level = level;
    this.verboseLogging = verboseLogging;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setVerboseLogging(enabled: boolean): void {
    this.verboseLogging = enabled;
    if (enabled) {
      this.info('Verbose logging enabled');
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.ERROR) {
      const formatted = this.format(message, args);
      if (this.connection) {
        this.connection.console.error(formatted);
      } else {
        console.error(formatted);
      }
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.WARN) {
      const formatted = this.format(message, args);
      if (this.connection) {
        this.connection.console.warn(formatted);
      } else {
        console.warn(formatted);
      }
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.INFO) {
      const formatted = this.format(message, args);
      if (this.connection) {
        this.connection.console.info(formatted);
      } else {
        console.info(formatted);
      }
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level >= LogLevel.DEBUG) {
      const formatted = this.format(message, args);
      if (this.connection) {
        this.connection.console.log(formatted);
      } else {
        console.debug(formatted);
      }
    }
  }

  /**
   * Only shown when verbose logging is enabled or the level is VERBOSE
   */
  verbose(message: string, ...args: unknown[]): void {
    if (this.verboseLogging || this.level >= LogLevel.VERBOSE) {
      const formatted = `[VERBOSE] ${this.format(message, args)}`;
      if (this.connection) {
        this.connection.console.log(formatted);
      } else {
        console.log(formatted);
      }
    }
  }

  errorWithContext(message: string, context: LogContext): void {
    this.error(this.withContext(message, context, true));
  }

  warnWithContext(message: string, context: LogContext): void {
    this.warn(this.withContext(message, context, false));
  }

  private withContext(message: string, context: LogContext, includeStack: boolean): string {
    const parts: string[] = [message];

    if (context.file) {
      parts.push(`File: ${context.file}`);
    }
    if (context.line !== undefined) {
      parts.push(`Line: ${context.line}`);
    }
    if (context.operation) {
      parts.push(`Operation: ${context.operation}`);
    }
    if (context.error) {
      const errorMessage = context.error instanceof Error ? context.error.message : String(context.error);
      parts.push(`Error: ${errorMessage}`);
      const errorStack = context.error instanceof Error ? context.error.stack : undefined;
      if (includeStack && errorStack && this.level >= LogLevel.DEBUG) {
        parts.push(`Stack: ${errorStack}`);
      }
    }

    return parts.join(' | ');
  }

  private format(message: string, args: unknown[]): string {
    if (args.length === 0) {
      return message;
    }
    try {
      return `${message} ${args.map(arg =>
        typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
      ).join(' ')}`;
    } catch {
      return `${message} [Error formatting arguments]`;
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
