/**
 * Logger - leveled logging to stderr
 *
 * Level and format come from ENCDETECT_LOG_LEVEL / ENCDETECT_LOG_FORMAT.
 * Everything goes to stderr so CLI output on stdout stays machine-readable.
 */

import { loadConfig } from '../config/detector-config.js';
import type { LogFormat, LogLevel } from '../config/detector-config.js';

export type LogContext = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogSink {
  write(line: string): void;
}

const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(line + '\n');
  },
};

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private readonly scope?: string;
  private readonly sink: LogSink;

  constructor(
    options: { level?: LogLevel; format?: LogFormat; scope?: string; sink?: LogSink } = {}
  ) {
    const config = options.level && options.format ? undefined : loadConfig();
    this.level = options.level ?? config?.logLevel ?? 'warn';
    this.format = options.format ?? config?.logFormat ?? 'text';
    this.scope = options.scope;
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Re-read level and format, e.g. after a .env file was loaded.
   */
  configure(config: { logLevel: LogLevel; logFormat: LogFormat }): void {
    this.level = config.logLevel;
    this.format = config.logFormat;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  /**
   * Derive a logger that tags every entry with `scope`.
   */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger({ level: this.level, format: this.format, scope: nested, sink: this.sink });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink.write(this.formatEntry(level, message, context));
  }

  private formatEntry(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      return JSON.stringify({ timestamp, level, scope: this.scope, message, ...context });
    }

    const scope = this.scope ? ` [${this.scope}]` : '';
    const suffix = context && Object.keys(context).length > 0 ? ' ' + safeStringify(context) : '';
    return `${timestamp} ${level.toUpperCase()}${scope} ${message}${suffix}`;
  }
}

function safeStringify(value: LogContext): string {
  try {
    return JSON.stringify(value);
  } catch {
    return '[Circular]';
  }
}

export const logger = new Logger();
