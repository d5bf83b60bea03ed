/**
 * Structured logging for the apply engine.
 *
 * Loggers are scoped to a subsystem (`executor`, `resolver`, `gateway-sync`)
 * and write entries to one or more transports. The engine never depends on
 * what a transport does with an entry.
 */

import chalk from 'chalk';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogLevelSetting = LogLevel | 'silent';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
}

export interface LogTransport {
  write(entry: LogEntry): void;
}

export interface Logger {
  readonly subsystem: string;
  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subsystem: string): Logger;
  isLevelEnabled(level: LogLevel): boolean;
}

const LEVEL_PRIORITY: Record<LogLevelSetting, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

export function shouldLog(level: LogLevel, minLevel: LogLevelSetting): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  trace: chalk.dim,
  debug: chalk.cyan,
  info: chalk.green,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface FormatOptions {
  colors?: boolean;
  timestamps?: boolean;
}

export function formatLogEntry(entry: LogEntry, options: FormatOptions = {}): string {
  const colors = options.colors ?? false;
  const parts: string[] = [];

  if (options.timestamps ?? true) {
    const ts = entry.timestamp.toISOString();
    parts.push(colors ? chalk.dim(ts) : ts);
  }

  const levelTag = entry.level.toUpperCase().padEnd(5);
  parts.push(colors ? LEVEL_STYLES[entry.level](levelTag) : levelTag);
  parts.push(colors ? chalk.blue(`[${entry.subsystem}]`) : `[${entry.subsystem}]`);
  parts.push(entry.message);

  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    const meta = JSON.stringify(entry.metadata);
    parts.push(colors ? chalk.dim(meta) : meta);
  }

  return parts.join(' ');
}

/**
 * Writes one line per entry to a stream, stderr by default so that progress
 * output on stdout stays machine-readable.
 */
export class StreamTransport implements LogTransport {
  constructor(
    private readonly stream: NodeJS.WritableStream = process.stderr,
    private readonly format: FormatOptions = {},
  ) {}

  write(entry: LogEntry): void {
    this.stream.write(`${formatLogEntry(entry, this.format)}\n`);
  }
}

/**
 * Keeps entries in memory. Used by tests and by callers that want to
 * attach engine logs to their own reports.
 */
export class MemoryTransport implements LogTransport {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}

export interface LoggerOptions {
  level?: LogLevelSetting;
  subsystem?: string;
  transports?: LogTransport[];
}

class StructuredLogger implements Logger {
  constructor(
    readonly subsystem: string,
    private readonly level: LogLevelSetting,
    private readonly transports: readonly LogTransport[],
  ) {}

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log('trace', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  child(subsystem: string): Logger {
    return new StructuredLogger(`${this.subsystem}:${subsystem}`, this.level, this.transports);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date(), level, subsystem: this.subsystem, message };
    if (metadata) {
      entry.metadata = metadata;
    }
    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new StructuredLogger(
    options.subsystem ?? 'resctl',
    options.level ?? 'warn',
    options.transports ?? [new StreamTransport(process.stderr, { colors: process.stderr.isTTY ?? false })],
  );
}

export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent', transports: [] });
}
