// Logger implementation backed by LogTape.
// Records go to stderr so the summary (and --json output) on stdout stays clean.

import {
  configureSync,
  getLogger,
  type LogLevel as LogTapeLevel,
  type LogRecord,
  type Logger as LogTapeLogger,
  type Sink,
} from '@logtape/logtape';
import chalk from 'chalk';
import type { LogLevel } from './types.js';

export interface Logger {
  info(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  debug(message: string, metadata?: Record<string, unknown>): void;
  success(message: string, metadata?: Record<string, unknown>): void;
}

export const LOGGER_CATEGORY = ['dotnet-test-visualizer'] as const;

const LOGTAPE_LEVELS: Record<LogLevel, LogTapeLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warning',
  error: 'error',
};

const LEVEL_COLORS: Partial<Record<LogTapeLevel, (text: string) => string>> = {
  debug: chalk.gray,
  warning: chalk.yellow,
  error: chalk.red,
  fatal: chalk.red,
};

/**
 * Plain text rendering of a record: `[HH:MM:SS] LEVEL message {properties}`.
 */
export function formatLogRecord(record: LogRecord): string {
  const time = new Date(record.timestamp).toLocaleTimeString('en-US', { hour12: false });
  const level = (record.level === 'warning' ? 'warn' : record.level).toUpperCase().padEnd(5);
  const message = record.message
    .map((part) => (typeof part === 'string' ? part : JSON.stringify(part)))
    .join('');
  const properties =
    Object.keys(record.properties).length > 0 ? ` ${JSON.stringify(record.properties)}` : '';
  return `[${time}] ${level} ${message}${properties}`;
}

const stderrSink: Sink = (record) => {
  const line = formatLogRecord(record);
  const color = LEVEL_COLORS[record.level];
  process.stderr.write(`${color ? color(line) : line}\n`);
};

class VisualizerLogger implements Logger {
  constructor(private readonly logger: LogTapeLogger) {}

  private scoped(metadata?: Record<string, unknown>): LogTapeLogger {
    return metadata ? this.logger.with(metadata) : this.logger;
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.scoped(metadata).info`${message}`;
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.scoped(metadata).error`${message}`;
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.scoped(metadata).warn`${message}`;
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.scoped(metadata).debug`${message}`;
  }

  success(message: string, metadata?: Record<string, unknown>): void {
    this.scoped(metadata).info`✓ ${message}`;
  }
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Where records end up; defaults to stderr. */
  sink?: Sink;
}

/**
 * Configure LogTape and return the application logger.
 * Reconfigures on every call, so the latest options win.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';

  configureSync({
    sinks: { output: options.sink ?? stderrSink },
    loggers: [
      { category: [...LOGGER_CATEGORY], lowestLevel: LOGTAPE_LEVELS[level], sinks: ['output'] },
      // LogTape reports its own problems through the meta logger
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['output'] },
    ],
    reset: true,
  });

  return new VisualizerLogger(getLogger([...LOGGER_CATEGORY]));
}

// Logger wrapper that prefixes every message with the result file it's about
export class SourceLogger implements Logger {
  constructor(
    private readonly logger: Logger,
    private readonly source: string
  ) {}

  private formatMessage(message: string): string {
    return `[${this.source}] ${message}`;
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logger.info(this.formatMessage(message), metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.logger.error(this.formatMessage(message), metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(this.formatMessage(message), metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logger.debug(this.formatMessage(message), metadata);
  }

  success(message: string, metadata?: Record<string, unknown>): void {
    this.logger.success(this.formatMessage(message), metadata);
  }
}

export function createSourceLogger(baseLogger: Logger, source: string): Logger {
  return new SourceLogger(baseLogger, source);
}
