/**
 * Logger - Lightweight logging for opbind
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context support for structured logging
 * - Console and file output (or both via MultiLogger)
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Spliced members', { job: 'symbol-api', count: 150 });
 *
 *   const logger = createLogger('info', { logFile: 'build/opbind.log' });
 */

import { createWriteStream, existsSync, writeFileSync, mkdirSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

type Method = keyof Logger;

/**
 * Log level priorities (higher = more verbose)
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

/**
 * Minimum level required for each method, and the tag it prints
 */
const METHODS: Record<Method, { priority: number; tag: string }> = {
  error: { priority: LOG_LEVEL_PRIORITY.errors, tag: 'ERROR' },
  warn: { priority: LOG_LEVEL_PRIORITY.warnings, tag: 'WARN' },
  info: { priority: LOG_LEVEL_PRIORITY.info, tag: 'INFO' },
  debug: { priority: LOG_LEVEL_PRIORITY.debug, tag: 'DEBUG' },
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

/**
 * JSON stringify that tolerates circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  return `${message} ${safeStringify(context)}`;
}

/**
 * Shared level filtering. Subclasses only decide where a line goes.
 */
abstract class LevelLogger implements Logger {
  private readonly priority: number;

  constructor(level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: Method, tag: string, message: string, context?: Record<string, unknown>): void;

  private emit(method: Method, message: string, context?: Record<string, unknown>): void {
    const { priority, tag } = METHODS[method];
    if (this.priority < priority) return;
    this.write(method, tag, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }
}

/**
 * Console-based Logger. Errors and warnings go to stderr.
 */
export class ConsoleLogger extends LevelLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(method: Method, tag: string, message: string, context?: Record<string, unknown>): void {
    console[method](formatMessage(`[${tag}] ${message}`, context));
  }
}

/**
 * File-based Logger
 *
 * Lines carry an ISO timestamp. The file is truncated on construction and
 * parent directories are created. A stream failure does not interrupt the
 * run; it is reported by close().
 */
export class FileLogger extends LevelLogger {
  private readonly stream: WriteStream;
  private failure: Error | null = null;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    if (existsSync(resolvedPath) && statSync(resolvedPath).isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (error) => {
      this.failure ??= error;
    });
  }

  protected write(_method: Method, tag: string, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`${new Date().toISOString()} [${tag}] ${message}`, context);
    this.stream.write(line + '\n');
  }

  /** Flush and close the stream. Rejects with the first stream error. */
  close(): Promise<void> {
    return new Promise((done, fail) => {
      const settle = (error?: Error | null) => {
        const failure = this.failure ?? error;
        if (failure) fail(failure);
        else done();
      };
      if (this.stream.destroyed) {
        settle();
        return;
      }
      this.stream.end(settle);
    });
  }
}

/**
 * Delegates to several loggers; each applies its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger for the given console level.
 *
 * With a logFile, console output is mirrored to the file, which always
 * records at 'debug'.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}

/**
 * Close a logger returned by createLogger, flushing any file output.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
