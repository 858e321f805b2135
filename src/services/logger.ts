/**
 * logger.ts
 * Structured logger for the planning pipeline.
 *
 * ConsoleLogger for the CLI, FileLogger to keep an audit trail of a run,
 * TeeLogger for both, SilentLogger as the default everywhere a logger is
 * optional (tests, library callers that do not care).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export const DEFAULT_LOG_PREFIX = 'compile-planner';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/** `HH:MM:SS.mmm [prefix] [LEVEL] message  {"context":...}` */
export function formatLogLine(
  level: Exclude<LogLevel, 'silent'>,
  prefix: string,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const ts = now.toISOString().slice(11, 23);
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${LEVEL_LABEL[level]}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// Level-filtered base
// ---------------------------------------------------------------------------

abstract class LeveledLogger implements Logger {
  private readonly _minLevel: number;
  protected readonly prefix: string;

  constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this.prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract write(level: Exclude<LogLevel, 'silent'>, line: string): void;

  private _log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this.write(level, formatLogLine(level, this.prefix, message, context));
  }
}

// ---------------------------------------------------------------------------
// ConsoleLogger - errors to stderr, everything else to stdout
// ---------------------------------------------------------------------------

export class ConsoleLogger extends LeveledLogger {
  constructor(level: LogLevel = 'info', prefix = DEFAULT_LOG_PREFIX) {
    super(level, prefix);
  }

  protected write(level: Exclude<LogLevel, 'silent'>, line: string): void {
    if (level === 'error') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ---------------------------------------------------------------------------
// FileLogger - buffers lines until flush()
// ---------------------------------------------------------------------------

export class FileLogger extends LeveledLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_LOG_PREFIX) {
    super(level, prefix);
  }

  /** Lines logged so far. */
  get lines(): readonly string[] {
    return this._lines;
  }

  /** Write accumulated lines to a file, creating parent directories. */
  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected write(_level: Exclude<LogLevel, 'silent'>, line: string): void {
    this._lines.push(line);
  }
}

// ---------------------------------------------------------------------------
// TeeLogger - console and file
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _file: FileLogger;

  constructor(level: LogLevel = 'debug', prefix = DEFAULT_LOG_PREFIX) {
    this._console = new ConsoleLogger(level, prefix);
    this._file = new FileLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._file.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._file.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._file.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._file.error(message, context);
  }

  flush(filePath: string): void {
    this._file.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// SilentLogger - default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
