/**
 * Console logger for txdl.
 *
 * Writes level-tagged lines (`[INFO]`, `[SUCCESS]`, `[WARNING]`,
 * `[ERROR]`). Errors go to stderr, everything else to stdout. Colors are
 * used only when the target stream is a terminal. When a log file is
 * configured, every line is also appended there with a timestamp.
 *
 * @module utils/logger
 */

import { appendFileSync } from 'fs';
import type { LogLevel } from '../engine/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The slice of a writable stream the logger needs.
 */
export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface LoggerOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  level?: LogLevel;
  logFile?: string;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * ANSI color codes for terminal output
 */
export const ansiColors = {
  reset: '\x1b[0m',
  red: '\x1b[0;31m',
  green: '\x1b[0;32m',
  yellow: '\x1b[1;33m',
  blue: '\x1b[0;34m',
  gray: '\x1b[90m',
} as const;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type Tag = 'DEBUG' | 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR';

const TAG_COLORS: Record<Tag, string> = {
  DEBUG: ansiColors.gray,
  INFO: ansiColors.blue,
  SUCCESS: ansiColors.green,
  WARNING: ansiColors.yellow,
  ERROR: ansiColors.red,
};

// =============================================================================
// Logger
// =============================================================================

/**
 * Formats a timestamp for log file lines (ISO 8601, second precision).
 */
export function formatLogTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class Logger {
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly level: LogLevel;
  private readonly logFile?: string;
  private logFileFailed = false;

  constructor(options: LoggerOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.level = options.level ?? 'info';
    this.logFile = options.logFile;
  }

  debug(message: string): void {
    this.write('debug', 'DEBUG', message);
  }

  info(message: string): void {
    this.write('info', 'INFO', message);
  }

  success(message: string): void {
    this.write('info', 'SUCCESS', message);
  }

  warn(message: string): void {
    this.write('warn', 'WARNING', message);
  }

  error(message: string): void {
    this.write('error', 'ERROR', message);
  }

  /**
   * Write untagged text to stdout (help output, summaries).
   */
  print(text: string): void {
    this.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
  }

  private write(level: LogLevel, tag: Tag, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const stream = level === 'error' ? this.stderr : this.stdout;
    const label = stream.isTTY
      ? `${TAG_COLORS[tag]}[${tag}]${ansiColors.reset}`
      : `[${tag}]`;
    stream.write(`${label} ${message}\n`);

    if (this.logFile && !this.logFileFailed) {
      try {
        appendFileSync(
          this.logFile,
          `[${formatLogTimestamp(new Date())}] [${tag}] ${message}\n`
        );
      } catch (err) {
        // Report once, then keep logging to the console only
        this.logFileFailed = true;
        this.stderr.write(
          `[WARNING] Cannot write log file ${this.logFile}: ${err instanceof Error ? err.message : String(err)}\n`
        );
      }
    }
  }
}
