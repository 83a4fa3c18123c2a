/**
 * Logger Interface for Library Code
 *
 * Library code (pipeline, embedding client, sinks) accepts a Logger via
 * dependency injection. The CLI passes a chalk-colored console logger,
 * tests pass `silentLogger` or a recording mock.
 *
 * Every call takes an optional flat context object that is rendered as
 * `key=value` pairs. Two keys get special treatment by the console logger:
 * - `file`: rendered as a colored tag, one stable color per input file,
 *   so interleaved output from parallel files stays readable
 * - `op`:   rendered as a tag naming the operation (embed, vectors, documents)
 */

import { createHash } from 'node:crypto';
import chalk from 'chalk';

/** Severity levels, lowest first */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured fields attached to a log line */
export type LogContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Generic logger interface for library code
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.green('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

/** 256-color palette entries that read well on dark and light terminals */
const TAG_COLORS = [33, 39, 45, 69, 75, 105, 135, 141, 166, 172, 178, 208, 214, 170, 36, 71];

const OP_COLORS: Record<string, number> = {
  embed: 208,
  vectors: 141,
  documents: 45,
};

/**
 * Pick a stable palette color for a key (same key, same color, every run).
 */
export function colorForKey(key: string): number {
  const digest = createHash('sha1').update(key).digest();
  return TAG_COLORS[digest.readUInt8(0) % TAG_COLORS.length] ?? TAG_COLORS[0] ?? 33;
}

/**
 * Render context fields as ` key=value` pairs (strings JSON-quoted when they
 * contain spaces).
 */
export function formatContext(context: LogContext): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    const rendered =
      typeof value === 'string' && /\s/.test(value) ? JSON.stringify(value) : String(value);
    parts.push(`${key}=${rendered}`);
  }
  return parts.length > 0 ? ' ' + parts.join(' ') : '';
}

/**
 * Options for the console logger
 */
export interface ConsoleLoggerOptions {
  /** Minimum level to print */
  level: LogLevel;
  /** Where lines go (default: process.stderr) */
  write?: (line: string) => void;
  /** Clock for timestamps (default: Date.now) */
  now?: () => number;
}

/**
 * Create the CLI logger: `timestamp LEVEL [file] [op] message key=value...`
 */
export function createConsoleLogger(options: ConsoleLoggerOptions): Logger {
  const threshold = LEVEL_ORDER[options.level];
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const now = options.now ?? Date.now;

  const emit = (level: LogLevel, message: string, context: LogContext = {}): void => {
    if (LEVEL_ORDER[level] < threshold) return;

    const { file, op, ...rest } = context;
    let tags = '';
    if (typeof file === 'string') {
      tags += chalk.ansi256(colorForKey(file))(`[${file}]`) + ' ';
    }
    if (typeof op === 'string') {
      tags += chalk.ansi256(OP_COLORS[op] ?? 250)(`[${op}]`) + ' ';
    }

    const timestamp = chalk.dim(new Date(now()).toISOString());
    write(`${timestamp} ${LEVEL_LABELS[level]} ${tags}${message}${chalk.dim(formatContext(rest))}`);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

/**
 * Wrap a logger so every call carries extra context fields.
 *
 * @example
 * ```ts
 * const fileLog = withContext(logger, { file: 'books/dune.jsonl' });
 * fileLog.warn('skipping malformed record', { line: 12 });
 * ```
 */
export function withContext(logger: Logger, bound: LogContext): Logger {
  return {
    debug: (message, context) => logger.debug(message, { ...bound, ...context }),
    info: (message, context) => logger.info(message, { ...bound, ...context }),
    warn: (message, context) => logger.warn(message, { ...bound, ...context }),
    error: (message, context) => logger.error(message, { ...bound, ...context }),
  };
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
