/**
 * Error type definitions for corpus-ingest
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - A retryable/non-retryable split the pipeline's retry loops rely on
 *
 * Taxonomy used by the insertion pipeline:
 * - TransientIOError: network failure, timeout, 408/429/5xx (retried with backoff)
 * - ValidationError:  dimension mismatch, malformed record (never retried)
 * - ConfigError:      missing/invalid config, unreachable endpoint at startup (fatal)
 */

/**
 * Base class for all CLI errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: process exit code, so scripts can branch on the failure kind
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when an input file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Missing or out-of-range config values
 * - An endpoint that cannot be reached when the run starts
 *
 * Aborts the run before any write happens.
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: corpus-ingest config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown for run-ledger database errors.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      'Try running: corpus-ingest status  to check the ledger',
      5
    );
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when data fails validation: a malformed chunk record, or a vector
 * whose length differs from the configured dimension.
 *
 * Never retried - the affected batch is abandoned immediately.
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown for failures that may succeed on a later attempt: connection resets,
 * timeouts, 408/429/5xx answers, malformed embedding responses.
 *
 * Exit code 7: Transient I/O error (only reached when retries are exhausted)
 */
export class TransientIOError extends CLIError {
  /** HTTP status, when the failure was an HTTP answer */
  public readonly status?: number;

  /** The underlying error (socket error, abort, parse failure) */
  public override readonly cause?: Error;

  constructor(message: string, options: { status?: number; cause?: Error } = {}) {
    super(
      message,
      'The service may be overloaded or restarting; re-run to resume - writes are idempotent',
      7
    );
    this.name = 'TransientIOError';
    this.status = options.status;
    this.cause = options.cause;
  }
}

/**
 * Thrown when a sink answers with a non-retryable 4xx status
 * (bad request, unknown collection, auth failure).
 *
 * Exit code 8: Sink rejected the write
 */
export class SinkRejectedError extends CLIError {
  /** HTTP status returned by the sink */
  public readonly status: number;

  constructor(sink: string, status: number, body: string) {
    super(
      `${sink} rejected the request with status ${status}${body ? `: ${body}` : ''}`,
      'Check the collection/index name, credentials and vector size in your config',
      8
    );
    this.name = 'SinkRejectedError';
    this.status = status;
  }
}

/**
 * Whether an error may succeed on retry.
 *
 * Only TransientIOError is retryable; everything else (validation, config,
 * 4xx rejections, programming errors) is surfaced immediately.
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof TransientIOError;
}

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
