/**
 * Error handler for CLI error formatting and display
 *
 * - Colored error output for the terminal
 * - JSON output for scripted runs (--json)
 * - Stack traces in verbose mode
 */

import chalk from 'chalk';
import { CLIError, TransientIOError, SinkRejectedError, ValidationError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  type: string;
  code: number;
  hint?: string;
  status?: number;
  issues?: string[];
  stack?: string;
}

/**
 * Build the JSON shape for an error.
 */
function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (error instanceof CLIError) {
    const output: ErrorOutput = {
      error: error.message,
      type: error.name,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
    if (error instanceof TransientIOError || error instanceof SinkRejectedError) {
      output.status = error.status;
    }
    if (error instanceof ValidationError && error.issues.length > 0) {
      output.issues = error.issues;
    }
    return output;
  }

  if (error instanceof Error) {
    return {
      error: error.message,
      type: error.name,
      code: 1,
      stack: verbose ? error.stack : undefined,
    };
  }

  return { error: String(error), type: 'Unknown', code: 1 };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without
 * process.exit.
 */
export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;

  if (json) {
    return JSON.stringify(toErrorOutput(error, verbose), null, 2);
  }

  if (!(error instanceof Error)) {
    return chalk.red('Error: ') + String(error);
  }

  const lines: string[] = [];
  lines.push(chalk.red('Error: ') + error.message);

  if (error instanceof CLIError) {
    if (error.hint) {
      lines.push(chalk.dim('Hint: ') + error.hint);
    }
  } else if (!verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (verbose && error.stack) {
    lines.push('');
    lines.push(chalk.dim('Stack trace:'));
    lines.push(chalk.dim(error.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Format an error, print it to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler suitable for `uncaughtException` / `unhandledRejection`.
 *
 * @example
 * ```ts
 * const handler = createGlobalErrorHandler({ verbose: true });
 * process.on('uncaughtException', handler);
 * process.on('unhandledRejection', handler);
 * ```
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
