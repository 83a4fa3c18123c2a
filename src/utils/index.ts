/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Table formatting for CLI output
export { formatTable, stripAnsi, type Column, type Alignment, type Cell } from './table.js';

// Structured logging
export {
  createConsoleLogger,
  withContext,
  silentLogger,
  colorForKey,
  formatContext,
  type Logger,
  type LogLevel,
  type LogContext,
  type ConsoleLoggerOptions,
} from './logger.js';
