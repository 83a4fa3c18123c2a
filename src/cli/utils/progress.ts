/**
 * Progress Reporter
 *
 * Shows the progress of an insert run. Three output modes:
 * - Interactive: one ora spinner summarizing files and committed chunks
 * - JSON: NDJSON event stream (one event per line on stdout)
 * - Text: plain lines for non-TTY environments
 *
 * Spinner updates are throttled (100ms minimum) to prevent flickering.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { BatchOutcome, FileReport, InsertRunResult } from '../../ingest/index.js';

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show per-file lines and abandoned chunk ids */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;

  /** Line sink (default: console.log) */
  write?: (line: string) => void;

  /** Clock for event timestamps (default: Date.now) */
  now?: () => number;
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType =
  | 'run_start'
  | 'file_start'
  | 'batch_complete'
  | 'batch_abandoned'
  | 'file_complete'
  | 'stopping'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  file?: string;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter follows one insert run through the pipeline callbacks.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: ctx.options.json });
 * reporter.start(files.length);
 * await runInsertPipeline({
 *   ...,
 *   onFileStart: (file) => reporter.fileStarted(file.file),
 *   onBatchComplete: (outcome) => reporter.batchCompleted(outcome),
 *   onFileComplete: (report) => reporter.fileCompleted(report),
 * });
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private readonly options: ProgressReporterOptions;
  private readonly write: (line: string) => void;
  private readonly now: () => number;
  private spinner: Ora | null = null;
  private totalFiles = 0;
  private filesDone = 0;
  private chunksCommitted = 0;
  private batchesAbandoned = 0;
  private readonly active = new Set<string>();
  private lastUpdateTime = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file path display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;
    this.write = options.write ?? ((line) => console.log(line));
    this.now = options.now ?? Date.now;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  start(totalFiles: number): void {
    this.totalFiles = totalFiles;

    if (this.options.json) {
      this.emitJson({ type: 'run_start', data: { files: totalFiles } });
      return;
    }

    if (this.options.isInteractive) {
      this.spinner = ora({ text: this.statusText(), prefixText: chalk.cyan('Inserting'.padEnd(12)) }).start();
    } else {
      this.write(`Inserting ${totalFiles} file${totalFiles === 1 ? '' : 's'}...`);
    }
  }

  fileStarted(file: string): void {
    this.active.add(file);
    if (this.options.json) {
      this.emitJson({ type: 'file_start', file, data: {} });
      return;
    }
    this.refresh(true);
  }

  batchCompleted(outcome: BatchOutcome): void {
    const count = outcome.chunkIds.length;
    if (outcome.vectors.status === 'committed' && outcome.documents.status === 'committed') {
      this.chunksCommitted += count;
    }

    if (this.options.json) {
      this.emitJson({
        type: 'batch_complete',
        file: outcome.file,
        data: {
          batch: outcome.ordinal,
          chunks: count,
          vectors: outcome.vectors.status,
          vectorAttempts: outcome.vectors.attempts,
          documents: outcome.documents.status,
          documentAttempts: outcome.documents.attempts,
        },
      });
      return;
    }
    this.refresh(false);
  }

  batchAbandoned(outcome: BatchOutcome): void {
    this.batchesAbandoned++;

    if (this.options.json) {
      this.emitJson({
        type: 'batch_abandoned',
        file: outcome.file,
        data: {
          batch: outcome.ordinal,
          chunkIds: outcome.chunkIds,
          vectors: describeOutcome(outcome.vectors),
          documents: describeOutcome(outcome.documents),
        },
      });
      return;
    }

    this.print(
      chalk.red(`✗ ${outcome.file} batch ${outcome.ordinal} abandoned`) +
        chalk.dim(` (vectors: ${describeOutcome(outcome.vectors)}, documents: ${describeOutcome(outcome.documents)})`)
    );
  }

  fileCompleted(report: FileReport): void {
    this.active.delete(report.file);
    this.filesDone++;

    if (this.options.json) {
      this.emitJson({
        type: 'file_complete',
        file: report.file,
        data: {
          state: report.state,
          recordsRead: report.recordsRead,
          recordsSkipped: report.recordsSkipped,
          embeddedFromCache: report.embeddedFromCache,
          embeddedComputed: report.embeddedComputed,
          committedVectors: report.committedVectors,
          committedDocuments: report.committedDocuments,
          batchesAbandoned: report.batchesAbandoned,
          durationMs: Math.round(report.durationMs),
        },
      });
      return;
    }

    if (this.options.verbose || report.state === 'abandoned' || !this.options.isInteractive) {
      const mark =
        report.state === 'completed' ? chalk.green('✓') : report.state === 'abandoned' ? chalk.red('✗') : chalk.yellow('…');
      this.print(
        `${mark} ${report.file} ${chalk.dim(`${report.recordsRead} records, ${report.batchesAbandoned} abandoned batches, ${formatDuration(report.durationMs)}`)}`
      );
    }
    this.refresh(true);
  }

  /** First stop signal received: admission halts, running batches drain */
  stopping(): void {
    if (this.options.json) {
      this.emitJson({ type: 'stopping', data: {} });
      return;
    }
    this.print(chalk.yellow('Stopping: no new files or batches will start; waiting for running writes...'));
  }

  /**
   * Display the final summary after the run.
   */
  showSummary(result: InsertRunResult): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', data: { result: serializeResult(result) } });
      return;
    }

    const { totals } = result;
    const failed = totals.filesAbandoned > 0 || result.deferredCommit.status === 'failed';
    if (this.spinner) {
      if (failed) {
        this.spinner.fail(`${totals.filesAbandoned} of ${totals.files} files had abandoned batches`);
      } else {
        this.spinner.succeed(`${totals.filesCompleted} files inserted`);
      }
      this.spinner = null;
    }

    const heading = result.stopped
      ? chalk.yellow.bold('Insert Stopped')
      : failed
        ? chalk.red.bold('Insert Finished With Failures')
        : chalk.green.bold('Insert Complete ✓');

    this.write('');
    this.write(heading);
    this.write('');
    this.write(`  ${chalk.dim('Files:')}              ${totals.filesCompleted} completed, ${totals.filesAbandoned} abandoned, ${totals.files} total`);
    this.write(`  ${chalk.dim('Records read:')}       ${totals.recordsRead.toLocaleString()} (${totals.recordsSkipped} malformed skipped)`);
    this.write(`  ${chalk.dim('Embedded:')}           ${totals.embeddedFromCache.toLocaleString()} from cache, ${totals.embeddedComputed.toLocaleString()} computed`);
    this.write(`  ${chalk.dim('Committed:')}          ${totals.committedVectors.toLocaleString()} vectors, ${totals.committedDocuments.toLocaleString()} documents`);
    this.write(`  ${chalk.dim('Abandoned:')}          ${totals.batchesAbandoned} batches, ${totals.chunksAbandoned} chunks`);
    if (result.deferredCommit.status !== 'not-needed') {
      const commit =
        result.deferredCommit.status === 'committed' ? chalk.green('committed') : chalk.red(`failed: ${result.deferredCommit.error}`);
      this.write(`  ${chalk.dim('Search commit:')}      ${commit}`);
    }
    this.write(`  ${chalk.dim('Time elapsed:')}       ${formatDuration(result.durationMs)}`);

    if (this.options.verbose) {
      const abandoned = result.files.filter((file) => file.abandonedChunkIds.length > 0);
      for (const file of abandoned) {
        this.write('');
        this.write(chalk.dim(`  ${file.file}:`));
        for (const id of file.abandonedChunkIds.slice(0, 10)) {
          this.write(chalk.dim(`    - ${id}`));
        }
        if (file.abandonedChunkIds.length > 10) {
          this.write(chalk.dim(`    ... and ${file.abandonedChunkIds.length - 10} more`));
        }
      }
    }

    if (totals.batchesAbandoned > 0) {
      this.write('');
      this.write(`Re-run ${chalk.cyan('corpus-ingest insert --only-failed')} to retry the abandoned batches.`);
    }
    this.write('');
  }

  /** Drop the spinner without a summary (the run threw) */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
  }

  private statusText(): string {
    const current = [...this.active].map((file) => this.truncatePath(file));
    const files = `${this.filesDone}/${this.totalFiles} files`;
    const chunks = `${this.chunksCommitted.toLocaleString()} chunks`;
    const abandoned = this.batchesAbandoned > 0 ? chalk.red(` ${this.batchesAbandoned} abandoned`) : '';
    const running = current.length > 0 ? chalk.dim(` ${current.join(', ')}`) : '';
    return `${files.padEnd(16)} ${chunks}${abandoned}${running}`;
  }

  private refresh(force: boolean): void {
    if (!this.spinner) return;

    const now = performance.now();
    if (!force && now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;
    this.spinner.text = this.statusText();
  }

  /** Print a line without tearing the spinner */
  private print(line: string): void {
    if (this.spinner) {
      this.spinner.clear();
      this.write(line);
      this.spinner.render();
    } else {
      this.write(line);
    }
  }

  private emitJson(event: Omit<ProgressEvent, 'timestamp'>): void {
    const full: ProgressEvent = { ...event, timestamp: new Date(this.now()).toISOString() };
    this.write(JSON.stringify(full));
  }

  /**
   * Truncate a file path to fit display width.
   */
  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }
}

function describeOutcome(outcome: BatchOutcome['vectors']): string {
  const attempts = `${outcome.attempts} attempt${outcome.attempts === 1 ? '' : 's'}`;
  return outcome.status === 'committed' ? `committed after ${attempts}` : `${outcome.cause.message} after ${attempts}`;
}

/**
 * Plain-JSON form of a run result (Error causes become messages).
 */
export function serializeResult(result: InsertRunResult): Record<string, unknown> {
  return {
    totals: result.totals,
    deferredCommit: result.deferredCommit,
    stopped: result.stopped,
    durationMs: Math.round(result.durationMs),
    files: result.files.map((file) => ({ ...file, durationMs: Math.round(file.durationMs) })),
  };
}

/**
 * Format milliseconds as human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(options: Partial<ProgressReporterOptions> = {}): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
    write: options.write,
    now: options.now,
  });
}
