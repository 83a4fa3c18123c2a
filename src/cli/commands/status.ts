/**
 * Status Command
 *
 * Shows what the ledger knows about past runs:
 *   corpus-ingest status          Recent runs and unresolved abandoned batches
 *   corpus-ingest status --probe  Also check that every endpoint answers
 *   corpus-ingest status --json   Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { z } from 'zod';
import type { CommandContext } from '../types.js';
import { formatDuration } from '../utils/progress.js';
import {
  loadConfig,
  resolveConfigPath,
  getLedgerPath,
  validateStartupConfig,
  formatStartupValidation,
  type Config,
  type StartupValidationResult,
} from '../../config/index.js';
import { RunLedger, type AbandonedBatch, type Run } from '../../database/index.js';
import { SqliteSearchIndex, SqliteVectorStore, createIngestComponents } from '../../ingest/index.js';
import { formatTable } from '../../utils/table.js';

interface StatusCommandOptions {
  probe?: boolean;
  limit: string;
}

/**
 * Row counts of the local SQLite backends (undefined for HTTP backends, or
 * when the file does not exist yet).
 */
export interface LocalCounts {
  vectors?: number;
  documents?: number;
  stagedDocuments?: number;
}

/**
 * Format a path with ~ for home directory
 */
function formatPath(filePath: string): string {
  const homeDir = process.env['HOME'] ?? process.env['USERPROFILE'] ?? '';
  if (homeDir && filePath.startsWith(homeDir)) {
    return '~' + filePath.slice(homeDir.length);
  }
  return filePath;
}

function localCounts(config: Config): LocalCounts {
  const counts: LocalCounts = {};
  const { vector_store, search_index } = config.insert;

  if (vector_store.backend === 'sqlite' && existsSync(vector_store.path)) {
    const store = SqliteVectorStore.open(vector_store);
    try {
      counts.vectors = store.count();
    } finally {
      store.close();
    }
  }
  if (search_index.backend === 'sqlite' && existsSync(search_index.path)) {
    const index = SqliteSearchIndex.open(search_index);
    try {
      counts.documents = index.count();
      counts.stagedDocuments = index.stagedCount();
    } finally {
      index.close();
    }
  }
  return counts;
}

/**
 * Duration of a finished run, from its ISO timestamps.
 */
export function runDuration(run: Run): string {
  if (!run.finished_at) return '';
  return formatDuration(Date.parse(run.finished_at) - Date.parse(run.started_at));
}

function colorStatus(status: Run['status']): string {
  switch (status) {
    case 'completed':
      return chalk.green(status);
    case 'running':
      return chalk.cyan(status);
    case 'stopped':
      return chalk.yellow(status);
    case 'failed':
      return chalk.red(status);
  }
}

const StoredTotalsSchema = z.object({
  files: z.number().default(0),
  filesCompleted: z.number().default(0),
  committedVectors: z.number().default(0),
  committedDocuments: z.number().default(0),
  chunksAbandoned: z.number().default(0),
});

/**
 * Files and chunks of a finished run, from its stored totals.
 */
export function runTotalsSummary(run: Run): { files: string; chunks: string } {
  if (!run.totals) return { files: '', chunks: '' };

  let raw: unknown;
  try {
    raw = JSON.parse(run.totals);
  } catch {
    raw = null;
  }
  const parsed = StoredTotalsSchema.safeParse(raw);
  if (!parsed.success) return { files: '', chunks: '' };

  const totals = parsed.data;
  return {
    files: `${totals.filesCompleted}/${totals.files}`,
    chunks: `${totals.committedVectors}v ${totals.committedDocuments}d ${totals.chunksAbandoned}✗`,
  };
}

function renderRuns(runs: readonly Run[]): string {
  return formatTable(runs, [
    { header: 'Run', value: (run) => run.id.slice(0, 8) },
    { header: 'Started', value: (run) => run.started_at.replace('T', ' ').slice(0, 19) },
    { header: 'Status', value: (run) => colorStatus(run.status) },
    { header: 'Files', value: (run) => runTotalsSummary(run).files, align: 'right' },
    { header: 'Chunks', value: (run) => runTotalsSummary(run).chunks, align: 'right' },
    { header: 'Took', value: runDuration, align: 'right' },
  ]);
}

function renderAbandoned(batches: readonly AbandonedBatch[]): string {
  return formatTable(batches, [
    { header: 'File', value: (batch) => batch.file, maxWidth: 40 },
    { header: 'Batch', value: (batch) => batch.batch_ordinal, align: 'right' },
    { header: 'Chunks', value: (batch) => batch.chunk_ids.length, align: 'right' },
    { header: 'Vectors', value: (batch) => batch.vectors_error ?? batch.vectors_status, maxWidth: 30 },
    { header: 'Documents', value: (batch) => batch.documents_error ?? batch.documents_status, maxWidth: 30 },
  ]);
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show recent runs, abandoned batches and backend health')
    .option('--probe', 'Check that every configured endpoint answers', false)
    .option('-n, --limit <n>', 'Number of runs to show', '10')
    .action(async (cmdOptions: StatusCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig({ path: ctx.options.config });
      const limit = Math.max(1, Number.parseInt(cmdOptions.limit, 10) || 10);
      const ledgerPath = getLedgerPath(config.paths.state_dir);

      ctx.debug(`Ledger: ${ledgerPath}`);
      const ledger = RunLedger.open(ledgerPath);
      let runs: Run[];
      let abandoned: AbandonedBatch[];
      let unresolved: number;
      try {
        runs = ledger.recentRuns(limit);
        abandoned = ledger.unresolvedBatches(50);
        unresolved = ledger.countUnresolved();
      } finally {
        ledger.close();
      }

      const counts = localCounts(config);

      let health: StartupValidationResult | undefined;
      if (cmdOptions.probe) {
        const components = createIngestComponents(config.insert, { logger: ctx.createLogger(config.logging.level) });
        try {
          health = await validateStartupConfig(config, components.probes);
        } finally {
          components.close();
        }
      }

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              runs,
              unresolvedBatches: unresolved,
              abandoned,
              counts,
              health,
              ledger: ledgerPath,
              config: resolveConfigPath(ctx.options.config),
            },
            null,
            2
          )
        );
        return;
      }

      const lines: string[] = [];
      lines.push(chalk.bold('corpus-ingest status'));
      lines.push(chalk.dim('─'.repeat(35)));
      lines.push(`${chalk.cyan('Embeddings:')}   ${config.insert.embeddings.model} (${config.insert.embeddings.provider})`);
      lines.push(`${chalk.cyan('Vectors:')}      ${config.insert.vector_store.collection} (${config.insert.vector_store.backend})${counts.vectors !== undefined ? ` ${counts.vectors.toLocaleString()} points` : ''}`);
      lines.push(`${chalk.cyan('Documents:')}    ${config.insert.search_index.index_id} (${config.insert.search_index.backend})${counts.documents !== undefined ? ` ${counts.documents.toLocaleString()} documents` : ''}${counts.stagedDocuments ? chalk.yellow(` ${counts.stagedDocuments} staged`) : ''}`);
      lines.push(`${chalk.cyan('Ledger:')}       ${formatPath(ledgerPath)}`);
      lines.push(`${chalk.cyan('Config:')}       ${formatPath(resolveConfigPath(ctx.options.config))}`);

      if (health) {
        lines.push('');
        if (health.valid) {
          lines.push(chalk.green('✓ All endpoints reachable'));
        }
        lines.push(...formatStartupValidation(health, true));
      }

      lines.push('');
      if (runs.length === 0) {
        lines.push(chalk.yellow('No runs recorded.'));
        lines.push(`Run ${chalk.cyan('corpus-ingest insert')} to get started.`);
      } else {
        lines.push(chalk.bold('Recent runs'));
        lines.push(renderRuns(runs));
      }

      if (unresolved > 0) {
        lines.push('');
        lines.push(chalk.bold(`Abandoned batches (${unresolved} unresolved)`));
        lines.push(renderAbandoned(abandoned));
        lines.push(`Run ${chalk.cyan('corpus-ingest insert --only-failed')} to retry them.`);
      }

      ctx.log(lines.join('\n'));
    });
}
