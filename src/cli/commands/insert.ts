/**
 * Insert Command
 *
 * Embeds pre-chunked records and writes them to the vector store and the
 * search index.
 *
 * Usage:
 *   corpus-ingest insert                     Every *.jsonl under paths.chunk_root
 *   corpus-ingest insert books/ extra.jsonl  Specific directories or files
 *   corpus-ingest insert --only-failed       Files with unresolved abandoned batches
 *   corpus-ingest insert --json              Progress as NDJSON
 *
 * The run:
 * 1. Discover chunk files
 * 2. Probe every endpoint (an unreachable one aborts before any write)
 * 3. Drive the pipeline, recording files and abandoned batches in the ledger
 * 4. Print the summary; exit 1 when anything was abandoned
 *
 * SIGINT/SIGTERM stop admission of new files and batches; running writes
 * drain and the summary is still printed. A second signal exits at once.
 */

import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { loadConfig, getEnv, getLedgerPath, assertStartupConfig } from '../../config/index.js';
import type { LogLevel } from '../../utils/logger.js';
import { RunLedger } from '../../database/index.js';
import {
  createIngestComponents,
  discoverChunkFiles,
  runInsertPipeline,
  type ChunkFile,
  type InsertRunResult,
} from '../../ingest/index.js';
import { CLIError, toError } from '../../errors/index.js';

/**
 * Command-specific options.
 */
interface InsertCommandOptions {
  onlyFailed?: boolean;
}

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Exit code of a finished run: 0 when every batch of every admitted file
 * committed to both sinks, 1 otherwise.
 */
export function runExitCode(result: InsertRunResult): number {
  return result.totals.filesAbandoned > 0 || result.deferredCommit.status === 'failed' ? 1 : 0;
}

/**
 * Keep log lines from tearing the spinner: below warn only with --verbose.
 */
function effectiveLogLevel(level: LogLevel, interactive: boolean, verbose: boolean): LogLevel {
  if (!interactive || verbose) return level;
  return level === 'error' ? 'error' : 'warn';
}

/**
 * Create the insert command.
 */
export function createInsertCommand(getContext: () => CommandContext): Command {
  return new Command('insert')
    .argument('[paths...]', 'Chunk files or directories (default: paths.chunk_root)')
    .description('Embed chunk records and write them to the vector store and search index')
    .option('--only-failed', 'Only files that still have abandoned batches in the ledger', false)
    .action(async (paths: string[], cmdOptions: InsertCommandOptions) => {
      const ctx = getContext();
      const config = loadConfig({ path: ctx.options.config });
      const interactive = !ctx.options.json && (process.stdout.isTTY ?? false);
      const logger = ctx.createLogger(effectiveLogLevel(config.logging.level, interactive, ctx.options.verbose));

      const ledger = RunLedger.open(getLedgerPath(config.paths.state_dir));
      try {
        // Resolve input files
        let inputs: string[];
        if (cmdOptions.onlyFailed) {
          inputs = ledger.unresolvedFiles();
          if (inputs.length === 0) {
            ctx.log('No abandoned batches to retry.');
            return;
          }
          ctx.debug(`Retrying ${inputs.length} file(s) with abandoned batches`);
        } else {
          inputs = paths.length > 0 ? paths : [config.paths.chunk_root];
        }

        const files: ChunkFile[] = await discoverChunkFiles(inputs, config.paths.chunk_root);
        if (files.length === 0) {
          throw new CLIError(
            `No chunk files found in: ${inputs.join(', ')}`,
            'Chunk files are *.jsonl; check the path or paths.chunk_root'
          );
        }
        ctx.debug(`Found ${files.length} chunk file(s)`);

        const reporter = createProgressReporter({
          json: ctx.options.json,
          verbose: ctx.options.verbose,
          isInteractive: interactive,
        });

        const components = createIngestComponents(config.insert, {
          logger,
          embeddingApiKey: getEnv('EMBEDDING_API_KEY'),
        });

        const controller = new AbortController();
        const onSignal = (): void => {
          if (controller.signal.aborted) {
            process.exit(130);
          }
          controller.abort();
          reporter.stopping();
        };

        let runId: string | undefined;
        try {
          ctx.debug('Probing endpoints...');
          await assertStartupConfig(config, components.probes, logger);

          const run = ledger.startRun();
          runId = run.id;
          for (const signal of STOP_SIGNALS) process.on(signal, onSignal);

          reporter.start(files.length);
          const result = await runInsertPipeline({
            files,
            client: components.client,
            writer: components.writer,
            cache: components.cache,
            inFlight: components.inFlight,
            batchSize: config.insert.batch_size,
            maxParallelFiles: config.insert.max_parallel_files,
            maxPendingBatches: config.insert.max_pending_batches,
            maxConcurrencyPerFile: config.insert.embeddings.max_concurrency,
            signal: controller.signal,
            logger,
            onFileStart: (file) => reporter.fileStarted(file.file),
            onBatchComplete: (outcome) => reporter.batchCompleted(outcome),
            onBatchAbandoned: (outcome) => {
              ledger.recordAbandoned(run.id, outcome);
              reporter.batchAbandoned(outcome);
            },
            onFileComplete: (report) => {
              ledger.recordFile(run.id, report);
              reporter.fileCompleted(report);
            },
          });

          ledger.finishRun(run.id, result.stopped ? 'stopped' : 'completed', result.totals);
          const stats = components.client.stats();
          ctx.debug(
            `Embedding requests: ${stats.requests} sent, ${stats.failedRequests} failed, peak in flight ${stats.peakInFlight}`
          );
          const cacheStats = components.cache.stats();
          ctx.debug(`Cache: ${cacheStats.size}/${cacheStats.capacity} entries, ${cacheStats.evictions} evictions`);

          reporter.showSummary(result);
          process.exitCode = runExitCode(result);
        } catch (error) {
          const cause = toError(error);
          if (runId !== undefined) {
            ledger.finishRun(runId, 'failed');
          }
          reporter.fail(cause.message);
          throw cause;
        } finally {
          for (const signal of STOP_SIGNALS) process.off(signal, onSignal);
          components.close();
        }
      } finally {
        ledger.close();
      }
    });
}
