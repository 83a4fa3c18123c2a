/**
 * Startup Configuration Validation
 *
 * Runs once before an insert run writes anything:
 * 1. Static checks on the merged config (warnings only)
 * 2. One probe per configured endpoint (embedding provider, vector store,
 *    search index)
 *
 * An unreachable endpoint is fatal: `assertStartupConfig` throws a
 * ConfigError naming every endpoint that failed, so a run never starts
 * against a backend that is down.
 */

import chalk from 'chalk';
import type { Config } from './schema.js';
import { getEnv } from './env.js';
import { ConfigError, toError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One endpoint to check before the run.
 */
export interface EndpointProbe {
  /** Display name (e.g. "ollama", "qdrant") */
  name: string;
  /** Base URL, or file path for local backends */
  target: string;
  probe: () => Promise<void>;
}

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** True when every probe answered */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** One line per unreachable endpoint */
  errors: string[];
  /** Setup instructions matching `errors` */
  hints: string[];
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Config checks that need no network.
 */
export function checkStaticConfig(config: Config): string[] {
  const warnings: string[] = [];
  const { embeddings, vector_store, search_index } = config.insert;

  if (embeddings.provider === 'openai' && !getEnv('EMBEDDING_API_KEY')) {
    warnings.push('Embedding provider "openai" configured without EMBEDDING_API_KEY; requests are sent unauthenticated');
  }
  if (
    vector_store.backend === 'qdrant' &&
    vector_store.url.startsWith('https:') &&
    !vector_store.api_key
  ) {
    warnings.push('Qdrant over https without an api key (set VECTOR_STORE_API_KEY)');
  }
  if (search_index.backend === 'sqlite' && search_index.commit_mode === 'deferred') {
    warnings.push('Deferred commit on the sqlite search index keeps documents in staging until the run ends');
  }
  if (embeddings.global_max_concurrency < embeddings.max_concurrency) {
    warnings.push(
      `insert.embeddings.global_max_concurrency (${embeddings.global_max_concurrency}) is below max_concurrency (${embeddings.max_concurrency}); the global cap wins`
    );
  }

  return warnings;
}

/**
 * Probe every endpoint concurrently and collect the results.
 */
export async function validateStartupConfig(
  config: Config,
  probes: readonly EndpointProbe[],
  logger: Logger = silentLogger
): Promise<StartupValidationResult> {
  const warnings = checkStaticConfig(config);
  const errors: string[] = [];
  const hints: string[] = [];

  const results = await Promise.allSettled(probes.map((endpoint) => endpoint.probe()));
  results.forEach((result, i) => {
    const endpoint = probes[i];
    if (!endpoint) return;

    if (result.status === 'fulfilled') {
      logger.debug('endpoint reachable', { endpoint: endpoint.name, target: endpoint.target });
      return;
    }

    const cause = toError(result.reason);
    logger.error('endpoint unreachable', {
      endpoint: endpoint.name,
      target: endpoint.target,
      error: cause.message,
    });
    errors.push(`${endpoint.name} (${endpoint.target}): ${cause.message}`);
    hints.push(`Check that ${endpoint.name} is running at ${endpoint.target}`);
  });

  return { valid: errors.length === 0, warnings, errors, hints };
}

/**
 * Validate and throw when any endpoint is unreachable.
 *
 * @throws ConfigError listing every unreachable endpoint
 */
export async function assertStartupConfig(
  config: Config,
  probes: readonly EndpointProbe[],
  logger: Logger = silentLogger
): Promise<StartupValidationResult> {
  const result = await validateStartupConfig(config, probes, logger);
  for (const warning of result.warnings) {
    logger.warn(warning);
  }

  if (!result.valid) {
    throw new ConfigError(
      `Unreachable endpoint${result.errors.length > 1 ? 's' : ''}:\n${result.errors.map((e) => `  - ${e}`).join('\n')}`,
      result.hints.join('; ')
    );
  }
  return result;
}

/**
 * Print validation output for the terminal.
 */
export function formatStartupValidation(result: StartupValidationResult, verbose = false): string[] {
  const lines: string[] = [];
  for (const error of result.errors) {
    lines.push(chalk.red(`✗ ${error}`));
  }
  for (const hint of result.hints) {
    lines.push(chalk.dim(`  ${hint}`));
  }
  if (verbose) {
    for (const warning of result.warnings) {
      lines.push(chalk.yellow(`⚠ ${warning}`));
    }
  }
  return lines;
}
