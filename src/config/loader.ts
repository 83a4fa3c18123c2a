/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Resolve the config file (--config, or ~/.corpus-ingest/config.toml)
 * 2. Load and parse the TOML
 * 3. Validate the sparse user file with the deep-partial Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Apply environment overrides and validate the merged result
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getDefaultConfigPath, expandHome } from './paths.js';
import { loadEnv } from './env.js';
import { ConfigError } from '../errors/index.js';

/**
 * Where to load the config from.
 */
export interface LoadConfigOptions {
  /** Explicit config file; a missing explicit file is an error */
  path?: string;
  /** Write the template when the default file is missing (default: true) */
  createIfMissing?: boolean;
  /** Apply VECTOR_STORE_API_KEY / CORPUS_INGEST_LOG_LEVEL (default: true) */
  applyEnv?: boolean;
}

/**
 * Resolve the active config file path.
 */
export function resolveConfigPath(explicitPath?: string): string {
  return explicitPath ? path.resolve(expandHome(explicitPath)) : getDefaultConfigPath();
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects are merged key by key; arrays and primitives are replaced.
 */
export function deepMerge<T extends Record<string, unknown>>(
  target: T,
  source: Record<string, unknown>
): T {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Parse TOML content into a plain object, raising ConfigError on bad syntax.
 */
function parseToml(content: string, configPath: string): Record<string, unknown> {
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: corpus-ingest config reset --force`
    );
  }
}

/**
 * Read the raw (unmerged) user config as a plain object.
 * Returns an empty object when the file does not exist.
 */
function readRawConfig(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  return parseToml(fs.readFileSync(configPath, 'utf-8'), configPath);
}

/**
 * Overlay environment variables on a merged config.
 */
function applyEnvOverrides(config: Config): Config {
  const env = loadEnv();
  let result = config;

  if (env.VECTOR_STORE_API_KEY) {
    result = deepMerge(result, {
      insert: { ...result.insert, vector_store: { ...result.insert.vector_store, api_key: env.VECTOR_STORE_API_KEY } },
    });
  }
  if (env.CORPUS_INGEST_LOG_LEVEL) {
    result = deepMerge(result, { logging: { level: env.CORPUS_INGEST_LOG_LEVEL } });
  }

  return result;
}

/**
 * Load, merge and validate the configuration.
 *
 * @throws ConfigError if the file is unreadable, invalid TOML, or fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { createIfMissing = true, applyEnv = true } = options;
  const configPath = resolveConfigPath(options.path);

  if (!fs.existsSync(configPath)) {
    if (options.path) {
      throw new ConfigError(
        `Config file not found: ${configPath}`,
        'Check the --config path, or omit it to use the default config'
      );
    }
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
  }

  const raw = readRawConfig(configPath);

  // Validate against the partial schema (allows missing fields)
  const partial = PartialConfigSchema.safeParse(raw);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}:\n${formatIssues(partial.error.issues)}`,
      'Run: corpus-ingest config reset --force  to restore defaults'
    );
  }

  const merged = deepMerge(DEFAULT_CONFIG, partial.data);
  const withEnv = applyEnv ? applyEnvOverrides(merged) : merged;

  // The merged result must satisfy the full schema
  const full = ConfigSchema.safeParse(withEnv);
  if (!full.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(full.error.issues)}`);
  }

  return {
    ...full.data,
    paths: {
      chunk_root: expandHome(full.data.paths.chunk_root),
      state_dir: expandHome(full.data.paths.state_dir),
    },
  };
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('insert.embeddings.model') => 'nomic-embed-text'
 */
export function getConfigValue(key: string, configPath?: string): unknown {
  const config = loadConfig({ path: configPath, applyEnv: false });

  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Set a specific config value by dot-notation path and write the file back.
 * The complete merged config is validated before anything is written.
 */
export function setConfigValue(key: string, value: string, configPath?: string): void {
  const filePath = resolveConfigPath(configPath);
  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  const config = readRawConfig(filePath);

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  const validation = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, config));
  if (!validation.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validation.error.issues)}`,
      'Run: corpus-ingest config list  to see current values and types'
    );
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, TOML.stringify(config as TOML.JsonMap), 'utf-8');
}

/**
 * Parse a CLI string into a boolean, number or string.
 */
export function parseValue(value: string): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format, e.g. ['insert.batch_size', 64].
 * Secrets are masked.
 */
export function listConfig(configPath?: string): Array<[string, unknown]> {
  const config = loadConfig({ path: configPath, applyEnv: false });
  const entries: Array<[string, unknown]> = [];

  const flatten = (obj: Record<string, unknown>, prefix: string): void => {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else if (key === 'api_key' && typeof value === 'string' && value.length > 0) {
        entries.push([fullKey, '********']);
      } else {
        entries.push([fullKey, value]);
      }
    }
  };

  flatten(config, '');
  return entries;
}
