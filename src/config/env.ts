/**
 * Environment Variable Handler
 *
 * Loads secrets and overrides from the process environment.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even at debug level
 * - Keys are NEVER included in error messages
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { LogLevelSchema } from './schema.js';

// No-op if .env doesn't exist
dotenvConfig();

/**
 * Recognized environment variables. All optional: the vector store key is only
 * needed by a secured Qdrant, the embedding key only by hosted OpenAI-style APIs.
 */
export const EnvSchema = z.object({
  VECTOR_STORE_API_KEY: z.string().min(1).optional(),
  EMBEDDING_API_KEY: z.string().min(1).optional(),
  CORPUS_INGEST_LOG_LEVEL: LogLevelSchema.optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Loaded once at first access; reset with _clearEnvCache() in tests */
let _envCache: EnvVars | null = null;

function readVariable(name: keyof EnvVars): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Load environment variables (called once, then cached).
 * An unrecognized CORPUS_INGEST_LOG_LEVEL is ignored rather than fatal.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    VECTOR_STORE_API_KEY: readVariable('VECTOR_STORE_API_KEY'),
    EMBEDDING_API_KEY: readVariable('EMBEDDING_API_KEY'),
    CORPUS_INGEST_LOG_LEVEL: readVariable('CORPUS_INGEST_LOG_LEVEL')?.toLowerCase(),
  };

  const result = EnvSchema.safeParse(raw);
  if (result.success) {
    _envCache = result.data;
  } else {
    const level = LogLevelSchema.safeParse(raw.CORPUS_INGEST_LOG_LEVEL);
    _envCache = {
      VECTOR_STORE_API_KEY: raw.VECTOR_STORE_API_KEY,
      EMBEDDING_API_KEY: raw.EMBEDDING_API_KEY,
      CORPUS_INGEST_LOG_LEVEL: level.success ? level.data : undefined,
    };
  }

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
