/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `corpus-ingest config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  InsertConfigSchema,
  EmbeddingsConfigSchema,
  VectorStoreConfigSchema,
  SearchIndexConfigSchema,
  MetadataConfigSchema,
  LogLevelSchema,
} from './schema.js';
export type {
  Config,
  PartialConfig,
  InsertConfig,
  EmbeddingsConfig,
  VectorStoreConfig,
  SearchIndexConfig,
  MetadataConfig,
  Distance,
} from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfigPath,
  getConfigValue,
  setConfigValue,
  listConfig,
  parseValue,
  deepMerge,
  type LoadConfigOptions,
} from './loader.js';

// Paths
export { APP_DIR, CONFIG_PATH, STATE_DIR, getDefaultConfigPath, getLedgerPath, expandHome } from './paths.js';

// Environment
export { loadEnv, getEnv, EnvSchema, type EnvVars } from './env.js';

// Startup validation
export {
  checkStaticConfig,
  validateStartupConfig,
  assertStartupConfig,
  formatStartupValidation,
  type EndpointProbe,
  type StartupValidationResult,
} from './startup-validation.js';
