/**
 * Minutes Insights - Configuration Module
 *
 * Barrel export file for configuration management
 */

export {
  ServerConfigSchema,
  PostgresConfigSchema,
  StoreConfigSchema,
  LlmConfigSchema,
  AgentsConfigSchema,
  QueryConfigSchema,
  LoggingConfigSchema,
  ConfigFileSchema,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type { ConfigFileInput, ConfigFileOutput } from './schema.js';

export { ConfigLoader, loadConfig, getConfigLoader, getChangedFields } from './loader.js';

export type { ConfigChangeCallback } from './loader.js';
