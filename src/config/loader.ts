/**
 * Minutes Insights - Configuration Loader
 * Handles loading, validation, and hot-reloading of configuration
 */

import fs from 'fs';
import path from 'path';

import * as chokidar from 'chokidar';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';

import logger, { logConfig } from '../utils/logger.js';
import { ConfigurationError, type InsightsConfig } from '../utils/types.js';
import {
  LoggingConfigSchema,
  StoreDriverSchema,
  formatValidationErrors,
  safeValidateConfigFile,
  type ConfigFileOutput,
} from './schema.js';

const DEFAULT_CONFIG_PATH = './config/insights.config.yaml';

// =============================================================================
// Environment Variable Helpers
// =============================================================================

function getEnvString(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

function getEnvInt(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvFloat(key: string, defaultValue?: number): number | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(key: string, defaultValue?: boolean): boolean | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvEnum<T extends string>(key: string, schema: z.ZodType<T>): T | undefined {
  const value = process.env[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = schema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    logger.warn('Ignoring invalid environment value', { key, value });
    return undefined;
  }
  return parsed.data;
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export type ConfigChangeCallback = (
  oldConfig: InsightsConfig,
  newConfig: InsightsConfig,
  changedFields: string[]
) => void;

export class ConfigLoader {
  private configPath: string;
  private watcher: chokidar.FSWatcher | null = null;
  private currentConfig: InsightsConfig | null = null;
  private changeCallbacks: ConfigChangeCallback[] = [];

  constructor(configPath?: string) {
    this.configPath =
      configPath ?? getEnvString('CONFIG_FILE_PATH', DEFAULT_CONFIG_PATH) ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables
   */
  public async load(): Promise<InsightsConfig> {
    const rawConfig = await this.readConfigFile();

    const validated = safeValidateConfigFile(rawConfig);
    if (!validated.success) {
      const details = formatValidationErrors(validated.error);
      throw new ConfigurationError(`Invalid configuration file: ${details.join('; ')}`);
    }

    const config = this.buildConfig(validated.data);

    this.currentConfig = config;
    return config;
  }

  /**
   * Read and parse the config file; unreadable files fall back to defaults
   */
  private async readConfigFile(): Promise<unknown> {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    try {
      const fileContent = await fs.promises.readFile(this.configPath, 'utf-8');
      const extension = path.extname(this.configPath).toLowerCase();

      let parsed: unknown;
      if (extension === '.yaml' || extension === '.yml') {
        parsed = parseYaml(fileContent);
      } else if (extension === '.json') {
        parsed = JSON.parse(fileContent);
      } else {
        throw new Error(`Unsupported config file format: ${extension}`);
      }

      logConfig('Configuration file loaded', { path: this.configPath });
      // An empty YAML document parses to null
      return parsed ?? {};
    } catch (error) {
      logger.warn('Failed to load config file, using defaults', {
        path: this.configPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  /**
   * Build configuration with environment variable overrides
   */
  private buildConfig(fileConfig: ConfigFileOutput): InsightsConfig {
    const envNode = getEnvString('NODE_ENV', 'development');
    const nodeEnv = envNode === 'production' || envNode === 'test' ? envNode : 'development';

    return {
      server: {
        port: getEnvInt('PORT') ?? fileConfig.server.port,
        host: getEnvString('HOST') ?? fileConfig.server.host,
        nodeEnv,
      },

      postgres: {
        host: getEnvString('POSTGRES_HOST') ?? fileConfig.postgres.host,
        port: getEnvInt('POSTGRES_PORT') ?? fileConfig.postgres.port,
        database: getEnvString('POSTGRES_DB') ?? fileConfig.postgres.database,
        user: getEnvString('POSTGRES_USER') ?? fileConfig.postgres.user,
        password: getEnvString('POSTGRES_PASSWORD') ?? fileConfig.postgres.password,
        ssl: getEnvBool('POSTGRES_SSL') ?? fileConfig.postgres.ssl,
        poolMax: getEnvInt('POSTGRES_POOL_MAX') ?? fileConfig.postgres.poolMax,
      },

      store: {
        driver: getEnvEnum('STORE_DRIVER', StoreDriverSchema) ?? fileConfig.store.driver,
        dataFile: getEnvString('MINUTES_DATA_FILE') ?? fileConfig.store.dataFile,
        table: getEnvString('MINUTES_TABLE') ?? fileConfig.store.table,
      },

      llm: {
        baseUrl: getEnvString('LLM_BASE_URL') ?? fileConfig.llm.baseUrl,
        apiKey:
          getEnvString('LLM_API_KEY') ?? getEnvString('OPENAI_API_KEY') ?? fileConfig.llm.apiKey,
        timeoutMs: getEnvInt('LLM_TIMEOUT_MS') ?? fileConfig.llm.timeoutMs,
        maxRetries: getEnvInt('LLM_MAX_RETRIES') ?? fileConfig.llm.maxRetries,
      },

      agents: {
        rootModel: getEnvString('ROOT_AGENT_MODEL') ?? fileConfig.agents.rootModel,
        nl2sqlModel: getEnvString('NL2SQL_MODEL') ?? fileConfig.agents.nl2sqlModel,
        analyticsModel: getEnvString('ANALYTICS_MODEL') ?? fileConfig.agents.analyticsModel,
        routerMinConfidence:
          getEnvFloat('ROUTER_MIN_CONFIDENCE') ?? fileConfig.agents.routerMinConfidence,
      },

      query: {
        defaultLimit: getEnvInt('QUERY_DEFAULT_LIMIT') ?? fileConfig.query.defaultLimit,
        maxResultLimit: getEnvInt('QUERY_MAX_RESULT_LIMIT') ?? fileConfig.query.maxResultLimit,
        maxRows: getEnvInt('QUERY_MAX_ROWS') ?? fileConfig.query.maxRows,
        maxCorrectionAttempts:
          getEnvInt('QUERY_MAX_CORRECTION_ATTEMPTS') ?? fileConfig.query.maxCorrectionAttempts,
        maxComplexity: getEnvInt('QUERY_MAX_COMPLEXITY') ?? fileConfig.query.maxComplexity,
      },

      datasets: {
        file: getEnvString('DATASET_CONFIG_FILE') ?? fileConfig.datasets.file,
      },

      session: {
        maxHistoryLength:
          getEnvInt('SESSION_MAX_HISTORY') ?? fileConfig.session.maxHistoryLength,
        maxSessions: getEnvInt('SESSION_MAX_COUNT') ?? fileConfig.session.maxSessions,
        maxArtifacts: getEnvInt('SESSION_MAX_ARTIFACTS') ?? fileConfig.session.maxArtifacts,
      },

      logging: {
        level:
          getEnvEnum('LOG_LEVEL', LoggingConfigSchema.shape.level.removeDefault()) ??
          fileConfig.logging.level,
        format:
          getEnvEnum('LOG_FORMAT', LoggingConfigSchema.shape.format.removeDefault()) ??
          fileConfig.logging.format,
        fileEnabled: getEnvBool('LOG_FILE_ENABLED') ?? fileConfig.logging.fileEnabled,
        filePath: getEnvString('LOG_FILE_PATH') ?? fileConfig.logging.filePath,
      },

      configFilePath: this.configPath,
      hotReload: getEnvBool('CONFIG_HOT_RELOAD') ?? true,
    };
  }

  /**
   * Start watching config file for changes
   */
  public startWatching(): void {
    if (this.watcher !== null) {
      return;
    }

    if (!fs.existsSync(this.configPath)) {
      logConfig('Config file does not exist, hot reload disabled', { path: this.configPath });
      return;
    }

    this.watcher = chokidar.watch(this.configPath, {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 500,
        pollInterval: 100,
      },
    });

    this.watcher.on('change', () => {
      void this.reload();
    });

    logConfig('Hot reload enabled, watching config file', { path: this.configPath });
  }

  /**
   * Stop watching config file
   */
  public async stopWatching(): Promise<void> {
    if (this.watcher !== null) {
      await this.watcher.close();
      this.watcher = null;
      logConfig('Hot reload disabled');
    }
  }

  /**
   * Reload the configuration and notify subscribers of what changed
   */
  public async reload(): Promise<void> {
    try {
      const oldConfig = this.currentConfig;
      const newConfig = await this.load();

      if (oldConfig === null) {
        return;
      }

      const changedFields = getChangedFields(oldConfig, newConfig);
      if (changedFields.length === 0) {
        return;
      }

      logConfig('Configuration reloaded', { changedFields });

      for (const callback of this.changeCallbacks) {
        try {
          callback(oldConfig, newConfig, changedFields);
        } catch (error) {
          logger.error('Error in config change callback', {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    } catch (error) {
      logger.error('Failed to reload configuration', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Register a callback for config changes
   */
  public onConfigChange(callback: ConfigChangeCallback): void {
    this.changeCallbacks.push(callback);
  }

  /**
   * Get current configuration
   */
  public getConfig(): InsightsConfig {
    if (this.currentConfig === null) {
      throw new ConfigurationError('Configuration not loaded. Call load() first.');
    }
    return this.currentConfig;
  }
}

/**
 * Dotted paths of every leaf that differs between two configurations
 */
export function getChangedFields(oldConfig: InsightsConfig, newConfig: InsightsConfig): string[] {
  const changes: string[] = [];

  const compareObjects = (
    obj1: Record<string, unknown>,
    obj2: Record<string, unknown>,
    prefix = ''
  ): void => {
    const allKeys = new Set([...Object.keys(obj1), ...Object.keys(obj2)]);

    for (const key of allKeys) {
      const fieldPath = prefix ? `${prefix}.${key}` : key;
      const val1 = obj1[key];
      const val2 = obj2[key];

      if (isRecord(val1) && isRecord(val2)) {
        compareObjects(val1, val2, fieldPath);
      } else if (JSON.stringify(val1) !== JSON.stringify(val2)) {
        changes.push(fieldPath);
      }
    }
  };

  compareObjects({ ...oldConfig }, { ...newConfig });

  return changes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Singleton Instance
// =============================================================================

let configLoaderInstance: ConfigLoader | null = null;

export function getConfigLoader(configPath?: string): ConfigLoader {
  if (configLoaderInstance === null) {
    configLoaderInstance = new ConfigLoader(configPath);
  }
  return configLoaderInstance;
}

export async function loadConfig(configPath?: string): Promise<InsightsConfig> {
  const loader = getConfigLoader(configPath);
  return loader.load();
}

export default ConfigLoader;
