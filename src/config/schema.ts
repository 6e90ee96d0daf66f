/**
 * Minutes Insights - Configuration Schema
 * Zod-based validation schemas for service configuration
 */

import { z } from 'zod';

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
});

// =============================================================================
// PostgreSQL Configuration Schema
// =============================================================================

export const PostgresConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().int().min(1).max(65535).default(5432),
  database: z.string().default('insights'),
  user: z.string().default('insights_user'),
  password: z.string().default('dev_password'),
  ssl: z.boolean().default(false),
  poolMax: z.number().int().min(1).default(10),
});

// =============================================================================
// Store Configuration Schema
// =============================================================================

export const StoreDriverSchema = z.enum(['memory', 'postgres']);

export const StoreConfigSchema = z.object({
  driver: StoreDriverSchema.default('memory'),
  dataFile: z.string().default('./data/minutes.sample.json'),
  table: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, 'table must be a lower-case SQL identifier')
    .default('minutes'),
});

// =============================================================================
// LLM Configuration Schema
// =============================================================================

export const LlmConfigSchema = z.object({
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  apiKey: z.string().default(''),
  timeoutMs: z.number().int().min(1000).default(30000),
  maxRetries: z.number().int().min(0).max(5).default(2),
});

export const AgentsConfigSchema = z.object({
  rootModel: z.string().min(1).default('gpt-4o-mini'),
  nl2sqlModel: z.string().min(1).default('gpt-4o-mini'),
  analyticsModel: z.string().min(1).default('gpt-4o-mini'),
  routerMinConfidence: z.number().min(0).max(1).default(0.5),
});

// =============================================================================
// Query Configuration Schema
// =============================================================================

export const QueryConfigSchema = z.object({
  defaultLimit: z.number().int().min(1).default(100),
  maxResultLimit: z.number().int().min(1).default(1000),
  maxRows: z.number().int().min(1).default(500),
  maxCorrectionAttempts: z.number().int().min(0).max(5).default(1),
  maxComplexity: z.number().int().min(1).default(4),
});

export const DatasetsConfigSchema = z.object({
  file: z.string().default('./config/datasets.json'),
});

export const SessionConfigSchema = z.object({
  maxHistoryLength: z.number().int().min(1).default(10),
  maxSessions: z.number().int().min(1).default(1000),
  maxArtifacts: z.number().int().min(1).default(20),
});

// =============================================================================
// Logging Configuration Schema
// =============================================================================

export const LoggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
  fileEnabled: z.boolean().default(false),
  filePath: z.string().default('./logs/insights.log'),
});

// =============================================================================
// Main Configuration Schema (YAML/JSON file)
// =============================================================================

export const ConfigFileSchema = z.object({
  server: ServerConfigSchema.default({}),
  postgres: PostgresConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
  agents: AgentsConfigSchema.default({}),
  query: QueryConfigSchema.default({}),
  datasets: DatasetsConfigSchema.default({}),
  session: SessionConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// =============================================================================
// Exported Types from Schemas
// =============================================================================

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;

// =============================================================================
// Validation Helper Functions
// =============================================================================

/**
 * Safely validate configuration file content (returns result object)
 */
export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, ConfigFileOutput> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
