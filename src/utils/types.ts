/**
 * Minutes Insights - Core Type Definitions
 */

// =============================================================================
// Server Configuration Types
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

// =============================================================================
// Database Configuration Types
// =============================================================================

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMax: number;
}

// =============================================================================
// Store Configuration Types
// =============================================================================

export type StoreDriver = 'memory' | 'postgres';

export interface StoreConfig {
  driver: StoreDriver;
  /** JSON file with minutes records, used by the memory driver */
  dataFile: string;
  /** Name of the minutes table */
  table: string;
}

// =============================================================================
// LLM & Agent Configuration Types
// =============================================================================

export interface LlmConfig {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface AgentsConfig {
  rootModel: string;
  nl2sqlModel: string;
  analyticsModel: string;
  routerMinConfidence: number;
}

export interface QueryConfig {
  defaultLimit: number;
  maxResultLimit: number;
  maxRows: number;
  maxCorrectionAttempts: number;
  maxComplexity: number;
}

export interface DatasetsConfig {
  file: string;
}

export interface SessionConfig {
  maxHistoryLength: number;
  /** Live sessions kept in memory; the least recently used is dropped first */
  maxSessions: number;
  maxArtifacts: number;
}

// =============================================================================
// Logging Types
// =============================================================================

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
  fileEnabled: boolean;
  filePath: string;
}

// =============================================================================
// Main Configuration Type
// =============================================================================

export interface InsightsConfig {
  server: ServerConfig;
  postgres: PostgresConfig;
  store: StoreConfig;
  llm: LlmConfig;
  agents: AgentsConfig;
  query: QueryConfig;
  datasets: DatasetsConfig;
  session: SessionConfig;
  logging: LoggingConfig;
  configFilePath: string;
  hotReload: boolean;
}

// =============================================================================
// Request Types
// =============================================================================

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export class InsightsError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'InsightsError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends InsightsError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', true);
    this.name = 'ConfigurationError';
  }
}

export class DatabaseError extends InsightsError {
  constructor(message: string) {
    super(message, 500, 'DATABASE_ERROR', true);
    this.name = 'DatabaseError';
  }
}

export class ValidationError extends InsightsError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 400, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}

export class NotFoundError extends InsightsError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND', true);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised when the language model endpoint fails or answers with something unusable
 */
export class LlmError extends InsightsError {
  public readonly retryable: boolean;

  constructor(message: string, retryable = false, statusCode = 502) {
    super(message, statusCode, 'LLM_ERROR', true);
    this.name = 'LlmError';
    this.retryable = retryable;
  }
}
