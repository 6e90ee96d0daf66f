/**
 * Minutes Insights - Natural Language Query Module
 */

export { SQLGenerator, DEFAULT_SQL_GENERATOR_CONFIG } from './sql-generator.js';
export type { SQLGeneratorConfig } from './sql-generator.js';

export {
  QueryValidator,
  DEFAULT_VALIDATION_CONFIG,
  calculateComplexity,
  containsSQLInjection,
} from './validator.js';
export type { QueryValidationConfig, ValidateOptions } from './validator.js';

export { ResultShaper } from './result-shaper.js';
export type { ResultShaperConfig } from './result-shaper.js';

export { NL2SQLAgent, NOT_CONFIGURED_ANSWER, suggestionsFor } from './service.js';
export type { NL2SQLAgentDeps, NL2SQLAgentConfig } from './service.js';

export { GeneratedQuerySchema, QUERY_INTENTS } from './types.js';
export type {
  QueryIntent,
  GeneratedQuery,
  NLQueryRequest,
  NLQueryResponse,
  CorrectionContext,
  GenerationContext,
  ValidationResult,
  ColumnKind,
  ShapedColumn,
  ShapedResult,
  VisualizationType,
} from './types.js';
