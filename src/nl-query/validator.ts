/**
 * Minutes Insights - Query Validator
 *
 * Validates generated SQL against the constrained grammar and the minutes
 * schema, and produces the canonical SQL that is actually executed.
 */

import {
  SqlSyntaxError,
  collectValues,
  countOrNodes,
  formatQuery,
  outputName,
  outputNames,
  parseQuery,
  type SelectQuery,
} from '../query-engine/index.js';
import type { ValidationResult } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface QueryValidationConfig {
  /**
   * The only table queries may read
   */
  table: string;

  /**
   * Columns of that table
   */
  columns: readonly string[];

  maxQueryLength: number;
  maxResultLimit: number;

  /**
   * LIMIT added to queries that have none
   */
  defaultLimit: number;

  /**
   * Complexity above this is reported as a warning
   */
  maxComplexity: number;
}

export const DEFAULT_VALIDATION_CONFIG: Omit<QueryValidationConfig, 'columns'> = {
  table: 'minutes',
  maxQueryLength: 5000,
  maxResultLimit: 1000,
  defaultLimit: 100,
  maxComplexity: 4,
};

export interface ValidateOptions {
  /** Row limit the caller asked for; a larger LIMIT is lowered to it */
  limit?: number;
}

const INJECTION_PATTERNS = [
  /;/,
  /\b(OR|AND)\s+['"]?\d+['"]?\s*=\s*['"]?\d+['"]?/i,
  /\b(UNION\s+(ALL\s+)?SELECT|SELECT\s+\S+\s+FROM|INSERT\s+INTO|DELETE\s+FROM|DROP\s+TABLE|UPDATE\s+\w+\s+SET)\b/i,
  /--/,
  /\/\*/,
];

// =============================================================================
// Query Validator Class
// =============================================================================

export class QueryValidator {
  private config: QueryValidationConfig;

  constructor(config: Partial<QueryValidationConfig> & { columns: readonly string[] }) {
    this.config = { ...DEFAULT_VALIDATION_CONFIG, ...config };
  }

  /**
   * Validate a SQL query
   */
  validate(sql: string, params: unknown[] = [], options: ValidateOptions = {}): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (sql.length > this.config.maxQueryLength) {
      errors.push(`Query exceeds maximum length of ${this.config.maxQueryLength} characters`);
      return { valid: false, errors, warnings, complexity: 0 };
    }

    let query: SelectQuery;
    try {
      query = parseQuery(sql.trim().replace(/;+\s*$/, ''));
    } catch (error) {
      if (error instanceof SqlSyntaxError) {
        errors.push(error.message);
        return { valid: false, errors, warnings, complexity: 0 };
      }
      throw error;
    }

    if (query.from !== this.config.table) {
      errors.push(`Access to table '${query.from}' is not allowed`);
    }

    this.checkColumns(query, errors);
    this.checkParams(query, params, errors);

    const requested = options.limit;
    if (query.limit === undefined) {
      query.limit =
        requested !== undefined ? Math.min(requested, this.config.defaultLimit) : this.config.defaultLimit;
      warnings.push(`No LIMIT clause; applied LIMIT ${query.limit}`);
    } else if (query.limit > this.config.maxResultLimit) {
      errors.push(`LIMIT exceeds maximum of ${this.config.maxResultLimit}`);
    } else if (requested !== undefined && query.limit > requested) {
      warnings.push(`LIMIT ${query.limit} lowered to the requested ${requested}`);
      query.limit = requested;
    }

    if (query.columns !== '*') {
      const names = outputNames(query.columns);
      query.columns = query.columns.map((item, i) => {
        const name = names[i];
        return name !== undefined && name !== outputName(item) ? { ...item, alias: name } : item;
      });
    }

    const complexity = calculateComplexity(query);
    if (complexity > this.config.maxComplexity) {
      warnings.push(
        `Query complexity (${complexity}) exceeds recommended maximum (${this.config.maxComplexity})`
      );
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
      complexity,
      sanitizedSQL: errors.length === 0 ? formatQuery(query) : undefined,
    };
  }

  private checkColumns(query: SelectQuery, errors: string[]): void {
    const aliases = new Set(
      query.columns === '*' ? [] : query.columns.flatMap((c) => (c.alias !== undefined ? [c.alias] : []))
    );
    const reported = new Set<string>();

    for (const { clause, expr } of collectValues(query)) {
      if (expr.kind !== 'column') continue;

      if (expr.table !== undefined && expr.table !== this.config.table) {
        const message = `Access to table '${expr.table}' is not allowed`;
        if (!reported.has(message)) errors.push(message);
        reported.add(message);
        continue;
      }

      const known = this.config.columns.includes(expr.name);
      const isAlias = clause === 'orderBy' && expr.table === undefined && aliases.has(expr.name);
      if (!known && !isAlias) {
        const message = `Unknown column '${expr.name}'`;
        if (!reported.has(message)) errors.push(message);
        reported.add(message);
      }
    }
  }

  private checkParams(query: SelectQuery, params: unknown[], errors: string[]): void {
    const highest = collectValues(query).reduce(
      (max, { expr }) => (expr.kind === 'param' ? Math.max(max, expr.index) : max),
      0
    );
    if (highest > params.length) {
      errors.push(`Query references $${highest} but only ${params.length} parameter(s) were supplied`);
    }

    params.forEach((param, i) => {
      if (param !== null && !['string', 'number', 'boolean'].includes(typeof param)) {
        errors.push(`Parameter $${i + 1} must be a string, number, boolean or null`);
      } else if (typeof param === 'string' && containsSQLInjection(param)) {
        errors.push(`Potential SQL injection in parameter $${i + 1}`);
      }
    });
  }
}

/**
 * One point for the query, plus one per aggregate, OR, grouping, HAVING and DISTINCT
 */
export function calculateComplexity(query: SelectQuery): number {
  let complexity = 1;
  complexity += collectValues(query).filter(({ expr }) => expr.kind === 'aggregate').length;
  complexity += countOrNodes(query.where) + countOrNodes(query.having);
  if (query.groupBy.length > 0) complexity += 1;
  if (query.having !== undefined) complexity += 1;
  if (query.distinct) complexity += 1;
  return complexity;
}

export function containsSQLInjection(value: string): boolean {
  return INJECTION_PATTERNS.some((pattern) => pattern.test(value));
}
