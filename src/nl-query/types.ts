/**
 * Minutes Insights - Natural Language Query Types
 *
 * Type definitions for the NL2SQL agent.
 */

import { z } from 'zod';

/**
 * Supported query intents
 */
export const QUERY_INTENTS = [
  'meeting_lookup',
  'attendance',
  'decisions',
  'follow_up',
  'topic_search',
  'count',
  'time_series',
  'aggregation',
  'unknown',
] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

/**
 * Shape of the model's reply; loose fields fall back instead of failing
 */
export const GeneratedQuerySchema = z.object({
  sql: z.string().trim().min(1),
  params: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).default([]),
  intent: z.enum(QUERY_INTENTS).catch('unknown'),
  confidence: z.number().min(0).max(1).catch(0.5),
  explanation: z.string().default(''),
});

/**
 * Generated SQL query with metadata
 */
export type GeneratedQuery = z.output<typeof GeneratedQuerySchema>;

/**
 * Natural language question handed to the NL2SQL agent
 */
export interface NLQueryRequest {
  question: string;

  /**
   * Maximum number of results the caller wants
   */
  limit?: number;

  context?: {
    /**
     * Earlier user questions in the same conversation, oldest first
     */
    previousQuestions?: string[];

    /**
     * `analytics` asks for raw rows suited to further analysis
     */
    framing?: 'retrieval' | 'analytics';
  };
}

/**
 * A failed attempt fed back to the model
 */
export interface CorrectionContext {
  sql: string;
  error: string;
}

export interface GenerationContext {
  previousQuestions?: string[];
  limit?: number;
  framing?: 'retrieval' | 'analytics';
  correction?: CorrectionContext;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  complexity: number;
  sanitizedSQL?: string;
}

// =============================================================================
// Shaped Results
// =============================================================================

export type ColumnKind = 'number' | 'date' | 'boolean' | 'text' | 'mixed' | 'null';

export interface ShapedColumn {
  name: string;
  kind: ColumnKind;
}

export interface ShapedResult {
  columns: ShapedColumn[];
  rows: Record<string, unknown>[];
  /** Rows returned after truncation */
  rowCount: number;
  /** Rows the store produced */
  totalRowCount: number;
  truncated: boolean;
  executionTimeMs: number;
}

export type VisualizationType = 'number' | 'table' | 'bar_chart' | 'line_chart' | 'text';

/**
 * Complete response to a natural language query
 */
export interface NLQueryResponse {
  success: boolean;
  question: string;

  /**
   * Last query the model produced
   */
  sql?: GeneratedQuery;

  /**
   * Canonical SQL that was executed
   */
  executedSql?: string;

  result?: ShapedResult;

  /**
   * Natural language answer
   */
  answer: string;

  visualizationType: VisualizationType;
  warnings: string[];
  suggestions: string[];

  /**
   * Generation attempts made, corrections included
   */
  attempts: number;

  error?: string;
  timestamp: string;
}
