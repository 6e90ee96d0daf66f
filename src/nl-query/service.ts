/**
 * Minutes Insights - NL2SQL Agent
 *
 * Orchestrates generation, validation, execution and shaping, re-prompting
 * the model with the failure when a query is rejected or fails to run.
 */

import type { MinutesStore } from '../storage/minutes-store.js';
import { logAgent } from '../utils/logger.js';
import { InsightsError } from '../utils/types.js';
import { ResultShaper } from './result-shaper.js';
import type { SQLGenerator } from './sql-generator.js';
import type {
  CorrectionContext,
  GeneratedQuery,
  NLQueryRequest,
  NLQueryResponse,
  QueryIntent,
  ShapedResult,
} from './types.js';
import type { QueryValidator } from './validator.js';

// =============================================================================
// Configuration
// =============================================================================

export interface NL2SQLAgentDeps {
  generator: SQLGenerator;
  validator: QueryValidator;
  store: MinutesStore;
  shaper?: ResultShaper;
}

export interface NL2SQLAgentConfig {
  /**
   * Extra generation rounds after a rejected or failed query
   */
  maxCorrectionAttempts: number;
}

export const NOT_CONFIGURED_ANSWER =
  'Natural language query service is not configured. Please set LLM_API_KEY.';

const SUGGESTIONS: Record<QueryIntent, string[]> = {
  meeting_lookup: [
    'What was decided in the most recent meeting?',
    'Show meetings from last month',
    'Which meetings have notes?',
  ],
  attendance: [
    'Who attends meetings most often?',
    'How many meetings did each person attend?',
    'Which meetings had the most attendees?',
  ],
  decisions: [
    'List decisions with a target date this month',
    'Who is responsible for the latest decisions?',
    'Which meetings ended without a decision?',
  ],
  follow_up: [
    'Which actions are overdue?',
    'What is planned for next week?',
    'Who has the most open follow-ups?',
  ],
  topic_search: [
    'Find meetings about the budget',
    'Which topics come up most often?',
    'Show the purpose of each planning meeting',
  ],
  count: [
    'How many meetings were held per month?',
    'How many meetings had decisions?',
    'Chart the number of meetings per week',
  ],
  time_series: [
    'Show meetings per month',
    'Plot meeting counts by week',
    'Compare this month with last month',
  ],
  aggregation: [
    'Break down meetings by topic',
    'Show the distribution of meetings per week',
    'What is the average number of meetings per week?',
  ],
  unknown: [
    'What was discussed in the last meeting?',
    'Who attends meetings most often?',
    'Show meetings per month as a chart',
  ],
};

export function suggestionsFor(intent: QueryIntent): string[] {
  return SUGGESTIONS[intent];
}

// =============================================================================
// NL2SQL Agent
// =============================================================================

export class NL2SQLAgent {
  private generator: SQLGenerator;
  private validator: QueryValidator;
  private store: MinutesStore;
  private shaper: ResultShaper;
  private config: NL2SQLAgentConfig;

  constructor(deps: NL2SQLAgentDeps, config: Partial<NL2SQLAgentConfig> = {}) {
    this.generator = deps.generator;
    this.validator = deps.validator;
    this.store = deps.store;
    this.shaper = deps.shaper ?? new ResultShaper();
    this.config = { maxCorrectionAttempts: 1, ...config };
  }

  isConfigured(): boolean {
    return this.generator.isConfigured();
  }

  /**
   * Answer a natural language question with data from the minutes store
   */
  async run(request: NLQueryRequest): Promise<NLQueryResponse> {
    const startTime = Date.now();
    const timestamp = new Date().toISOString();

    if (!this.generator.isConfigured()) {
      return {
        success: false,
        question: request.question,
        answer: NOT_CONFIGURED_ANSWER,
        visualizationType: 'text',
        warnings: [],
        suggestions: suggestionsFor('unknown'),
        attempts: 0,
        error: 'Service not configured',
        timestamp,
      };
    }

    const warnings: string[] = [];
    let correction: CorrectionContext | undefined;
    let generated: GeneratedQuery | undefined;
    let lastError = 'No query was generated';
    let attempts = 0;

    for (let round = 0; round <= this.config.maxCorrectionAttempts; round++) {
      attempts++;

      try {
        generated = await this.generator.generate(request.question, {
          previousQuestions: request.context?.previousQuestions,
          limit: request.limit,
          framing: request.context?.framing,
          correction,
        });
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        logAgent({ agent: 'nl2sql', event: 'generation_failed', attempt: attempts, error: lastError });
        break;
      }

      logAgent({
        agent: 'nl2sql',
        event: 'query_generated',
        attempt: attempts,
        intent: generated.intent,
        confidence: generated.confidence,
      });

      const validation = this.validator.validate(
        generated.sql,
        generated.params,
        request.limit !== undefined ? { limit: request.limit } : {}
      );
      if (!validation.valid || validation.sanitizedSQL === undefined) {
        lastError = validation.errors.join('; ');
        logAgent({ agent: 'nl2sql', event: 'validation_failed', attempt: attempts, errors: validation.errors });
        correction = { sql: generated.sql, error: lastError };
        continue;
      }

      let result: ShapedResult;
      try {
        const executed = await this.store.execute(validation.sanitizedSQL, generated.params);
        result = this.shaper.shape(executed.rows, executed.executionTimeMs);
      } catch (error) {
        if (!(error instanceof InsightsError)) {
          throw error;
        }
        lastError = error.message;
        logAgent({ agent: 'nl2sql', event: 'execution_failed', attempt: attempts, error: lastError });
        correction = { sql: validation.sanitizedSQL, error: lastError };
        continue;
      }

      warnings.push(...validation.warnings);
      if (attempts > 1) {
        warnings.push(`Query was corrected after ${attempts - 1} failed attempt(s)`);
      }
      if (result.truncated) {
        warnings.push(`Result truncated to ${result.rowCount} of ${result.totalRowCount} rows`);
      }

      logAgent({
        agent: 'nl2sql',
        event: 'query_answered',
        attempts,
        rows: result.rowCount,
        durationMs: Date.now() - startTime,
      });

      return {
        success: true,
        question: request.question,
        sql: generated,
        executedSql: validation.sanitizedSQL,
        result,
        answer: this.shaper.describe(generated.intent, result, generated.explanation),
        visualizationType: this.shaper.visualize(generated.intent, result),
        warnings,
        suggestions: suggestionsFor(generated.intent),
        attempts,
        timestamp,
      };
    }

    logAgent({
      agent: 'nl2sql',
      event: 'query_failed',
      attempts,
      error: lastError,
      durationMs: Date.now() - startTime,
    });

    return {
      success: false,
      question: request.question,
      sql: generated,
      answer: `I couldn't answer that question with a safe query. ${lastError}`,
      visualizationType: 'text',
      warnings,
      suggestions: suggestionsFor(generated?.intent ?? 'unknown'),
      attempts,
      error: lastError,
      timestamp,
    };
  }
}
