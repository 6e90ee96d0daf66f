/**
 * Minutes Insights - SQL Generator
 *
 * Asks the chat model for a parameterized query over the minutes table.
 */

import type { ChatMessage, ChatModel } from '../llm/index.js';
import { extractJson } from '../llm/json.js';
import { formatValidationErrors } from '../config/schema.js';
import type { DatasetDescriptor } from '../minutes/datasets.js';
import { buildGlobalInstruction, buildNl2SqlInstruction } from '../prompts/index.js';
import { toIsoDate } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { LlmError } from '../utils/types.js';
import { GeneratedQuerySchema, type GeneratedQuery, type GenerationContext } from './types.js';

// =============================================================================
// Configuration
// =============================================================================

export interface SQLGeneratorConfig {
  model: string;
  table: string;
  defaultLimit: number;
  maxResultLimit: number;
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_SQL_GENERATOR_CONFIG: Omit<SQLGeneratorConfig, 'model'> = {
  table: 'minutes',
  defaultLimit: 100,
  maxResultLimit: 1000,
  temperature: 0.1,
  maxTokens: 1000,
};

// =============================================================================
// SQL Generator Class
// =============================================================================

export class SQLGenerator {
  private config: SQLGeneratorConfig;

  constructor(
    private readonly chatModel: ChatModel,
    private readonly schemaText: string,
    private readonly datasets: DatasetDescriptor[],
    config: Partial<SQLGeneratorConfig> & { model: string },
    private readonly now: () => Date = () => new Date()
  ) {
    this.config = { ...DEFAULT_SQL_GENERATOR_CONFIG, ...config };
  }

  /**
   * Generate SQL from a natural language question
   */
  async generate(question: string, context: GenerationContext = {}): Promise<GeneratedQuery> {
    const messages: ChatMessage[] = [
      { role: 'system', content: this.buildSystemPrompt() },
      { role: 'user', content: this.buildUserPrompt(question, context) },
    ];

    const reply = await this.chatModel.complete(messages, {
      model: this.config.model,
      temperature: this.config.temperature,
      maxTokens: this.config.maxTokens,
      json: true,
    });

    return this.parseResponse(reply);
  }

  isConfigured(): boolean {
    return this.chatModel.isConfigured();
  }

  private buildSystemPrompt(): string {
    return `${buildGlobalInstruction(toIsoDate(this.now()))}\n\n${buildNl2SqlInstruction(
      this.schemaText,
      this.datasets,
      {
        table: this.config.table,
        defaultLimit: this.config.defaultLimit,
        maxResultLimit: this.config.maxResultLimit,
      }
    )}`;
  }

  private buildUserPrompt(question: string, context: GenerationContext): string {
    let prompt = `Question: ${question}`;

    if (context.previousQuestions && context.previousQuestions.length > 0) {
      prompt += `\nEarlier questions in this conversation:\n${context.previousQuestions
        .map((q) => `- ${q}`)
        .join('\n')}`;
    }

    if (context.limit !== undefined) {
      prompt += `\nLimit results to: ${context.limit}`;
    }

    if (context.framing === 'analytics') {
      prompt +=
        '\nThe rows feed a statistical analysis: return the individual meeting rows and the columns needed to analyse them, not a pre-aggregated answer.';
    }

    if (context.correction) {
      prompt += `\n\nYour previous query failed.\nQuery: ${context.correction.sql}\nError: ${context.correction.error}\nReturn a corrected query.`;
    }

    return prompt;
  }

  /**
   * Parse the model reply into a GeneratedQuery
   */
  private parseResponse(reply: string): GeneratedQuery {
    const parsed = GeneratedQuerySchema.safeParse(extractJson(reply));

    if (!parsed.success) {
      const details = formatValidationErrors(parsed.error);
      logger.warn('Model returned an invalid query payload', { details });
      throw new LlmError(`Model returned an invalid query payload: ${details.join('; ')}`);
    }

    return parsed.data;
  }
}
