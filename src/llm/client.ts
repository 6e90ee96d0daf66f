/**
 * Minutes Insights - Chat Model Client
 *
 * Client for an OpenAI-compatible chat completions endpoint.
 * Provides:
 * - A `ChatModel` seam the agents depend on
 * - Request timeouts via AbortController
 * - Retry with exponential backoff on network errors, 429 and 5xx
 */

import { retryWithBackoff } from '../utils/helpers.js';
import { createChildLogger } from '../utils/logger.js';
import { LlmError, type LlmConfig } from '../utils/types.js';

const log = createChildLogger({ component: 'llm' });

// =============================================================================
// Types
// =============================================================================

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask the endpoint for a JSON object response */
  json?: boolean;
}

export interface ChatModel {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
  isConfigured(): boolean;
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  error?: {
    message?: string;
  };
}

function isCompletionResponse(value: unknown): value is ChatCompletionResponse {
  return typeof value === 'object' && value !== null;
}

// =============================================================================
// OpenAI-compatible Client
// =============================================================================

export class OpenAIChatModel implements ChatModel {
  private config: LlmConfig;

  constructor(config: LlmConfig) {
    this.config = config;
  }

  isConfigured(): boolean {
    return this.config.apiKey.trim().length > 0;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    if (!this.isConfigured()) {
      throw new LlmError('Language model API key is not configured', false, 503);
    }

    return retryWithBackoff(
      async (attempt) => {
        if (attempt > 1) {
          log.warn('Retrying chat completion', { model: options.model, attempt });
        }
        return this.request(messages, options);
      },
      {
        maxAttempts: this.config.maxRetries + 1,
        initialDelayMs: 500,
        maxDelayMs: 8000,
        shouldRetry: (error) => error instanceof LlmError && error.retryable,
      }
    );
  }

  private async request(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    const body: Record<string, unknown> = {
      model: options.model,
      messages,
      temperature: options.temperature ?? 0,
    };
    if (options.maxTokens !== undefined) {
      body.max_tokens = options.maxTokens;
    }
    if (options.json) {
      body.response_format = { type: 'json_object' };
    }

    const startTime = Date.now();

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'POST',
          signal: controller.signal,
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body: JSON.stringify(body),
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw this.timeoutError();
        }
        throw new LlmError(
          `Chat completion request failed: ${error instanceof Error ? error.message : String(error)}`,
          true
        );
      }

      // The timer keeps running while the body streams in
      const payload: unknown = await response.json().catch((error: unknown) => {
        if (isAbortError(error)) {
          throw this.timeoutError();
        }
        return {};
      });
      const data: ChatCompletionResponse = isCompletionResponse(payload) ? payload : {};

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new LlmError(
          data.error?.message ?? `HTTP ${response.status}: ${response.statusText}`,
          retryable
        );
      }

      const content = data.choices?.[0]?.message?.content;
      if (typeof content !== 'string' || content.trim() === '') {
        throw new LlmError('Chat completion returned no content');
      }

      log.debug('Chat completion finished', {
        model: options.model,
        durationMs: Date.now() - startTime,
      });

      return content;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private timeoutError(): LlmError {
    return new LlmError(`Chat completion timed out after ${this.config.timeoutMs}ms`, true, 504);
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
