/**
 * Minutes Insights - Intent Router
 *
 * Decides whether a message needs rows, an analysis, or a question back.
 */

import { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import type { ChatMessage, ChatModel } from '../llm/index.js';
import { extractJson } from '../llm/json.js';
import { buildGlobalInstruction, buildRootInstruction } from '../prompts/index.js';
import { toIsoDate } from '../utils/helpers.js';
import { logAgent } from '../utils/logger.js';
import { ROUTE_INTENTS, type Clarification, type RouteDecision, type SessionMessage } from './types.js';

export interface IntentRouterConfig {
  model: string;
  minConfidence: number;
  temperature: number;
  /** Earlier messages sent to the model */
  historyWindow: number;
}

const RouterReplySchema = z.object({
  intent: z.enum(ROUTE_INTENTS),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().default(''),
  question: z.string().trim().min(1).optional(),
  candidates: z.array(z.string().trim().min(1)).optional(),
});

const GREETINGS = new Set([
  'hi',
  'hello',
  'hey',
  'thanks',
  'thank',
  'you',
  'good',
  'morning',
  'afternoon',
  'evening',
  'bye',
]);

const FILLER_WORDS = new Set([
  'a', 'an', 'the', 'of', 'to', 'in', 'on', 'at', 'for',
  'and', 'or', 'is', 'are', 'it', 'me', 'my', 'please',
]);

const FOLLOW_UP = /^(yes|yeah|yep|ok|okay|sure|more|again|continue|go on|and then|same)[\s.!?]*$/i;

const ANALYTICS_HINTS =
  /\b(chart|plot|graph|trends?|distribution|average|mean|breakdown|compare|comparison|statistics?|stats|visuali[sz]e)\b|\bper\s+(day|week|month)\b|\bmost\s+(often|frequently)\b/i;

function words(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}_']+/gu) ?? [];
}

/**
 * Clarifying question with 2 to 5 distinct candidate readings
 */
export function buildClarification(utterance: string, question?: string, candidates: string[] = []): Clarification {
  const subject = utterance.trim();
  const fallback = subject
    ? [`List the meetings that mention "${subject}"`, `Show statistics or a chart about "${subject}"`]
    : ['Show the most recent meetings', 'Who attends meetings most often?', 'How many meetings were held per month?'];

  const unique: string[] = [];
  const add = (list: string[]): void => {
    for (const candidate of list) {
      const trimmed = candidate.trim();
      if (trimmed && !unique.some((c) => c.toLowerCase() === trimmed.toLowerCase())) {
        unique.push(trimmed);
      }
    }
  };
  add(candidates);
  if (unique.length < 2) {
    add(fallback);
  }

  return {
    question: question ?? 'Could you say a little more about what you would like to know?',
    candidates: unique.slice(0, 5),
  };
}

/**
 * Keyword routing used when the model is unavailable or unusable
 */
export function heuristicRoute(utterance: string, history: SessionMessage[]): RouteDecision {
  const text = utterance.trim();

  if (FOLLOW_UP.test(text)) {
    const previous = [...history].reverse().find((m) => m.role === 'user' && m.intent !== undefined);
    if (previous?.intent !== undefined && previous.intent !== 'clarification') {
      return {
        intent: previous.intent,
        confidence: 0.7,
        reasoning: 'Follow-up to the previous question',
        source: 'heuristic',
      };
    }
  }

  const tokens = words(text);
  const greetingOnly = tokens.length > 0 && tokens.every((w) => GREETINGS.has(w));
  const meaningful = tokens.filter((w) => !FILLER_WORDS.has(w) && !GREETINGS.has(w));

  if (tokens.length === 0 || greetingOnly || meaningful.length < 2) {
    return {
      intent: 'clarification',
      confidence: 0.9,
      reasoning: tokens.length === 0 ? 'Empty message' : 'Message is too short to answer',
      source: 'heuristic',
      clarification: buildClarification(greetingOnly ? '' : text),
    };
  }

  if (ANALYTICS_HINTS.test(text)) {
    return { intent: 'analytics', confidence: 0.7, reasoning: 'Asks for an analysis or chart', source: 'heuristic' };
  }

  return { intent: 'data_retrieval', confidence: 0.6, reasoning: 'Asks for specific records', source: 'heuristic' };
}

// =============================================================================
// Router
// =============================================================================

export class IntentRouter {
  private config: IntentRouterConfig;

  constructor(
    private readonly chatModel: ChatModel,
    config: Partial<IntentRouterConfig> & { model: string },
    private readonly now: () => Date = () => new Date()
  ) {
    this.config = { minConfidence: 0.5, temperature: 0.01, historyWindow: 6, ...config };
  }

  async classify(utterance: string, history: SessionMessage[] = []): Promise<RouteDecision> {
    if (utterance.trim() === '' || !this.chatModel.isConfigured()) {
      return heuristicRoute(utterance, history);
    }

    let decision: RouteDecision;
    try {
      decision = await this.askModel(utterance, history);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logAgent({ agent: 'router', event: 'classification_failed', error: message });
      return heuristicRoute(utterance, history);
    }

    logAgent({ agent: 'router', event: 'classified', intent: decision.intent, confidence: decision.confidence });
    return decision;
  }

  private async askModel(utterance: string, history: SessionMessage[]): Promise<RouteDecision> {
    const earlier: ChatMessage[] = history
      .slice(-this.config.historyWindow)
      .map((m) => ({ role: m.role, content: m.content }));

    const reply = await this.chatModel.complete(
      [
        { role: 'system', content: `${buildGlobalInstruction(toIsoDate(this.now()))}\n\n${buildRootInstruction()}` },
        ...earlier,
        { role: 'user', content: utterance },
      ],
      { model: this.config.model, temperature: this.config.temperature, json: true }
    );

    const parsed = RouterReplySchema.safeParse(extractJson(reply));
    if (!parsed.success) {
      throw new Error(`invalid routing reply: ${formatValidationErrors(parsed.error).join('; ')}`);
    }

    const { intent, confidence, reasoning, question, candidates } = parsed.data;
    if (intent === 'clarification' || confidence < this.config.minConfidence) {
      return {
        intent: 'clarification',
        confidence,
        reasoning: intent === 'clarification' ? reasoning : `Low confidence (${confidence}) for ${intent}`,
        source: 'llm',
        clarification: buildClarification(utterance, question, candidates),
      };
    }

    return { intent, confidence, reasoning, source: 'llm' };
  }
}
