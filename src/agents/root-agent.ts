/**
 * Minutes Insights - Root Agent
 *
 * Entry point for every question: keeps the session, asks the router where
 * the message belongs and dispatches to the NL2SQL or analytics agent.
 */

import { v4 as uuidv4 } from 'uuid';

import type { AnalyticsAgent } from '../analytics/service.js';
import type { ChartArtifact } from '../analytics/types.js';
import type { NL2SQLAgent } from '../nl-query/service.js';
import { suggestionsFor } from '../nl-query/service.js';
import type { NLQueryResponse, VisualizationType } from '../nl-query/types.js';
import { logAgent } from '../utils/logger.js';
import { NotFoundError } from '../utils/types.js';
import type { IntentRouter } from './router.js';
import type { InsightResponse, RouteDecision, Session, SessionMessage } from './types.js';

export interface RootAgentDeps {
  router: IntentRouter;
  nl2sql: NL2SQLAgent;
  analytics: AnalyticsAgent;
}

export interface RootAgentConfig {
  /** Conversation turns kept per session; each turn is two messages */
  maxHistoryLength: number;
  /** Earlier user questions passed to the SQL generator */
  contextQuestions: number;
  /** Sessions held in memory; the least recently used goes first */
  maxSessions: number;
  maxArtifactsPerSession: number;
}

export interface AskOptions {
  limit?: number;
}

type DispatchResult = Omit<InsightResponse, 'question' | 'timestamp' | 'sessionId'>;

const DEFAULT_CONFIG: RootAgentConfig = {
  maxHistoryLength: 10,
  contextQuestions: 3,
  maxSessions: 1000,
  maxArtifactsPerSession: 20,
};

export class RootAgent {
  private config: RootAgentConfig;
  private sessions = new Map<string, Session>();

  constructor(
    private deps: RootAgentDeps,
    config: Partial<RootAgentConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Swap in rebuilt agents after a config change; sessions are kept
   */
  reconfigure(deps: RootAgentDeps, config: Partial<RootAgentConfig> = {}): void {
    this.deps = deps;
    this.config = { ...this.config, ...config };
  }

  isConfigured(): boolean {
    return this.deps.nl2sql.isConfigured();
  }

  // ===========================================================================
  // Sessions
  // ===========================================================================

  createSession(): Session {
    const now = new Date().toISOString();
    const session: Session = { id: uuidv4(), createdAt: now, updatedAt: now, messages: [], artifacts: [] };
    this.sessions.set(session.id, session);
    logAgent({ agent: 'root', event: 'session_created', sessionId: session.id });
    this.evictSessions();
    return session;
  }

  private evictSessions(): void {
    for (const id of this.sessions.keys()) {
      if (this.sessions.size <= this.config.maxSessions) break;
      this.sessions.delete(id);
      logAgent({ agent: 'root', event: 'session_evicted', sessionId: id });
    }
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  listMessages(sessionId: string): SessionMessage[] {
    return [...this.requireSession(sessionId).messages];
  }

  listArtifacts(sessionId: string): ChartArtifact[] {
    return [...this.requireSession(sessionId).artifacts];
  }

  getArtifact(sessionId: string, artifactId: string): ChartArtifact {
    const artifact = this.requireSession(sessionId).artifacts.find((a) => a.id === artifactId);
    if (!artifact) {
      throw new NotFoundError(`Artifact not found: ${artifactId}`);
    }
    return artifact;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  private requireSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new NotFoundError(`Session not found: ${sessionId}`);
    }
    return session;
  }

  // ===========================================================================
  // Handling
  // ===========================================================================

  /**
   * Answer one turn of a conversation, creating the session when none is given
   */
  async handle(sessionId: string | undefined, utterance: string): Promise<InsightResponse> {
    const session = sessionId !== undefined ? this.requireSession(sessionId) : this.createSession();
    // Map order doubles as recency order
    this.sessions.delete(session.id);
    this.sessions.set(session.id, session);
    const question = utterance.trim();
    const startTime = Date.now();

    const decision = await this.deps.router.classify(question, session.messages);
    const previousQuestions = session.messages
      .filter((m) => m.role === 'user')
      .slice(-this.config.contextQuestions)
      .map((m) => m.content);

    const result = await this.dispatch(question, decision, previousQuestions, {});
    const timestamp = new Date().toISOString();

    session.messages.push(
      { role: 'user', content: question, intent: decision.intent, timestamp },
      { role: 'assistant', content: result.answer, intent: decision.intent, timestamp }
    );
    const maxMessages = this.config.maxHistoryLength * 2;
    if (session.messages.length > maxMessages) {
      session.messages.splice(0, session.messages.length - maxMessages);
    }
    session.artifacts.push(...result.artifacts);
    if (session.artifacts.length > this.config.maxArtifactsPerSession) {
      session.artifacts.splice(0, session.artifacts.length - this.config.maxArtifactsPerSession);
    }
    session.updatedAt = timestamp;

    logAgent({
      agent: 'root',
      event: result.success ? 'turn_completed' : 'turn_failed',
      sessionId: session.id,
      intent: decision.intent,
      source: decision.source,
      durationMs: Date.now() - startTime,
    });

    return { ...result, question, timestamp, sessionId: session.id };
  }

  /**
   * Answer a single question outside any session
   */
  async ask(question: string, options: AskOptions = {}): Promise<InsightResponse> {
    const trimmed = question.trim();
    const decision = await this.deps.router.classify(trimmed, []);
    const result = await this.dispatch(trimmed, decision, [], options);
    return { ...result, question: trimmed, timestamp: new Date().toISOString(), sessionId: null };
  }

  private async dispatch(
    question: string,
    decision: RouteDecision,
    previousQuestions: string[],
    options: AskOptions
  ): Promise<DispatchResult> {
    if (decision.intent === 'clarification') {
      const clarification = decision.clarification ?? {
        question: 'Could you say a little more about what you would like to know?',
        candidates: ['Show the most recent meetings', 'Who attends meetings most often?'],
      };
      return {
        success: true,
        intent: 'clarification',
        answer: clarification.question,
        clarification,
        artifacts: [],
        visualizationType: 'text',
        warnings: [],
        suggestions: clarification.candidates,
      };
    }

    const framing = decision.intent === 'analytics' ? 'analytics' : 'retrieval';
    const response = await this.deps.nl2sql.run({
      question,
      ...(options.limit !== undefined ? { limit: options.limit } : {}),
      context: { previousQuestions, framing },
    });

    const base = fromQueryResponse(decision, response);
    if (decision.intent !== 'analytics' || !response.success || response.result === undefined) {
      return base;
    }

    const analysis = await this.deps.analytics.analyze(question, response.result);
    let visualizationType: VisualizationType = base.visualizationType;
    if (analysis.plan?.chart !== undefined && analysis.artifacts.length > 0) {
      visualizationType = analysis.plan.chart.type === 'line' ? 'line_chart' : 'bar_chart';
    }

    return {
      ...base,
      answer: analysis.summary,
      analysis,
      artifacts: analysis.artifacts,
      visualizationType,
      warnings: [...base.warnings, ...analysis.warnings],
      suggestions: suggestionsFor(response.sql?.intent ?? 'aggregation'),
    };
  }
}

function fromQueryResponse(decision: RouteDecision, response: NLQueryResponse): DispatchResult {
  return {
    success: response.success,
    intent: decision.intent,
    answer: response.answer,
    ...(response.sql !== undefined ? { sql: response.sql } : {}),
    ...(response.executedSql !== undefined ? { executedSql: response.executedSql } : {}),
    ...(response.result !== undefined ? { result: response.result } : {}),
    ...(response.error !== undefined ? { error: response.error } : {}),
    artifacts: [],
    visualizationType: response.visualizationType,
    warnings: response.warnings,
    suggestions: response.suggestions,
  };
}
