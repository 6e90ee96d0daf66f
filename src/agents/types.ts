/**
 * Minutes Insights - Agent Types
 */

import type { AnalysisResult, ChartArtifact } from '../analytics/types.js';
import type { GeneratedQuery, ShapedResult, VisualizationType } from '../nl-query/types.js';

// =============================================================================
// Routing
// =============================================================================

export const ROUTE_INTENTS = ['data_retrieval', 'analytics', 'clarification'] as const;

export type RouteIntent = (typeof ROUTE_INTENTS)[number];

export interface Clarification {
  question: string;
  /** Between 2 and 5 readings of the message */
  candidates: string[];
}

export interface RouteDecision {
  intent: RouteIntent;
  confidence: number;
  reasoning: string;
  source: 'llm' | 'heuristic';
  clarification?: Clarification;
}

// =============================================================================
// Sessions
// =============================================================================

export interface SessionMessage {
  role: 'user' | 'assistant';
  content: string;
  intent?: RouteIntent;
  timestamp: string;
}

export interface Session {
  id: string;
  createdAt: string;
  updatedAt: string;
  messages: SessionMessage[];
  artifacts: ChartArtifact[];
}

// =============================================================================
// Responses
// =============================================================================

export interface InsightResponse {
  success: boolean;
  intent: RouteIntent;
  question: string;
  answer: string;
  sql?: GeneratedQuery;
  executedSql?: string;
  result?: ShapedResult;
  analysis?: AnalysisResult;
  clarification?: Clarification;
  artifacts: ChartArtifact[];
  visualizationType: VisualizationType;
  warnings: string[];
  suggestions: string[];
  error?: string;
  timestamp: string;
  /** Null for stateless queries */
  sessionId: string | null;
}
