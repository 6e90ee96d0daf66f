/**
 * Minutes Insights - Agents Module
 */

export { RootAgent } from './root-agent.js';
export type { RootAgentDeps, RootAgentConfig, AskOptions } from './root-agent.js';
export { IntentRouter, heuristicRoute, buildClarification } from './router.js';
export type { IntentRouterConfig } from './router.js';
export { ROUTE_INTENTS } from './types.js';
export type {
  RouteIntent,
  RouteDecision,
  Clarification,
  Session,
  SessionMessage,
  InsightResponse,
} from './types.js';
export { buildAgentDeps, createRootAgent, rootAgentConfig } from './factory.js';
export type { AgentFactoryInput } from './factory.js';
