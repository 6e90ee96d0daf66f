/**
 * Minutes Insights - Agent Factory
 *
 * Wires the chat model, store and configuration into the agent graph.
 */

import { AnalysisPlanner, AnalyticsAgent } from '../analytics/index.js';
import type { ChatModel } from '../llm/client.js';
import type { DatasetDescriptor } from '../minutes/datasets.js';
import { describeSchema, MINUTES_COLUMN_NAMES } from '../minutes/schema.js';
import { NL2SQLAgent, QueryValidator, ResultShaper, SQLGenerator } from '../nl-query/index.js';
import type { MinutesStore } from '../storage/minutes-store.js';
import type { InsightsConfig } from '../utils/types.js';
import { RootAgent, type RootAgentConfig, type RootAgentDeps } from './root-agent.js';
import { IntentRouter } from './router.js';

export interface AgentFactoryInput {
  config: InsightsConfig;
  chatModel: ChatModel;
  store: MinutesStore;
  datasets: DatasetDescriptor[];
}

export function buildAgentDeps({ config, chatModel, store, datasets }: AgentFactoryInput): RootAgentDeps {
  const { table } = config.store;
  const { defaultLimit, maxResultLimit, maxRows, maxCorrectionAttempts, maxComplexity } = config.query;

  const generator = new SQLGenerator(chatModel, describeSchema(table), datasets, {
    model: config.agents.nl2sqlModel,
    table,
    defaultLimit,
    maxResultLimit,
  });
  const validator = new QueryValidator({
    table,
    columns: MINUTES_COLUMN_NAMES,
    defaultLimit,
    maxResultLimit,
    maxComplexity,
  });

  return {
    router: new IntentRouter(chatModel, {
      model: config.agents.rootModel,
      minConfidence: config.agents.routerMinConfidence,
    }),
    nl2sql: new NL2SQLAgent(
      { generator, validator, store, shaper: new ResultShaper({ maxRows }) },
      { maxCorrectionAttempts }
    ),
    analytics: new AnalyticsAgent(new AnalysisPlanner(chatModel, { model: config.agents.analyticsModel })),
  };
}

export function rootAgentConfig(config: InsightsConfig): Partial<RootAgentConfig> {
  return {
    maxHistoryLength: config.session.maxHistoryLength,
    maxSessions: config.session.maxSessions,
    maxArtifactsPerSession: config.session.maxArtifacts,
  };
}

export function createRootAgent(input: AgentFactoryInput): RootAgent {
  return new RootAgent(buildAgentDeps(input), rootAgentConfig(input.config));
}
