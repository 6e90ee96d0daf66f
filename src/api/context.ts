/**
 * Minutes Insights - API Context
 *
 * The live objects route handlers read on every request. The server swaps
 * fields in place when the configuration is reloaded.
 */

import type { RootAgent } from '../agents/root-agent.js';
import type { ChatModel } from '../llm/client.js';
import type { DatasetDescriptor } from '../minutes/datasets.js';
import type { MinutesStore } from '../storage/minutes-store.js';
import type { InsightsConfig } from '../utils/types.js';

export interface ApiContext {
  config: InsightsConfig;
  root: RootAgent;
  store: MinutesStore;
  chatModel: ChatModel;
  datasets: DatasetDescriptor[];
  startedAt: Date;
}
