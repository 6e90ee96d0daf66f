/**
 * Minutes Insights - Server Module
 */

export { InsightsServer, createInsightsServer } from './server.js';
export type { InsightsServerOptions } from './server.js';
export * from './middleware/index.js';
