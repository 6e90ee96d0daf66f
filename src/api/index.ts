/**
 * Minutes Insights - API Module
 */

export const ROUTE_PREFIXES = {
  insights: '/api/insights',
} as const;

export { createInsightsRouter, QueryBodySchema, ChatBodySchema } from './routes/insights.js';
export { createHealthRouter } from './routes/health.js';
export { parseRequest } from './validation.js';
export type { ApiContext } from './context.js';
