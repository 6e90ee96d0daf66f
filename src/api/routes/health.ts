/**
 * Minutes Insights - Health Routes
 */

import { Router, type Request, type Response } from 'express';

import { asyncHandler } from '../../server/middleware/errorHandler.js';
import type { ApiContext } from '../context.js';

export function createHealthRouter(ctx: ApiContext): Router {
  const router = Router();

  /**
   * GET /health
   *
   * 200 when the minutes store answers, 503 otherwise.
   */
  const healthCheck = asyncHandler(async (_req: Request, res: Response) => {
    const reachable = await ctx.store.ping();

    res.status(reachable ? 200 : 503).json({
      status: reachable ? 'healthy' : 'unhealthy',
      store: { driver: ctx.store.driver, reachable },
      llmConfigured: ctx.chatModel.isConfigured(),
      uptimeSeconds: Math.floor((Date.now() - ctx.startedAt.getTime()) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/health', healthCheck);
  router.get('/healthz', healthCheck);

  return router;
}
