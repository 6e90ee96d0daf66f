/**
 * Minutes Insights - Insights API Routes
 *
 * REST endpoints for questions, chat sessions and the metadata a client
 * needs to build its UI.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import { MINUTES_COLUMNS } from '../../minutes/schema.js';
import { suggestionsFor } from '../../nl-query/service.js';
import { QUERY_INTENTS } from '../../nl-query/types.js';
import { asyncHandler } from '../../server/middleware/errorHandler.js';
import { NotFoundError, ValidationError } from '../../utils/types.js';
import type { ApiContext } from '../context.js';
import { parseRequest } from '../validation.js';

// =============================================================================
// Request Schemas
// =============================================================================

export const QueryBodySchema = z.object({
  question: z.string().trim().min(1, 'question is required').max(2000),
  limit: z.number().int().min(1).optional(),
});

export const ChatBodySchema = z.object({
  sessionId: z.string().uuid().optional(),
  message: z.string().trim().min(1, 'message is required').max(2000),
});

const SuggestionsQuerySchema = z.object({
  intent: z.enum(QUERY_INTENTS).optional(),
});

// =============================================================================
// Router
// =============================================================================

export function createInsightsRouter(ctx: ApiContext): Router {
  const router = Router();

  /**
   * POST /api/insights/query
   *
   * Answer a single question without a session.
   */
  router.post(
    '/query',
    asyncHandler(async (req: Request, res: Response) => {
      const { question, limit } = parseRequest(QueryBodySchema, req.body);
      const maxLimit = ctx.config.query.maxResultLimit;
      if (limit !== undefined && limit > maxLimit) {
        throw new ValidationError('Invalid request body', [`limit: must not exceed ${maxLimit}`]);
      }

      const response = await ctx.root.ask(question, limit !== undefined ? { limit } : {});
      res.json({ success: response.success, data: response });
    })
  );

  /**
   * POST /api/insights/chat
   *
   * Send a message in a chat session; a new session is created when none is given.
   */
  router.post(
    '/chat',
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId, message } = parseRequest(ChatBodySchema, req.body);
      const response = await ctx.root.handle(sessionId, message);
      res.json({ success: response.success, data: response, sessionId: response.sessionId });
    })
  );

  router.post('/chat/session', (_req: Request, res: Response) => {
    const session = ctx.root.createSession();
    res.status(201).json({
      success: true,
      data: { sessionId: session.id, createdAt: session.createdAt },
    });
  });

  router.get('/chat/session/:sessionId', (req: Request<{ sessionId: string }>, res: Response) => {
    const session = ctx.root.getSession(req.params.sessionId);
    if (!session) {
      throw new NotFoundError(`Session not found: ${req.params.sessionId}`);
    }

    res.json({
      success: true,
      data: {
        id: session.id,
        createdAt: session.createdAt,
        updatedAt: session.updatedAt,
        messages: session.messages,
        artifactCount: session.artifacts.length,
      },
    });
  });

  router.get('/chat/session/:sessionId/artifacts', (req: Request<{ sessionId: string }>, res: Response) => {
    res.json({ success: true, data: ctx.root.listArtifacts(req.params.sessionId) });
  });

  router.get(
    '/chat/session/:sessionId/artifacts/:artifactId',
    (req: Request<{ sessionId: string; artifactId: string }>, res: Response) => {
      res.json({ success: true, data: ctx.root.getArtifact(req.params.sessionId, req.params.artifactId) });
    }
  );

  router.get('/datasets', (_req: Request, res: Response) => {
    res.json({ success: true, data: ctx.datasets });
  });

  router.get('/schema', (_req: Request, res: Response) => {
    res.json({ success: true, data: { table: ctx.config.store.table, columns: MINUTES_COLUMNS } });
  });

  /**
   * GET /api/insights/status
   *
   * Whether the chat model is configured and the store is reachable.
   */
  router.get(
    '/status',
    asyncHandler(async (_req: Request, res: Response) => {
      const configured = ctx.chatModel.isConfigured();
      const reachable = await ctx.store.ping();
      const rowCount = reachable ? await ctx.store.count() : null;

      res.json({
        success: true,
        data: {
          status: configured && reachable ? 'available' : configured ? 'degraded' : 'not_configured',
          llm: {
            configured,
            baseUrl: ctx.config.llm.baseUrl,
            models: {
              root: ctx.config.agents.rootModel,
              nl2sql: ctx.config.agents.nl2sqlModel,
              analytics: ctx.config.agents.analyticsModel,
            },
          },
          store: {
            driver: ctx.store.driver,
            table: ctx.config.store.table,
            reachable,
            rowCount,
          },
          sessions: ctx.root.sessionCount,
        },
      });
    })
  );

  router.get('/suggestions', (req: Request, res: Response) => {
    const { intent } = parseRequest(SuggestionsQuerySchema, req.query, 'query string');
    if (intent !== undefined) {
      res.json({ success: true, data: { intent, queries: suggestionsFor(intent) } });
      return;
    }

    res.json({
      success: true,
      data: {
        categories: [
          { name: 'Meetings', queries: suggestionsFor('meeting_lookup') },
          { name: 'Attendance', queries: suggestionsFor('attendance') },
          { name: 'Decisions & Follow-ups', queries: suggestionsFor('follow_up') },
          { name: 'Trends', queries: suggestionsFor('time_series') },
        ],
      },
    });
  });

  return router;
}
