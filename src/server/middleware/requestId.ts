/**
 * Minutes Insights - Request ID Middleware
 * Assigns a unique identifier to each incoming request for tracing
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Reuse the caller's X-Request-ID when present, otherwise generate one.
 * The ID is echoed in the response headers and included in error bodies.
 */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const existingId = req.headers[REQUEST_ID_HEADER];
    const candidate = Array.isArray(existingId) ? existingId[0] : existingId;
    const requestId =
      typeof candidate === 'string' && candidate.length > 0 && candidate.length <= MAX_REQUEST_ID_LENGTH
        ? candidate
        : uuidv4();

    req.requestId = requestId;
    req.startTime = Date.now();
    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);

    next();
  };
}

export default requestIdMiddleware;
