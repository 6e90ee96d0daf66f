/**
 * Minutes Insights - Request Logging Middleware
 * Logs each request once its response has been sent
 */

import type { Request, Response, NextFunction } from 'express';

import { getClientIp } from '../../utils/helpers.js';
import { logRequest, type RequestLogData } from '../../utils/logger.js';

export interface RequestLoggerOptions {
  /** Skip logging for certain paths (e.g., health checks) */
  skipPaths?: string[];
  /** Skip logging for certain methods */
  skipMethods?: string[];
}

export function requestLogger(
  options: RequestLoggerOptions = {}
): (req: Request, res: Response, next: NextFunction) => void {
  const { skipPaths = ['/health'], skipMethods = ['OPTIONS'] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.some((path) => req.path.startsWith(path)) || skipMethods.includes(req.method)) {
      next();
      return;
    }

    const startTime = req.startTime ?? Date.now();

    res.on('finish', () => {
      const logData: RequestLogData = {
        requestId: req.requestId ?? 'unknown',
        method: req.method,
        path: req.originalUrl.split('?')[0] ?? req.path,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - startTime,
        ipAddress: getClientIp(req.headers),
      };

      const userAgent = req.headers['user-agent'];
      if (userAgent) {
        logData.userAgent = userAgent;
      }

      logRequest(logData);
    });

    next();
  };
}

export default requestLogger;
