/**
 * Minutes Insights - Server Middleware
 *
 * Barrel export file for all HTTP middleware
 */

export * from './errorHandler.js';
export * from './requestId.js';
export * from './requestLogger.js';
