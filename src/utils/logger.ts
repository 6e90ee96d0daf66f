import winston from 'winston';

import type { LoggingConfig } from './types.js';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Custom log format for development (human-readable)
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    // Winston attaches Symbol-keyed internals
    const cleanMetadata: Record<string, unknown> = {};
    for (const key of Object.keys(metadata)) {
      if (!key.startsWith('Symbol')) {
        cleanMetadata[key] = metadata[key];
      }
    }
    if (Object.keys(cleanMetadata).length > 0) {
      msg += ` ${JSON.stringify(cleanMetadata)}`;
    }
  }

  return msg;
});

// Determine log level from environment
const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  if (process.env['NODE_ENV'] === 'test') {
    return 'error';
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

const buildFormat = (format: LoggingConfig['format']): winston.Logform.Format => {
  if (format === 'json') {
    return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  return combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    errors({ stack: true }),
    devFormat
  );
};

// Determine log format from environment
const getLogFormat = (): LoggingConfig['format'] => {
  const format = process.env['LOG_FORMAT'];
  const isDev = process.env['NODE_ENV'] !== 'production';
  return format === 'json' || !isDev ? 'json' : 'pretty';
};

const buildTransports = (fileEnabled: boolean, logFilePath: string): winston.transport[] => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (fileEnabled) {
    transports.push(
      new winston.transports.File({
        filename: logFilePath,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
      })
    );

    transports.push(
      new winston.transports.File({
        filename: logFilePath.replace('.log', '.error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024,
        maxFiles: 5,
        tailable: true,
      })
    );
  }

  return transports;
};

const logger = winston.createLogger({
  level: getLogLevel(),
  format: buildFormat(getLogFormat()),
  transports: buildTransports(
    process.env['LOG_FILE_ENABLED'] === 'true',
    process.env['LOG_FILE_PATH'] ?? './logs/insights.log'
  ),
  exitOnError: false,
});

/**
 * Apply the loaded logging configuration
 */
export const configureLogger = (config: LoggingConfig): void => {
  logger.configure({
    level: config.level,
    format: buildFormat(config.format),
    transports: buildTransports(config.fileEnabled, config.filePath),
    exitOnError: false,
  });
};

// Request logger for HTTP requests
export interface RequestLogData {
  requestId: string;
  method: string;
  path: string;
  statusCode?: number;
  responseTimeMs?: number;
  ipAddress?: string;
  userAgent?: string;
  error?: string;
}

export const logRequest = (data: RequestLogData): void => {
  const level = data.statusCode
    ? data.statusCode >= 500
      ? 'error'
      : data.statusCode >= 400
        ? 'warn'
        : 'info'
    : 'info';

  logger.log(level, `${data.method} ${data.path}`, {
    type: 'request',
    ...data,
  });
};

// Agent event logger
export interface AgentLogData {
  agent: 'root' | 'router' | 'nl2sql' | 'analytics';
  event: string;
  sessionId?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export const logAgent = (data: AgentLogData): void => {
  const level = data.event.endsWith('_failed') ? 'warn' : 'debug';

  logger.log(level, `Agent ${data.agent}: ${data.event}`, {
    type: 'agent',
    ...data,
  });
};

// Config logger
export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

// Startup/shutdown logger
export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

export const createChildLogger = (context: Record<string, unknown>): winston.Logger => {
  return logger.child(context);
};

export default logger;
