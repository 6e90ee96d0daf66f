/**
 * Minutes Insights - Question answering over meeting minutes
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { getConfigLoader, loadConfig } from './config/index.js';
import { loadDatasets } from './minutes/datasets.js';
import { InsightsServer, createInsightsServer } from './server/index.js';
import { createMinutesStore } from './storage/index.js';
import logger, { configureLogger, logLifecycle } from './utils/logger.js';
import type { InsightsConfig } from './utils/types.js';

// =============================================================================
// Global State
// =============================================================================

let insightsServer: InsightsServer | null = null;
let isShuttingDown = false;

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'Minutes Insights starting up...');

  try {
    const config: InsightsConfig = await loadConfig();
    configureLogger(config.logging);

    logLifecycle('startup', 'Configuration loaded', {
      port: config.server.port,
      host: config.server.host,
      environment: config.server.nodeEnv,
      store: config.store.driver,
      table: config.store.table,
    });

    const store = await createMinutesStore(config);
    const rows = await store.count();
    logLifecycle('startup', 'Minutes store ready', { driver: store.driver, rows });

    const datasets = await loadDatasets(config.datasets.file, config.store.table);

    insightsServer = createInsightsServer({ config, store, datasets });
    if (!insightsServer.getContext().chatModel.isConfigured()) {
      logger.warn('LLM_API_KEY is not set; questions will be answered with the not-configured response');
    }

    if (config.hotReload) {
      insightsServer.enableHotReload(getConfigLoader());
    }

    await insightsServer.start();

    printBanner(config);
  } catch (error) {
    logLifecycle('error', 'Failed to start Minutes Insights', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  }
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    if (insightsServer !== null) {
      await insightsServer.shutdown(signal);
    }

    clearTimeout(shutdownTimeout);
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception', {
    error: error.message,
    stack: error.stack,
  });
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

// =============================================================================
// Startup Banner
// =============================================================================

function printBanner(config: InsightsConfig): void {
  const base = `http://${config.server.host}:${config.server.port}`;
  const banner = `
  Minutes Insights
  ----------------
  API:     ${base}/api/insights
  Status:  ${base}/api/insights/status
  Health:  ${base}/health
  Store:   ${config.store.driver} (${config.store.table})
`;

  // eslint-disable-next-line no-console
  console.log(banner);
}

// =============================================================================
// Start Application
// =============================================================================

bootstrap().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Fatal error during bootstrap:', error);
  process.exit(1);
});
