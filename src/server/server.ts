/**
 * Minutes Insights - HTTP Server
 * Express application hosting the insights API
 */

import http from 'http';

import compression from 'compression';
import cors from 'cors';
import express, { type Application } from 'express';
import helmet from 'helmet';

import { buildAgentDeps, createRootAgent, rootAgentConfig } from '../agents/index.js';
import { ROUTE_PREFIXES, createHealthRouter, createInsightsRouter, type ApiContext } from '../api/index.js';
import type { ConfigLoader } from '../config/index.js';
import { OpenAIChatModel, type ChatModel } from '../llm/index.js';
import { loadDatasets, type DatasetDescriptor } from '../minutes/datasets.js';
import type { MinutesStore } from '../storage/index.js';
import logger, { logLifecycle } from '../utils/logger.js';
import type { InsightsConfig } from '../utils/types.js';

import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';

// =============================================================================
// Types
// =============================================================================

export interface InsightsServerOptions {
  config: InsightsConfig;
  store: MinutesStore;
  datasets: DatasetDescriptor[];
  /** Defaults to an OpenAI-compatible client built from `config.llm` */
  chatModel?: ChatModel;
  /** Builds the chat model again when `llm.*` settings change */
  chatModelFactory?: (config: InsightsConfig) => ChatModel;
}

/** Fields that only take effect after a restart */
const RESTART_PREFIXES = ['server.', 'postgres.', 'store.', 'logging.'];

const defaultChatModelFactory = (config: InsightsConfig): ChatModel => new OpenAIChatModel(config.llm);

// =============================================================================
// Server Class
// =============================================================================

export class InsightsServer {
  private app: Application;
  private server: http.Server | null = null;
  private context: ApiContext;
  private chatModelFactory: (config: InsightsConfig) => ChatModel;
  private configLoader: ConfigLoader | null = null;
  private isShuttingDown = false;

  constructor(options: InsightsServerOptions) {
    this.app = express();
    this.chatModelFactory = options.chatModelFactory ?? defaultChatModelFactory;

    const chatModel = options.chatModel ?? this.chatModelFactory(options.config);
    this.context = {
      config: options.config,
      store: options.store,
      chatModel,
      datasets: options.datasets,
      root: createRootAgent({
        config: options.config,
        chatModel,
        store: options.store,
        datasets: options.datasets,
      }),
      startedAt: new Date(),
    };

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(compression());
    this.app.use(requestIdMiddleware());
    this.app.use(requestLogger({ skipPaths: ['/health', '/healthz'] }));
    this.app.use(express.json({ limit: '100kb' }));
    this.app.set('trust proxy', true);
  }

  /**
   * Set up Express routes
   */
  private setupRoutes(): void {
    this.app.use(createHealthRouter(this.context));
    this.app.use(ROUTE_PREFIXES.insights, createInsightsRouter(this.context));

    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  // ===========================================================================
  // Configuration Reload
  // ===========================================================================

  /**
   * Rebuild the agents from a new configuration
   *
   * Sessions survive; store and listener settings need a restart.
   */
  public async applyConfig(newConfig: InsightsConfig, changedFields: string[]): Promise<void> {
    const needsRestart = changedFields.filter((f) => RESTART_PREFIXES.some((p) => f.startsWith(p)));
    if (needsRestart.length > 0) {
      logger.warn('Some configuration changes take effect after a restart', { fields: needsRestart });
    }

    if (changedFields.some((f) => f.startsWith('llm.'))) {
      this.context.chatModel = this.chatModelFactory(newConfig);
    }
    if (changedFields.includes('datasets.file')) {
      this.context.datasets = await loadDatasets(newConfig.datasets.file, this.context.config.store.table);
    }

    // store settings stay pinned to the running store
    const effective: InsightsConfig = {
      ...newConfig,
      store: this.context.config.store,
      postgres: this.context.config.postgres,
      server: this.context.config.server,
    };

    this.context.config = effective;
    this.context.root.reconfigure(
      buildAgentDeps({
        config: effective,
        chatModel: this.context.chatModel,
        store: this.context.store,
        datasets: this.context.datasets,
      }),
      rootAgentConfig(effective)
    );

    logLifecycle('startup', 'Configuration reloaded', { changedFields });
  }

  /**
   * Follow config file changes
   */
  public enableHotReload(configLoader: ConfigLoader): void {
    this.configLoader = configLoader;
    configLoader.onConfigChange((_oldConfig, newConfig, changedFields) => {
      this.applyConfig(newConfig, changedFields).catch((error: unknown) => {
        logger.error('Failed to apply reloaded configuration', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    });
    configLoader.startWatching();
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  public async start(): Promise<void> {
    const { port, host } = this.context.config.server;

    await new Promise<void>((resolve, reject) => {
      const server = http.createServer(this.app);
      this.server = server;

      server.on('error', (error) => {
        logLifecycle('error', 'Server error', { error: error.message });
        reject(error);
      });

      server.listen(port, host, () => {
        const address = server.address();
        const bound = address !== null && typeof address === 'object' ? address : null;

        logLifecycle('ready', `Minutes Insights listening on ${bound?.address ?? host}:${bound?.port ?? port}`, {
          store: this.context.store.driver,
          llmConfigured: this.context.chatModel.isConfigured(),
          environment: this.context.config.server.nodeEnv,
        });
        resolve();
      });
    });
  }

  /**
   * Stop accepting connections, stop watching config and close the store
   */
  public async shutdown(signal?: string): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }
    this.isShuttingDown = true;

    logLifecycle('shutdown', `Shutting down${signal ? ` (${signal})` : ''}...`);

    const server = this.server;
    if (server !== null) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    }

    if (this.configLoader !== null) {
      await this.configLoader.stopWatching();
    }

    try {
      await this.context.store.close();
    } catch (error) {
      logger.error('Error closing minutes store', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    logLifecycle('shutdown', 'Shutdown complete');
  }

  /**
   * Get the Express application (for testing)
   */
  public getApp(): Application {
    return this.app;
  }

  public getContext(): ApiContext {
    return this.context;
  }
}

export function createInsightsServer(options: InsightsServerOptions): InsightsServer {
  return new InsightsServer(options);
}

export default InsightsServer;
