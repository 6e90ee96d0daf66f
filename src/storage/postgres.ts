/**
 * Minutes Insights - PostgreSQL Database Client
 * Handles database connections, queries, and connection pooling
 */

import pgPromise, { type IDatabase, type IMain } from 'pg-promise';

import logger from '../utils/logger.js';
import { DatabaseError, type PostgresConfig } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface SqlExecutor {
  query<T>(sql: string, params?: unknown[]): Promise<T[]>;
  execute(sql: string, params?: unknown[]): Promise<number>;
}

export interface TransactionOptions {
  /** Run as READ ONLY; PostgreSQL rejects any write inside it */
  readOnly?: boolean;
}

export interface DatabaseClient extends SqlExecutor {
  queryOne<T>(sql: string, params?: unknown[]): Promise<T | null>;
  transaction<T>(callback: (tx: SqlExecutor) => Promise<T>, options?: TransactionOptions): Promise<T>;
  close(): Promise<void>;
  isConnected(): boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// PostgreSQL Client Class
// =============================================================================

export class PostgresClient implements DatabaseClient {
  private pgp: IMain;
  private db: IDatabase<object>;
  private config: PostgresConfig;
  private connected = false;

  constructor(config: PostgresConfig) {
    this.config = config;

    this.pgp = pgPromise({
      capSQL: true,

      query(e) {
        logger.debug('PostgreSQL query', {
          query: e.query.substring(0, 200),
        });
      },

      error(err, e) {
        logger.error('PostgreSQL error', {
          error: describeError(err),
          query: e.query?.substring(0, 200),
        });
      },

      connect(e) {
        logger.debug('PostgreSQL connection established', {
          useCount: e.useCount,
        });
      },

      disconnect() {
        logger.debug('PostgreSQL connection closed');
      },
    });

    this.db = this.pgp({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.poolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
  }

  /**
   * Test database connection
   */
  public async connect(): Promise<void> {
    try {
      const connection = await this.db.connect();
      void connection.done();
      this.connected = true;
      logger.info('PostgreSQL connection pool initialized', {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
    } catch (error) {
      const message = describeError(error);
      logger.error('Failed to connect to PostgreSQL', {
        host: this.config.host,
        port: this.config.port,
        error: message,
      });
      throw new DatabaseError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  /**
   * Execute a query and return all results
   */
  public async query<T>(sql: string, params?: unknown[]): Promise<T[]> {
    try {
      return await this.db.any<T>(sql, params);
    } catch (error) {
      throw new DatabaseError(`Query failed: ${describeError(error)}`);
    }
  }

  /**
   * Execute a query and return a single result or null
   */
  public async queryOne<T>(sql: string, params?: unknown[]): Promise<T | null> {
    try {
      return await this.db.oneOrNone<T>(sql, params);
    } catch (error) {
      throw new DatabaseError(`Query failed: ${describeError(error)}`);
    }
  }

  /**
   * Execute a statement that returns no data; resolves to the affected row count
   */
  public async execute(sql: string, params?: unknown[]): Promise<number> {
    try {
      const result = await this.db.result(sql, params);
      return result.rowCount;
    } catch (error) {
      throw new DatabaseError(`Execute failed: ${describeError(error)}`);
    }
  }

  /**
   * Execute multiple statements in a transaction
   */
  public async transaction<T>(
    callback: (tx: SqlExecutor) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    const mode = new this.pgp.txMode.TransactionMode({ readOnly: options.readOnly ?? false });
    try {
      return await this.db.tx({ mode }, (t) =>
        callback({
          query: <R>(sql: string, params?: unknown[]) => t.any<R>(sql, params),
          execute: async (sql: string, params?: unknown[]) => (await t.result(sql, params)).rowCount,
        })
      );
    } catch (error) {
      throw new DatabaseError(`Transaction failed: ${describeError(error)}`);
    }
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Close all connections
   */
  public async close(): Promise<void> {
    await this.db.$pool.end();
    this.connected = false;
    logger.info('PostgreSQL connection pool closed');
  }
}

// =============================================================================
// Initialization
// =============================================================================

export async function initializePostgres(config: PostgresConfig): Promise<PostgresClient> {
  const client = new PostgresClient(config);
  await client.connect();
  return client;
}

export default PostgresClient;
