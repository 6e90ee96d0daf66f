/**
 * Minutes Insights - Minutes Store
 *
 * Execution target for validated queries. The PostgreSQL store hands the
 * SQL to the database; the in-memory store evaluates it over records
 * loaded from a JSON file.
 */

import fs from 'fs';

import { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import { MINUTES_COLUMN_NAMES, MinutesRecordSchema, type MinutesRecord } from '../minutes/schema.js';
import { SqlSemanticError, executeQuery, parseQuery, type Row } from '../query-engine/index.js';
import logger from '../utils/logger.js';
import { ConfigurationError, type InsightsConfig, type StoreDriver } from '../utils/types.js';
import { initializePostgres, type DatabaseClient } from './postgres.js';

// =============================================================================
// Types
// =============================================================================

export interface StoreQueryResult {
  rows: Row[];
  executionTimeMs: number;
}

export interface MinutesStore {
  readonly driver: StoreDriver;
  execute(sql: string, params?: unknown[]): Promise<StoreQueryResult>;
  count(): Promise<number>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

// =============================================================================
// PostgreSQL Store
// =============================================================================

export class PostgresMinutesStore implements MinutesStore {
  public readonly driver = 'postgres' as const;

  constructor(
    private readonly db: DatabaseClient,
    private readonly table: string
  ) {}

  /**
   * Run a validated query inside a READ ONLY transaction
   */
  async execute(sql: string, params: unknown[] = []): Promise<StoreQueryResult> {
    const startTime = Date.now();
    const rows = await this.db.transaction((tx) => tx.query<Row>(sql, params), { readOnly: true });
    return { rows, executionTimeMs: Date.now() - startTime };
  }

  async count(): Promise<number> {
    const result = await this.db.queryOne<{ count: string | number }>(
      `SELECT COUNT(*) AS count FROM ${this.table}`
    );
    return result === null ? 0 : Number(result.count);
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.query('SELECT 1');
      return true;
    } catch (error) {
      logger.warn('Minutes store ping failed', {
        driver: this.driver,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}

// =============================================================================
// In-Memory Store
// =============================================================================

const MinutesFileSchema = z.array(MinutesRecordSchema);

export class InMemoryMinutesStore implements MinutesStore {
  public readonly driver = 'memory' as const;
  private readonly records: MinutesRecord[];

  constructor(
    records: MinutesRecord[],
    private readonly table: string
  ) {
    this.records = records;
  }

  /**
   * Load and validate records from a JSON array file
   */
  static async fromFile(filePath: string, table: string): Promise<InMemoryMinutesStore> {
    if (!fs.existsSync(filePath)) {
      throw new ConfigurationError(`Minutes data file not found: ${filePath}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Minutes data file ${filePath} is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    const parsed = MinutesFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid minutes data file ${filePath}: ${formatValidationErrors(parsed.error).join('; ')}`
      );
    }

    logger.info('Minutes loaded into memory', { path: filePath, records: parsed.data.length });
    return new InMemoryMinutesStore(parsed.data, table);
  }

  async execute(sql: string, params: unknown[] = []): Promise<StoreQueryResult> {
    const startTime = Date.now();
    const query = parseQuery(sql);
    if (query.from !== this.table) {
      throw new SqlSemanticError(`relation "${query.from}" does not exist`);
    }

    const output = executeQuery(query, this.records, params, MINUTES_COLUMN_NAMES);
    return { rows: output.rows, executionTimeMs: Date.now() - startTime };
  }

  async count(): Promise<number> {
    return this.records.length;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

// =============================================================================
// Factory
// =============================================================================

export async function createMinutesStore(config: InsightsConfig): Promise<MinutesStore> {
  if (config.store.driver === 'postgres') {
    const client = await initializePostgres(config.postgres);
    return new PostgresMinutesStore(client, config.store.table);
  }
  return InMemoryMinutesStore.fromFile(config.store.dataFile, config.store.table);
}
