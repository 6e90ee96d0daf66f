/**
 * Minutes Insights - Storage Module
 *
 * Barrel export file for the database client and minutes stores
 */

export { PostgresClient, initializePostgres } from './postgres.js';
export type { DatabaseClient, SqlExecutor, TransactionOptions } from './postgres.js';

export {
  PostgresMinutesStore,
  InMemoryMinutesStore,
  createMinutesStore,
} from './minutes-store.js';
export type { MinutesStore, StoreQueryResult } from './minutes-store.js';

export { runMigrations, rollbackMigration, migrationStatus, MIGRATIONS } from './migrations/run.js';
export type { Migration, AppliedMigration } from './migrations/run.js';
