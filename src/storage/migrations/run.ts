/**
 * Minutes Insights - Database Migration Runner
 * Applies the bundled migrations to PostgreSQL and records them in schema_migrations
 */

import 'dotenv/config';

import { loadConfig } from '../../config/loader.js';
import logger from '../../utils/logger.js';
import { initializePostgres, type DatabaseClient } from '../postgres.js';
import * as minutesSchema from './001-minutes-schema.js';

// =============================================================================
// Migration Registry
// =============================================================================

export interface Migration {
  name: string;
  up: (table: string) => string;
  down: (table: string) => string;
}

export const MIGRATIONS: readonly Migration[] = [
  { name: minutesSchema.migrationName, up: minutesSchema.up, down: minutesSchema.down },
];

export interface AppliedMigration {
  name: string;
  applied_at: Date;
}

const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id SERIAL PRIMARY KEY,
    name VARCHAR(255) NOT NULL UNIQUE,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
`;

// =============================================================================
// Migration Runner
// =============================================================================

/**
 * Apply every pending migration; resolves to the names applied in this run
 */
export async function runMigrations(
  db: DatabaseClient,
  table: string,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<string[]> {
  await db.execute(CREATE_MIGRATIONS_TABLE);

  const applied = await db.query<AppliedMigration>('SELECT name FROM schema_migrations ORDER BY id');
  const appliedNames = new Set(applied.map((m) => m.name));
  const ran: string[] = [];

  for (const migration of migrations) {
    if (appliedNames.has(migration.name)) {
      logger.debug('Skipping migration (already applied)', { migration: migration.name });
      continue;
    }

    logger.info('Running migration', { migration: migration.name });

    await db.transaction(async (tx) => {
      await tx.execute(migration.up(table));
      await tx.execute('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name]);
    });

    ran.push(migration.name);
  }

  logger.info(ran.length === 0 ? 'Database is up to date' : 'Migrations applied', {
    applied: ran,
  });

  return ran;
}

/**
 * Revert the most recently applied migration; resolves to its name, or null
 */
export async function rollbackMigration(
  db: DatabaseClient,
  table: string,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<string | null> {
  const last = await db.queryOne<AppliedMigration>(
    'SELECT name, applied_at FROM schema_migrations ORDER BY id DESC LIMIT 1'
  );
  if (last === null) {
    return null;
  }

  const migration = migrations.find((m) => m.name === last.name);
  if (migration === undefined) {
    throw new Error(`Unknown migration recorded in schema_migrations: ${last.name}`);
  }

  await db.transaction(async (tx) => {
    await tx.execute(migration.down(table));
    await tx.execute('DELETE FROM schema_migrations WHERE name = $1', [migration.name]);
  });

  logger.info('Migration rolled back', { migration: migration.name });
  return migration.name;
}

export async function migrationStatus(db: DatabaseClient): Promise<AppliedMigration[]> {
  await db.execute(CREATE_MIGRATIONS_TABLE);
  return db.query<AppliedMigration>('SELECT name, applied_at FROM schema_migrations ORDER BY id');
}

// =============================================================================
// CLI Entry Point
// =============================================================================

async function main(): Promise<void> {
  const command = process.argv[2] ?? 'run';
  const config = await loadConfig();
  const db = await initializePostgres(config.postgres);

  try {
    switch (command) {
      case 'run':
        await runMigrations(db, config.store.table);
        break;

      case 'status': {
        const applied = await migrationStatus(db);
        console.log('\nApplied migrations:');
        if (applied.length === 0) {
          console.log('  (none)');
        }
        for (const m of applied) {
          console.log(`  ${m.name} (${m.applied_at.toISOString()})`);
        }
        const pending = MIGRATIONS.filter((m) => !applied.some((a) => a.name === m.name));
        console.log(`\nPending: ${pending.length === 0 ? '(none)' : pending.map((m) => m.name).join(', ')}\n`);
        break;
      }

      case 'rollback': {
        const name = await rollbackMigration(db, config.store.table);
        console.log(name === null ? 'Nothing to roll back' : `Rolled back ${name}`);
        break;
      }

      default:
        console.log('Minutes Insights Database Migration Tool\n');
        console.log('Usage:');
        console.log('  npm run db:migrate            Run pending migrations');
        console.log('  npm run db:migrate status     Show migration status');
        console.log('  npm run db:migrate rollback   Revert the last migration');
        break;
    }
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Migration failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
