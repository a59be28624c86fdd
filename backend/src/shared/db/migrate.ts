/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in dev and at deploy time.
 *
 * HOW TO USE:
 * - npm run db:migrate --workspace backend
 */

import { Migrator, type MigrationProvider } from 'kysely';
import { createDb } from './db';
import { migrations } from './migrations';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

const provider: MigrationProvider = {
  getMigrations() {
    return Promise.resolve(migrations);
  },
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('migrate.start', { count: Object.keys(migrations).length });

  const migrator = new Migrator({ db, provider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migrate.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migrate.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('migrate.failed', { err: error });
    process.exit(1);
  }

  logger.info('migrate.done');
}

void runMigrations().catch((err: unknown) => {
  logger.error('migrate.fatal', { err });
  process.exit(1);
});
