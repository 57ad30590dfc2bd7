import type Database from 'better-sqlite3';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { getSchemaVersion, runMigrations, LATEST_VERSION } from './migrations/index.js';

/**
 * Migrate the database to the latest schema version.
 *
 * - Enables foreign key enforcement for this connection (cascades depend on it).
 * - New database (user_version = 0): applies every migration.
 * - Partially migrated: applies the remaining migrations.
 * - Already up-to-date (user_version >= LATEST_VERSION): no-op.
 */
export function migrateDatabase(db: Database.Database, logger: Logger = silentLogger): void {
  db.pragma('foreign_keys = ON');

  const currentVersion = getSchemaVersion(db);

  if (currentVersion >= LATEST_VERSION) {
    logger.debug({ version: currentVersion }, 'schema up to date');
    return;
  }

  runMigrations(db, currentVersion, logger);
}
