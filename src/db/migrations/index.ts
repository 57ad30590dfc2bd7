/**
 * bpfledger — Database migration registry
 *
 * Manages versioned migrations using SQLite's PRAGMA user_version.
 * Each migration has a version number and an up() function.
 */

import type Database from 'better-sqlite3';
import type { Logger } from '../../logger.js';
import { silentLogger } from '../../logger.js';
import v1 from './v1.js';

export interface Migration {
  version: number;
  description: string;
  up(db: Database.Database): void;
}

/** All migrations in order. Must be sorted by version ascending. */
const migrations: Migration[] = [v1];

/** The latest schema version (after all migrations applied). */
export const LATEST_VERSION: number =
  migrations.length > 0 ? migrations[migrations.length - 1].version : 0;

/**
 * Get the current schema version from the database.
 */
export function getSchemaVersion(db: Database.Database): number {
  const row = db.prepare<[], { user_version: number }>('PRAGMA user_version').get();
  return row?.user_version ?? 0;
}

/**
 * Set the schema version in the database.
 */
export function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${version}`);
}

/**
 * Run all pending migrations from currentVersion to LATEST_VERSION.
 * Each migration runs inside a transaction together with its version bump.
 * Returns the migrations that were applied.
 */
export function runMigrations(
  db: Database.Database,
  currentVersion: number,
  logger: Logger = silentLogger,
): Migration[] {
  const applied: Migration[] = [];
  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      const runMigration = db.transaction(() => {
        migration.up(db);
        setSchemaVersion(db, migration.version);
      });
      runMigration();
      logger.info(
        { version: migration.version, description: migration.description },
        'applied migration',
      );
      applied.push(migration);
    }
  }
  return applied;
}
