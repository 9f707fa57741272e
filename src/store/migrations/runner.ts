/**
 * Database migration runner.
 * Tracks applied migrations in schema_meta table.
 *
 * @module src/store/migrations/runner
 */

import type Database from 'better-sqlite3';
import type { MigrationResult, StoreResult } from '../types';
import { err, ok } from '../types';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Migration definition */
export type Migration = {
  /** Version number (must be unique and sequential) */
  version: number;
  /** Human-readable name */
  name: string;
  /** Apply migration */
  up(db: Database.Database): void;
  /** Rollback migration (optional) */
  down?(db: Database.Database): void;
};

// ─────────────────────────────────────────────────────────────────────────────
// Schema Meta Queries
// ─────────────────────────────────────────────────────────────────────────────

const BOOTSTRAP_META_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL DEFAULT (datetime('now'))
  )
`;

const GET_META = 'SELECT value FROM schema_meta WHERE key = ?';

const SET_META = `
  INSERT INTO schema_meta (key, value, updated_at)
  VALUES (?, ?, datetime('now'))
  ON CONFLICT(key) DO UPDATE SET
    value = excluded.value,
    updated_at = datetime('now')
`;

// ─────────────────────────────────────────────────────────────────────────────
// Migration Runner
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Get current schema version from database.
 * Returns 0 if no version is set.
 */
export function getSchemaVersion(db: Database.Database): number {
  try {
    const row = db
      .prepare<[string], { value: string }>(GET_META)
      .get('version');
    return row ? Number.parseInt(row.value, 10) : 0;
  } catch {
    // Table doesn't exist yet
    return 0;
  }
}

/**
 * Set metadata value.
 */
function setMeta(
  db: Database.Database,
  key: string,
  value: string
): void {
  db.prepare<[string, string]>(SET_META).run(key, value);
}

/**
 * Run pending migrations.
 *
 * @param db - Open database connection
 * @param migrations - Array of migrations to apply
 * @returns Migration result with applied versions
 */
export function runMigrations(
  db: Database.Database,
  migrations: Migration[]
): StoreResult<MigrationResult> {
  try {
    // Bootstrap schema_meta table
    db.exec(BOOTSTRAP_META_TABLE);

    const currentVersion = getSchemaVersion(db);

    // Sort migrations by version
    const sorted = [...migrations].sort((a, b) => a.version - b.version);

    // Validate sequential versions
    for (let i = 0; i < sorted.length; i++) {
      const migration = sorted[i];
      if (migration && migration.version !== i + 1) {
        return err(
          'SCHEMA_ERROR',
          `Migration versions must be sequential. Expected ${i + 1}, got ${migration.version}`
        );
      }
    }

    const latest = sorted.at(-1)?.version ?? 0;
    if (currentVersion > latest) {
      return err(
        'SCHEMA_ERROR',
        `Catalog schema version ${currentVersion} is newer than this build supports (${latest})`
      );
    }

    // Filter pending migrations
    const pending = sorted.filter((m) => m.version > currentVersion);

    if (pending.length === 0) {
      return ok({ applied: [], currentVersion });
    }

    // Apply migrations in a transaction
    const applied: number[] = [];
    const transaction = db.transaction(() => {
      for (const migration of pending) {
        migration.up(db);
        setMeta(db, 'version', migration.version.toString());
        applied.push(migration.version);
      }

      if (currentVersion === 0) {
        setMeta(db, 'created_at', new Date().toISOString());
      }
    });

    transaction();

    return ok({
      applied,
      currentVersion: pending.at(-1)?.version ?? currentVersion,
    });
  } catch (cause) {
    const message =
      cause instanceof Error ? cause.message : 'Unknown migration error';
    return err('SCHEMA_ERROR', `Migration failed: ${message}`, cause);
  }
}
