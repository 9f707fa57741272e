/**
 * Schema verification.
 * Migrations only run once per version, so a catalog file that was edited
 * by hand or created by another tool is checked against the expected shape
 * on every open.
 *
 * @module src/store/sqlite/schema
 */

import type Database from 'better-sqlite3';
import type { StoreResult } from '../types';
import { err, ok } from '../types';

/** Columns every catalog table must have */
export const EXPECTED_COLUMNS: Readonly<Record<string, readonly string[]>> = {
  files: ['id', 'filename', 'path', 'hash', 'size', 'modified_at'],
  taxonomies: ['id', 'name'],
  tags: ['id', 'taxonomy_id', 'name'],
  file_tags: ['file_id', 'tag_id'],
};

/**
 * Check that every expected table and column exists.
 */
export function verifySchema(db: Database.Database): StoreResult<void> {
  for (const [table, columns] of Object.entries(EXPECTED_COLUMNS)) {
    const present = new Set(
      db
        .prepare<[string], { name: string }>(
          'SELECT name FROM pragma_table_info(?)'
        )
        .all(table)
        .map((c) => c.name)
    );

    if (present.size === 0) {
      return err('SCHEMA_ERROR', `Catalog schema is missing table "${table}"`);
    }

    const missing = columns.filter((c) => !present.has(c));
    if (missing.length > 0) {
      return err(
        'SCHEMA_ERROR',
        `Catalog table "${table}" is missing columns: ${missing.join(', ')}`
      );
    }
  }
  return ok(undefined);
}
