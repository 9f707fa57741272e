/**
 * Migration: Initial catalog schema.
 *
 * files      - one row per observed (path, filename); hash is not unique
 * taxonomies - classification namespaces
 * tags       - values within a taxonomy
 * file_tags  - many-to-many link between files and tags
 *
 * The "tags" taxonomy row is seeded by the adapter on every open, not here,
 * so a catalog whose row was removed gets it back.
 *
 * @module src/store/migrations/001-initial
 */

import type Database from 'better-sqlite3';
import type { Migration } from './runner';

export const migration: Migration = {
  version: 1,
  name: 'initial',

  up(db: Database.Database): void {
    // path is the directory relative to the catalog root ("." for the root)
    db.exec(`
      CREATE TABLE files (
        id INTEGER PRIMARY KEY,
        filename TEXT NOT NULL,
        path TEXT NOT NULL,
        hash TEXT NOT NULL,
        size INTEGER NOT NULL CHECK (size >= 0),
        modified_at TEXT NOT NULL,
        UNIQUE (path, filename)
      )
    `);

    // Reconciliation looks files up by content
    db.exec('CREATE INDEX idx_files_hash ON files(hash)');

    db.exec(`
      CREATE TABLE taxonomies (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL UNIQUE
      )
    `);

    // Tag values compare case-insensitively within a taxonomy
    db.exec(`
      CREATE TABLE tags (
        id INTEGER PRIMARY KEY,
        taxonomy_id INTEGER NOT NULL REFERENCES taxonomies(id),
        name TEXT NOT NULL COLLATE NOCASE,
        UNIQUE (taxonomy_id, name)
      )
    `);

    db.exec(`
      CREATE TABLE file_tags (
        file_id INTEGER NOT NULL REFERENCES files(id),
        tag_id INTEGER NOT NULL REFERENCES tags(id),
        PRIMARY KEY (file_id, tag_id)
      )
    `);

    // Index for tag-based queries (e.g., "find all files with tag X")
    db.exec('CREATE INDEX idx_file_tags_tag ON file_tags(tag_id)');
  },

  down(db: Database.Database): void {
    db.exec('DROP INDEX IF EXISTS idx_file_tags_tag');
    db.exec('DROP TABLE IF EXISTS file_tags');
    db.exec('DROP TABLE IF EXISTS tags');
    db.exec('DROP TABLE IF EXISTS taxonomies');
    db.exec('DROP INDEX IF EXISTS idx_files_hash');
    db.exec('DROP TABLE IF EXISTS files');
  },
};
