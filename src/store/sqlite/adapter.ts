/**
 * SQLite implementation of StorePort.
 * Uses better-sqlite3 for database operations.
 *
 * Note: better-sqlite3 is synchronous but we use async for interface consistency.
 *
 * @module src/store/sqlite/adapter
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { DEFAULT_TAXONOMY } from '../../app/constants';
import { joinCatalogPath, splitCatalogPath } from '../../core/catalog-path';
import { getSchemaVersion, migrations, runMigrations } from '../migrations';
import type {
  CatalogStatus,
  FileInput,
  FileRecordRow,
  FileTagRow,
  MigrationResult,
  StorePort,
  StoreResult,
  TagUsageRow,
  TaxonomyRow,
} from '../types';
import { StoreOperationError, err, ok } from '../types';
import { verifySchema } from './schema';

// ─────────────────────────────────────────────────────────────────────────────
// Error Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** SQLite extended result code (e.g. SQLITE_CONSTRAINT_UNIQUE), if any */
function sqliteCode(cause: unknown): string | undefined {
  if (cause instanceof Error && 'code' in cause) {
    return typeof cause.code === 'string' ? cause.code : undefined;
  }
  return undefined;
}

function messageOf(cause: unknown, fallback: string): string {
  return cause instanceof Error ? cause.message : fallback;
}

// ─────────────────────────────────────────────────────────────────────────────
// SQLite Adapter Implementation
// ─────────────────────────────────────────────────────────────────────────────

export class SqliteAdapter implements StorePort {
  private db: Database.Database | null = null;
  private dbPath = '';
  private savepointDepth = 0;

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  async open(dbPath: string): Promise<StoreResult<MigrationResult>> {
    if (this.db && this.dbPath === dbPath) {
      return ok({ applied: [], currentVersion: getSchemaVersion(this.db) });
    }
    await this.close();

    let db: Database.Database;
    try {
      mkdirSync(dirname(dbPath), { recursive: true });
      db = new Database(dbPath);
    } catch (cause) {
      return err(
        'CONNECTION_FAILED',
        messageOf(cause, 'Failed to open database'),
        cause
      );
    }

    try {
      // Enable pragmas for performance and safety
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      db.pragma('busy_timeout = 5000');

      const result = runMigrations(db, migrations);
      if (!result.ok) {
        db.close();
        return result;
      }

      const schema = verifySchema(db);
      if (!schema.ok) {
        db.close();
        return err(schema.error.code, schema.error.message);
      }

      db.prepare('INSERT OR IGNORE INTO taxonomies (name) VALUES (?)').run(
        DEFAULT_TAXONOMY
      );

      this.db = db;
      this.dbPath = dbPath;
      return result;
    } catch (cause) {
      db.close();
      if (sqliteCode(cause) === 'SQLITE_NOTADB') {
        return err('SCHEMA_ERROR', `${dbPath} is not a catalog database`, cause);
      }
      return err(
        'CONNECTION_FAILED',
        messageOf(cause, 'Failed to open database'),
        cause
      );
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.dbPath = '';
      this.savepointDepth = 0;
    }
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  private ensureOpen(): Database.Database {
    if (!this.db) {
      throw new Error('Database not open');
    }
    return this.db;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Transactions
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Run fn inside BEGIN IMMEDIATE / COMMIT. A nested call becomes a
   * savepoint of the outer transaction.
   */
  async withTransaction<T>(fn: () => Promise<T>): Promise<StoreResult<T>> {
    let db: Database.Database;
    let savepoint: string | null = null;
    try {
      db = this.ensureOpen();
      if (db.inTransaction) {
        this.savepointDepth += 1;
        savepoint = `sp_${this.savepointDepth}`;
        db.exec(`SAVEPOINT ${savepoint}`);
      } else {
        db.exec('BEGIN IMMEDIATE');
      }
    } catch (cause) {
      return err(
        'TRANSACTION_FAILED',
        messageOf(cause, 'Failed to begin transaction'),
        cause
      );
    }

    try {
      const value = await fn();
      db.exec(savepoint ? `RELEASE ${savepoint}` : 'COMMIT');
      return ok(value);
    } catch (cause) {
      if (db.inTransaction) {
        db.exec(
          savepoint
            ? `ROLLBACK TO ${savepoint}; RELEASE ${savepoint}`
            : 'ROLLBACK'
        );
      }
      if (cause instanceof StoreOperationError) {
        return { ok: false, error: cause.storeError };
      }
      return err(
        'TRANSACTION_FAILED',
        messageOf(cause, 'Transaction failed'),
        cause
      );
    } finally {
      if (savepoint) {
        this.savepointDepth -= 1;
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Files
  // ─────────────────────────────────────────────────────────────────────────

  async registerFile(file: FileInput): Promise<StoreResult<FileRecordRow>> {
    try {
      const db = this.ensureOpen();
      const row = db
        .prepare<[string, string, string, number, string], DbFileRow>(`
          INSERT INTO files (filename, path, hash, size, modified_at)
          VALUES (?, ?, ?, ?, ?)
          ON CONFLICT(path, filename) DO UPDATE SET
            hash = excluded.hash,
            size = excluded.size,
            modified_at = excluded.modified_at
          RETURNING id, filename, path, hash, size, modified_at
        `)
        .get(
          file.filename,
          file.directory,
          file.contentHash,
          file.sizeBytes,
          file.modifiedAt
        );

      if (!row) {
        return err('QUERY_FAILED', 'Failed to register file');
      }
      return ok(mapFileRow(row));
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to register file'),
        cause
      );
    }
  }

  async getFile(
    directory: string,
    filename: string
  ): Promise<StoreResult<FileRecordRow | null>> {
    try {
      const db = this.ensureOpen();
      const row = db
        .prepare<[string, string], DbFileRow>(
          'SELECT * FROM files WHERE path = ? AND filename = ?'
        )
        .get(directory, filename);
      return ok(row ? mapFileRow(row) : null);
    } catch (cause) {
      return err('QUERY_FAILED', messageOf(cause, 'Failed to get file'), cause);
    }
  }

  async findPathByHash(hash: string): Promise<StoreResult<string | null>> {
    try {
      const db = this.ensureOpen();
      const row = db
        .prepare<[string], DbLocationRow>(
          'SELECT path, filename FROM files WHERE hash = ? ORDER BY id LIMIT 1'
        )
        .get(hash);
      return ok(row ? joinCatalogPath(row.path, row.filename) : null);
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to look up hash'),
        cause
      );
    }
  }

  async listAllPaths(): Promise<StoreResult<string[]>> {
    try {
      const db = this.ensureOpen();
      const rows = db
        .prepare<[], DbLocationRow>(
          'SELECT path, filename FROM files ORDER BY path, filename'
        )
        .all();
      return ok(rows.map((r) => joinCatalogPath(r.path, r.filename)));
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to list paths'),
        cause
      );
    }
  }

  async listFiles(): Promise<StoreResult<FileRecordRow[]>> {
    try {
      const db = this.ensureOpen();
      const rows = db
        .prepare<[], DbFileRow>('SELECT * FROM files ORDER BY path, filename')
        .all();
      return ok(rows.map(mapFileRow));
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to list files'),
        cause
      );
    }
  }

  async resolveFileId(
    directory: string,
    filename: string
  ): Promise<StoreResult<number>> {
    try {
      const db = this.ensureOpen();
      const row = db
        .prepare<[string, string], { id: number }>(
          'SELECT id FROM files WHERE path = ? AND filename = ?'
        )
        .get(directory, filename);
      if (!row) {
        return err(
          'NOT_FOUND',
          `File not in catalog: ${joinCatalogPath(directory, filename)}`
        );
      }
      return ok(row.id);
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to resolve file'),
        cause
      );
    }
  }

  async updateFilePath(
    oldPath: string,
    newPath: string
  ): Promise<StoreResult<boolean>> {
    const from = splitCatalogPath(oldPath);
    const to = splitCatalogPath(newPath);
    try {
      const db = this.ensureOpen();
      const result = db
        .prepare<[string, string, string, string]>(
          'UPDATE files SET path = ?, filename = ? WHERE path = ? AND filename = ?'
        )
        .run(to.directory, to.filename, from.directory, from.filename);
      return ok(result.changes > 0);
    } catch (cause) {
      if (sqliteCode(cause) === 'SQLITE_CONSTRAINT_UNIQUE') {
        return err('DUPLICATE', `Already cataloged: ${newPath}`, cause);
      }
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to update file path'),
        cause
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Taxonomies & Tags
  // ─────────────────────────────────────────────────────────────────────────

  async createTaxonomy(name: string): Promise<StoreResult<TaxonomyRow>> {
    try {
      const db = this.ensureOpen();
      const row = db
        .prepare<[string], TaxonomyRow>(
          'INSERT INTO taxonomies (name) VALUES (?) RETURNING id, name'
        )
        .get(name);
      if (!row) {
        return err('QUERY_FAILED', 'Failed to create taxonomy');
      }
      return ok(row);
    } catch (cause) {
      if (sqliteCode(cause) === 'SQLITE_CONSTRAINT_UNIQUE') {
        return err('DUPLICATE', `Taxonomy already exists: ${name}`, cause);
      }
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to create taxonomy'),
        cause
      );
    }
  }

  async getOrCreateTaxonomy(name: string): Promise<StoreResult<number>> {
    try {
      const db = this.ensureOpen();
      db.prepare<[string]>(
        'INSERT INTO taxonomies (name) VALUES (?) ON CONFLICT(name) DO NOTHING'
      ).run(name);
      const row = db
        .prepare<[string], { id: number }>(
          'SELECT id FROM taxonomies WHERE name = ?'
        )
        .get(name);
      if (!row) {
        return err('QUERY_FAILED', `Failed to create taxonomy: ${name}`);
      }
      return ok(row.id);
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to get or create taxonomy'),
        cause
      );
    }
  }

  async getOrCreateTag(
    taxonomyId: number,
    name: string
  ): Promise<StoreResult<number>> {
    try {
      const db = this.ensureOpen();
      const taxonomy = db
        .prepare<[number], { id: number }>(
          'SELECT id FROM taxonomies WHERE id = ?'
        )
        .get(taxonomyId);
      if (!taxonomy) {
        return err('NOT_FOUND', `Taxonomy id ${taxonomyId} does not exist`);
      }

      // name column is COLLATE NOCASE, so "Rock" and "rock" are one tag
      db.prepare<[number, string]>(
        'INSERT INTO tags (taxonomy_id, name) VALUES (?, ?) ON CONFLICT(taxonomy_id, name) DO NOTHING'
      ).run(taxonomyId, name);
      const row = db
        .prepare<[number, string], { id: number }>(
          'SELECT id FROM tags WHERE taxonomy_id = ? AND name = ?'
        )
        .get(taxonomyId, name);
      if (!row) {
        return err('QUERY_FAILED', `Failed to create tag: ${name}`);
      }
      return ok(row.id);
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to get or create tag'),
        cause
      );
    }
  }

  async associateTag(
    fileId: number,
    tagId: number
  ): Promise<StoreResult<boolean>> {
    try {
      const db = this.ensureOpen();
      const result = db
        .prepare<[number, number]>(
          'INSERT OR IGNORE INTO file_tags (file_id, tag_id) VALUES (?, ?)'
        )
        .run(fileId, tagId);
      return ok(result.changes > 0);
    } catch (cause) {
      if (sqliteCode(cause) === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
        return err(
          'NOT_FOUND',
          `File ${fileId} or tag ${tagId} does not exist`,
          cause
        );
      }
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to associate tag'),
        cause
      );
    }
  }

  async searchByTag(
    taxonomyName: string,
    tagName: string
  ): Promise<StoreResult<string[]>> {
    try {
      const db = this.ensureOpen();
      const rows = db
        .prepare<[string, string], DbLocationRow>(`
          SELECT f.path, f.filename
          FROM files f
          JOIN file_tags ft ON ft.file_id = f.id
          JOIN tags t ON t.id = ft.tag_id
          JOIN taxonomies x ON x.id = t.taxonomy_id
          WHERE x.name = ? AND t.name = ?
          ORDER BY f.path, f.filename
        `)
        .all(taxonomyName, tagName);
      return ok(rows.map((r) => joinCatalogPath(r.path, r.filename)));
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to search by tag'),
        cause
      );
    }
  }

  async listTaxonomies(): Promise<StoreResult<TaxonomyRow[]>> {
    try {
      const db = this.ensureOpen();
      const rows = db
        .prepare<[], TaxonomyRow>(
          'SELECT id, name FROM taxonomies ORDER BY name'
        )
        .all();
      return ok(rows);
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to list taxonomies'),
        cause
      );
    }
  }

  async listTags(taxonomyName: string): Promise<StoreResult<TagUsageRow[]>> {
    try {
      const db = this.ensureOpen();
      const taxonomy = db
        .prepare<[string], { id: number }>(
          'SELECT id FROM taxonomies WHERE name = ?'
        )
        .get(taxonomyName);
      if (!taxonomy) {
        return err('NOT_FOUND', `Taxonomy not found: ${taxonomyName}`);
      }

      const rows = db
        .prepare<[number], DbTagUsageRow>(`
          SELECT t.id, t.name, COUNT(ft.file_id) AS file_count
          FROM tags t
          LEFT JOIN file_tags ft ON ft.tag_id = t.id
          WHERE t.taxonomy_id = ?
          GROUP BY t.id
          ORDER BY t.name
        `)
        .all(taxonomy.id);
      return ok(
        rows.map((r) => ({ id: r.id, name: r.name, fileCount: r.file_count }))
      );
    } catch (cause) {
      return err('QUERY_FAILED', messageOf(cause, 'Failed to list tags'), cause);
    }
  }

  async getTagsForFile(fileId: number): Promise<StoreResult<FileTagRow[]>> {
    try {
      const db = this.ensureOpen();
      const rows = db
        .prepare<[number], FileTagRow>(`
          SELECT x.name AS taxonomy, t.name AS tag
          FROM file_tags ft
          JOIN tags t ON t.id = ft.tag_id
          JOIN taxonomies x ON x.id = t.taxonomy_id
          WHERE ft.file_id = ?
          ORDER BY x.name, t.name
        `)
        .all(fileId);
      return ok(rows);
    } catch (cause) {
      return err(
        'QUERY_FAILED',
        messageOf(cause, 'Failed to get tags for file'),
        cause
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  async getStatus(): Promise<StoreResult<CatalogStatus>> {
    try {
      const db = this.ensureOpen();
      const files = db
        .prepare<[], { files: number; hashes: number; bytes: number }>(`
          SELECT
            COUNT(*) AS files,
            COUNT(DISTINCT hash) AS hashes,
            COALESCE(SUM(size), 0) AS bytes
          FROM files
        `)
        .get();
      const counts = db
        .prepare<[], { taxonomies: number; tags: number; links: number }>(`
          SELECT
            (SELECT COUNT(*) FROM taxonomies) AS taxonomies,
            (SELECT COUNT(*) FROM tags) AS tags,
            (SELECT COUNT(*) FROM file_tags) AS links
        `)
        .get();

      return ok({
        dbPath: this.dbPath,
        schemaVersion: getSchemaVersion(db),
        files: files?.files ?? 0,
        distinctHashes: files?.hashes ?? 0,
        totalBytes: files?.bytes ?? 0,
        taxonomies: counts?.taxonomies ?? 0,
        tags: counts?.tags ?? 0,
        associations: counts?.links ?? 0,
      });
    } catch (cause) {
      return err('QUERY_FAILED', messageOf(cause, 'Failed to get status'), cause);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// DB Row Types (snake_case from SQLite)
// ─────────────────────────────────────────────────────────────────────────────

type DbFileRow = {
  id: number;
  filename: string;
  path: string;
  hash: string;
  size: number;
  modified_at: string;
};

type DbLocationRow = {
  path: string;
  filename: string;
};

type DbTagUsageRow = {
  id: number;
  name: string;
  file_count: number;
};

// ─────────────────────────────────────────────────────────────────────────────
// Row Mappers (snake_case -> camelCase)
// ─────────────────────────────────────────────────────────────────────────────

function mapFileRow(row: DbFileRow): FileRecordRow {
  return {
    id: row.id,
    filename: row.filename,
    directory: row.path,
    path: joinCatalogPath(row.path, row.filename),
    contentHash: row.hash,
    sizeBytes: row.size,
    modifiedAt: row.modified_at,
  };
}
