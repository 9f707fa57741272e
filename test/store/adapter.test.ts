/**
 * Integration tests for SQLite adapter.
 */

import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { SqliteAdapter } from '../../src/store';
import type { FileInput } from '../../src/store/types';
import { safeRm } from '../helpers/cleanup';

const H1 = 'a'.repeat(64);
const H2 = 'b'.repeat(64);

function fileInput(overrides: Partial<FileInput> = {}): FileInput {
  return {
    filename: 'a.txt',
    directory: 'dir',
    contentHash: H1,
    sizeBytes: 5,
    modifiedAt: '2024-03-01 10:00:00',
    ...overrides,
  };
}

describe('SqliteAdapter', () => {
  let adapter: SqliteAdapter;
  let testDir: string;
  let dbPath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'stowl-store-test-'));
    dbPath = join(testDir, '.stowl');
    adapter = new SqliteAdapter();
  });

  afterEach(async () => {
    await adapter.close();
    await safeRm(testDir);
  });

  async function openOrFail(): Promise<void> {
    const result = await adapter.open(dbPath);
    if (!result.ok) {
      throw new Error(result.error.message);
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  describe('lifecycle', () => {
    test('opens and closes database', async () => {
      expect(adapter.isOpen()).toBe(false);

      const result = await adapter.open(dbPath);
      expect(result.ok).toBe(true);
      expect(adapter.isOpen()).toBe(true);

      await adapter.close();
      expect(adapter.isOpen()).toBe(false);
    });

    test('runs initial migration on fresh database', async () => {
      const result = await adapter.open(dbPath);

      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.value.applied).toEqual([1]);
      expect(result.value.currentVersion).toBe(1);
    });

    test('reopening an initialized catalog applies nothing', async () => {
      await openOrFail();
      await adapter.close();

      const again = new SqliteAdapter();
      const result = await again.open(dbPath);
      await again.close();

      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.value.applied).toEqual([]);
      expect(result.value.currentVersion).toBe(1);
    });

    test('creates the default taxonomy', async () => {
      await openOrFail();

      const result = await adapter.listTaxonomies();
      expect(result.ok && result.value.map((t) => t.name)).toEqual(['tags']);
    });

    test('creates missing parent directories', async () => {
      dbPath = join(testDir, 'nested', 'deeper', '.stowl');
      const result = await adapter.open(dbPath);
      expect(result.ok).toBe(true);
    });

    test('rejects a file that is not a database', async () => {
      await writeFile(dbPath, 'plain text, not a catalog\n'.repeat(50));

      const result = await adapter.open(dbPath);

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('SCHEMA_ERROR');
      expect(adapter.isOpen()).toBe(false);
    });

    test('rejects a database with a conflicting files table', async () => {
      const raw = new Database(dbPath);
      raw.exec('CREATE TABLE files (name TEXT)');
      raw.close();

      const result = await adapter.open(dbPath);

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('SCHEMA_ERROR');
    });

    test('rejects a catalog missing an expected column', async () => {
      await openOrFail();
      await adapter.close();

      const raw = new Database(dbPath);
      raw.exec('ALTER TABLE files DROP COLUMN modified_at');
      raw.close();

      const result = await adapter.open(dbPath);

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('SCHEMA_ERROR');
      expect(result.error.message).toBe(
        'Catalog table "files" is missing columns: modified_at'
      );
    });

    test('rejects a catalog from a newer schema version', async () => {
      await openOrFail();
      await adapter.close();

      const raw = new Database(dbPath);
      raw.prepare("UPDATE schema_meta SET value = '99' WHERE key = 'version'").run();
      raw.close();

      const result = await adapter.open(dbPath);

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('SCHEMA_ERROR');
    });

    test('operations fail when not open', async () => {
      const result = await adapter.listAllPaths();
      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('QUERY_FAILED');
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Files
  // ───────────────────────────────────────────────────────────────────────────

  describe('files', () => {
    beforeEach(openOrFail);

    test('registers a file and maps the row', async () => {
      const result = await adapter.registerFile(fileInput());

      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.value).toEqual({
        id: result.value.id,
        filename: 'a.txt',
        directory: 'dir',
        path: 'dir/a.txt',
        contentHash: H1,
        sizeBytes: 5,
        modifiedAt: '2024-03-01 10:00:00',
      });
    });

    test('registering the same content twice keeps one record', async () => {
      const first = await adapter.registerFile(fileInput());
      const second = await adapter.registerFile(fileInput());

      expect(first.ok && second.ok).toBe(true);
      if (!(first.ok && second.ok)) {
        return;
      }
      expect(second.value).toEqual(first.value);

      const files = await adapter.listFiles();
      expect(files.ok && files.value.length).toBe(1);
    });

    test('registering new content at the same path overwrites', async () => {
      const first = await adapter.registerFile(fileInput());
      const second = await adapter.registerFile(
        fileInput({
          contentHash: H2,
          sizeBytes: 9,
          modifiedAt: '2024-03-02 11:30:00',
        })
      );

      expect(first.ok && second.ok).toBe(true);
      if (!(first.ok && second.ok)) {
        return;
      }
      expect(second.value.id).toBe(first.value.id);
      expect(second.value.contentHash).toBe(H2);
      expect(second.value.sizeBytes).toBe(9);
      expect(second.value.modifiedAt).toBe('2024-03-02 11:30:00');

      const files = await adapter.listFiles();
      expect(files.ok && files.value.length).toBe(1);
    });

    test('same content under two paths yields two records', async () => {
      await adapter.registerFile(fileInput({ directory: 'dir' }));
      await adapter.registerFile(fileInput({ directory: 'copies' }));

      const paths = await adapter.listAllPaths();
      expect(paths.ok && paths.value).toEqual(['copies/a.txt', 'dir/a.txt']);

      const found = await adapter.findPathByHash(H1);
      expect(found.ok).toBe(true);
      if (!found.ok) {
        return;
      }
      expect(['copies/a.txt', 'dir/a.txt']).toContain(found.value);
    });

    test('findPathByHash returns null for unknown content', async () => {
      const found = await adapter.findPathByHash(H2);
      expect(found).toEqual({ ok: true, value: null });
    });

    test('root-level files list as bare filenames', async () => {
      await adapter.registerFile(fileInput({ directory: '.' }));

      const paths = await adapter.listAllPaths();
      expect(paths.ok && paths.value).toEqual(['a.txt']);
    });

    test('getFile returns null for an uncataloged location', async () => {
      const result = await adapter.getFile('dir', 'nope.txt');
      expect(result).toEqual({ ok: true, value: null });
    });

    test('resolveFileId uses directory and filename', async () => {
      const registered = await adapter.registerFile(fileInput());
      await adapter.registerFile(fileInput({ directory: 'other' }));
      if (!registered.ok) {
        throw new Error('register failed');
      }

      const result = await adapter.resolveFileId('dir', 'a.txt');
      expect(result).toEqual({ ok: true, value: registered.value.id });
    });

    test('resolveFileId fails with NOT_FOUND', async () => {
      const result = await adapter.resolveFileId('dir', 'a.txt');
      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('NOT_FOUND');
      expect(result.error.message).toBe('File not in catalog: dir/a.txt');
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Path Updates
  // ───────────────────────────────────────────────────────────────────────────

  describe('updateFilePath', () => {
    beforeEach(openOrFail);

    test('moves a record and keeps its tags', async () => {
      const registered = await adapter.registerFile(fileInput());
      if (!registered.ok) {
        throw new Error('register failed');
      }
      const taxonomyId = await adapter.getOrCreateTaxonomy('tags');
      if (!taxonomyId.ok) {
        throw new Error('taxonomy failed');
      }
      const tagId = await adapter.getOrCreateTag(taxonomyId.value, 'beach');
      if (!tagId.ok) {
        throw new Error('tag failed');
      }
      await adapter.associateTag(registered.value.id, tagId.value);

      const moved = await adapter.updateFilePath('dir/a.txt', 'b.txt');
      expect(moved).toEqual({ ok: true, value: true });

      const paths = await adapter.listAllPaths();
      expect(paths.ok && paths.value).toEqual(['b.txt']);

      const id = await adapter.resolveFileId('.', 'b.txt');
      expect(id).toEqual({ ok: true, value: registered.value.id });

      const found = await adapter.searchByTag('tags', 'beach');
      expect(found).toEqual({ ok: true, value: ['b.txt'] });
    });

    test('returns false for an uncataloged path', async () => {
      const result = await adapter.updateFilePath('dir/a.txt', 'dir/b.txt');
      expect(result).toEqual({ ok: true, value: false });
    });

    test('fails with DUPLICATE when the target is cataloged', async () => {
      await adapter.registerFile(fileInput());
      await adapter.registerFile(fileInput({ filename: 'b.txt' }));

      const result = await adapter.updateFilePath('dir/a.txt', 'dir/b.txt');
      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('DUPLICATE');
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Taxonomies & Tags
  // ───────────────────────────────────────────────────────────────────────────

  describe('taxonomies and tags', () => {
    beforeEach(openOrFail);

    test('createTaxonomy rejects an existing name', async () => {
      const first = await adapter.createTaxonomy('author');
      expect(first.ok && first.value.name).toBe('author');

      const second = await adapter.createTaxonomy('author');
      expect(second.ok).toBe(false);
      if (second.ok) {
        return;
      }
      expect(second.error.code).toBe('DUPLICATE');
    });

    test('createTaxonomy rejects the default taxonomy', async () => {
      const result = await adapter.createTaxonomy('tags');
      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('DUPLICATE');
    });

    test('getOrCreateTaxonomy is idempotent', async () => {
      const first = await adapter.getOrCreateTaxonomy('author');
      const second = await adapter.getOrCreateTaxonomy('author');

      expect(first.ok && second.ok).toBe(true);
      if (!(first.ok && second.ok)) {
        return;
      }
      expect(second.value).toBe(first.value);
    });

    test('getOrCreateTag matches names case-insensitively', async () => {
      const taxonomyId = await adapter.getOrCreateTaxonomy('genre');
      if (!taxonomyId.ok) {
        throw new Error('taxonomy failed');
      }

      const first = await adapter.getOrCreateTag(taxonomyId.value, 'Rock');
      const second = await adapter.getOrCreateTag(taxonomyId.value, 'rock');
      expect(first.ok && second.ok).toBe(true);
      if (!(first.ok && second.ok)) {
        return;
      }
      expect(second.value).toBe(first.value);

      const tags = await adapter.listTags('genre');
      expect(tags.ok && tags.value.map((t) => t.name)).toEqual(['Rock']);
    });

    test('same tag name in two taxonomies is two tags', async () => {
      const a = await adapter.getOrCreateTaxonomy('genre');
      const b = await adapter.getOrCreateTaxonomy('mood');
      if (!(a.ok && b.ok)) {
        throw new Error('taxonomy failed');
      }

      const first = await adapter.getOrCreateTag(a.value, 'blue');
      const second = await adapter.getOrCreateTag(b.value, 'blue');
      expect(first.ok && second.ok).toBe(true);
      if (!(first.ok && second.ok)) {
        return;
      }
      expect(second.value).not.toBe(first.value);
    });

    test('getOrCreateTag fails for an unknown taxonomy id', async () => {
      const result = await adapter.getOrCreateTag(9999, 'rock');
      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('NOT_FOUND');
    });

    test('associateTag twice leaves one link', async () => {
      const file = await adapter.registerFile(fileInput());
      const taxonomyId = await adapter.getOrCreateTaxonomy('tags');
      if (!(file.ok && taxonomyId.ok)) {
        throw new Error('setup failed');
      }
      const tagId = await adapter.getOrCreateTag(taxonomyId.value, 'beach');
      if (!tagId.ok) {
        throw new Error('tag failed');
      }

      const first = await adapter.associateTag(file.value.id, tagId.value);
      const second = await adapter.associateTag(file.value.id, tagId.value);
      expect(first).toEqual({ ok: true, value: true });
      expect(second).toEqual({ ok: true, value: false });

      const status = await adapter.getStatus();
      expect(status.ok && status.value.associations).toBe(1);
    });

    test('foreign keys reject links to a missing file', async () => {
      const taxonomyId = await adapter.getOrCreateTaxonomy('tags');
      if (!taxonomyId.ok) {
        throw new Error('taxonomy failed');
      }
      const tagId = await adapter.getOrCreateTag(taxonomyId.value, 'beach');
      if (!tagId.ok) {
        throw new Error('tag failed');
      }

      const result = await adapter.associateTag(4242, tagId.value);
      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('NOT_FOUND');
    });

    test('searchByTag returns tagged paths in order', async () => {
      const a = await adapter.registerFile(fileInput({ filename: 'b.txt' }));
      const b = await adapter.registerFile(fileInput({ filename: 'a.txt' }));
      const c = await adapter.registerFile(fileInput({ filename: 'c.txt' }));
      const taxonomyId = await adapter.getOrCreateTaxonomy('tags');
      if (!(a.ok && b.ok && c.ok && taxonomyId.ok)) {
        throw new Error('setup failed');
      }
      const tagId = await adapter.getOrCreateTag(taxonomyId.value, 'Beach');
      if (!tagId.ok) {
        throw new Error('tag failed');
      }
      await adapter.associateTag(a.value.id, tagId.value);
      await adapter.associateTag(b.value.id, tagId.value);

      const result = await adapter.searchByTag('tags', 'beach');
      expect(result).toEqual({ ok: true, value: ['dir/a.txt', 'dir/b.txt'] });
    });

    test('searchByTag with no matches is empty, not an error', async () => {
      const result = await adapter.searchByTag('tags', 'nothing');
      expect(result).toEqual({ ok: true, value: [] });
    });

    test('listTags counts files per tag', async () => {
      const a = await adapter.registerFile(fileInput({ filename: 'a.txt' }));
      const b = await adapter.registerFile(fileInput({ filename: 'b.txt' }));
      const taxonomyId = await adapter.getOrCreateTaxonomy('tags');
      if (!(a.ok && b.ok && taxonomyId.ok)) {
        throw new Error('setup failed');
      }
      const beach = await adapter.getOrCreateTag(taxonomyId.value, 'beach');
      const city = await adapter.getOrCreateTag(taxonomyId.value, 'city');
      if (!(beach.ok && city.ok)) {
        throw new Error('tag failed');
      }
      await adapter.associateTag(a.value.id, beach.value);
      await adapter.associateTag(b.value.id, beach.value);

      const result = await adapter.listTags('tags');
      expect(result.ok).toBe(true);
      if (!result.ok) {
        return;
      }
      expect(result.value.map((t) => [t.name, t.fileCount])).toEqual([
        ['beach', 2],
        ['city', 0],
      ]);
    });

    test('listTags fails for an unknown taxonomy', async () => {
      const result = await adapter.listTags('nope');
      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('NOT_FOUND');
    });

    test('getTagsForFile lists taxonomy and tag pairs', async () => {
      const file = await adapter.registerFile(fileInput());
      const tags = await adapter.getOrCreateTaxonomy('tags');
      const author = await adapter.getOrCreateTaxonomy('author');
      if (!(file.ok && tags.ok && author.ok)) {
        throw new Error('setup failed');
      }
      const beach = await adapter.getOrCreateTag(tags.value, 'beach');
      const ana = await adapter.getOrCreateTag(author.value, 'Ana');
      if (!(beach.ok && ana.ok)) {
        throw new Error('tag failed');
      }
      await adapter.associateTag(file.value.id, beach.value);
      await adapter.associateTag(file.value.id, ana.value);

      const result = await adapter.getTagsForFile(file.value.id);
      expect(result).toEqual({
        ok: true,
        value: [
          { taxonomy: 'author', tag: 'Ana' },
          { taxonomy: 'tags', tag: 'beach' },
        ],
      });
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────────

  describe('withTransaction', () => {
    beforeEach(openOrFail);

    test('commits on success', async () => {
      const result = await adapter.withTransaction(async () => {
        await adapter.getOrCreateTaxonomy('author');
        return 'done';
      });

      expect(result).toEqual({ ok: true, value: 'done' });
      const list = await adapter.listTaxonomies();
      expect(list.ok && list.value.map((t) => t.name)).toEqual([
        'author',
        'tags',
      ]);
    });

    test('rolls back every write when fn throws', async () => {
      const result = await adapter.withTransaction(async () => {
        await adapter.getOrCreateTaxonomy('author');
        await adapter.registerFile(fileInput());
        throw new Error('boom');
      });

      expect(result.ok).toBe(false);
      if (result.ok) {
        return;
      }
      expect(result.error.code).toBe('TRANSACTION_FAILED');
      expect(result.error.message).toBe('boom');

      const list = await adapter.listTaxonomies();
      expect(list.ok && list.value.map((t) => t.name)).toEqual(['tags']);
      const paths = await adapter.listAllPaths();
      expect(paths).toEqual({ ok: true, value: [] });
    });

    test('nested transactions roll back only the inner writes', async () => {
      const result = await adapter.withTransaction(async () => {
        await adapter.getOrCreateTaxonomy('outer');
        const inner = await adapter.withTransaction(async () => {
          await adapter.getOrCreateTaxonomy('inner');
          throw new Error('inner failed');
        });
        return inner.ok;
      });

      expect(result).toEqual({ ok: true, value: false });
      const list = await adapter.listTaxonomies();
      expect(list.ok && list.value.map((t) => t.name)).toEqual([
        'outer',
        'tags',
      ]);
    });
  });

  // ───────────────────────────────────────────────────────────────────────────
  // Status
  // ───────────────────────────────────────────────────────────────────────────

  describe('getStatus', () => {
    beforeEach(openOrFail);

    test('counts files, hashes and bytes', async () => {
      await adapter.registerFile(fileInput({ filename: 'a.txt', sizeBytes: 5 }));
      await adapter.registerFile(fileInput({ filename: 'b.txt', sizeBytes: 5 }));
      await adapter.registerFile(
        fileInput({ filename: 'c.txt', contentHash: H2, sizeBytes: 7 })
      );

      const result = await adapter.getStatus();
      expect(result).toEqual({
        ok: true,
        value: {
          dbPath,
          schemaVersion: 1,
          files: 3,
          distinctHashes: 2,
          totalBytes: 17,
          taxonomies: 1,
          tags: 0,
          associations: 0,
        },
      });
    });
  });
});
