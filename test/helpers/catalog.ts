/**
 * Catalog fixtures for tests: a temp root with an open store.
 */

import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { SqliteAdapter } from '../../src/store';
import { safeRm } from './cleanup';

export type TestCatalog = {
  root: string;
  dbPath: string;
  store: SqliteAdapter;
  /** Write a file under root, creating directories; returns its absolute path */
  write(relPath: string, content: string): Promise<string>;
  cleanup(): Promise<void>;
};

export async function createTestCatalog(prefix = 'stowl-test-'): Promise<TestCatalog> {
  const root = await mkdtemp(join(tmpdir(), prefix));
  const dbPath = join(root, '.stowl');
  const store = new SqliteAdapter();
  const opened = await store.open(dbPath);
  if (!opened.ok) {
    throw new Error(opened.error.message);
  }

  return {
    root,
    dbPath,
    store,
    async write(relPath, content) {
      const absPath = join(root, relPath);
      await mkdir(dirname(absPath), { recursive: true });
      await writeFile(absPath, content);
      return absPath;
    },
    async cleanup() {
      await store.close();
      await safeRm(root);
    },
  };
}
