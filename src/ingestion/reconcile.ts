/**
 * Reconciler: classify filesystem paths against the catalog by content hash.
 *
 * Pass 1 (scan) hashes each path. A path whose own record carries the
 * same hash is unchanged; otherwise the hash is looked up:
 * - no record carries it: new
 * - a record elsewhere carries it: moved
 * Pass 2 (findMissing) reports cataloged paths absent from disk.
 *
 * A copy whose original is still on disk also reads as moved. With
 * detectDuplicates the original's existence is checked and the entry is
 * labeled duplicate instead.
 *
 * @module src/ingestion/reconcile
 */

import { splitCatalogPath } from '../core/catalog-path';
import { pathExists } from '../core/file-ops';
import { toAbsolutePath, toCatalogPath } from '../core/validation';
import type { StorePort, StoreResult } from '../store/types';
import { err, ok } from '../store/types';
import { hashFile } from './hasher';
import type {
  CheckResult,
  Classification,
  Hasher,
  IngestWarning,
  ReconcileReport,
} from './types';

export type ReconcilerOptions = {
  /** Catalog root (absolute) */
  root: string;
  hasher?: Hasher;
  /** Label matches whose recorded path still exists as duplicates */
  detectDuplicates?: boolean;
};

export class Reconciler {
  private readonly store: StorePort;
  private readonly root: string;
  private readonly hasher: Hasher;
  private readonly detectDuplicates: boolean;

  constructor(store: StorePort, options: ReconcilerOptions) {
    this.store = store;
    this.root = options.root;
    this.hasher = options.hasher ?? hashFile;
    this.detectDuplicates = options.detectDuplicates ?? false;
  }

  /**
   * Pass 1 over the given files.
   */
  async scan(absPaths: string[]): Promise<StoreResult<ReconcileReport>> {
    const entries: Classification[] = [];
    const warnings: IngestWarning[] = [];
    let unchanged = 0;

    for (const absPath of absPaths) {
      let path: string;
      try {
        path = toCatalogPath(this.root, absPath);
      } catch (e) {
        warnings.push({
          path: absPath,
          code: 'VALIDATION',
          message: e instanceof Error ? e.message : String(e),
        });
        continue;
      }

      const fingerprint = await this.hasher(absPath);
      if (!fingerprint.ok) {
        warnings.push({
          path,
          code: fingerprint.error.code,
          message: fingerprint.error.message,
        });
        continue;
      }

      const contentHash = fingerprint.value.contentHash;
      const own = await this.isRecordedAt(path, contentHash);
      if (!own.ok) {
        return own;
      }
      if (own.value) {
        unchanged += 1;
        continue;
      }

      const match = await this.store.findPathByHash(contentHash);
      if (!match.ok) {
        return match;
      }

      const matchedPath = match.value;
      if (matchedPath === null) {
        entries.push({ kind: 'new', path });
        continue;
      }

      const duplicate = await this.isDuplicate(matchedPath);
      if (!duplicate.ok) {
        warnings.push({
          path,
          code: duplicate.error.code,
          message: duplicate.error.message,
        });
      } else if (duplicate.value) {
        entries.push({ kind: 'duplicate', path, originalPath: matchedPath });
      } else {
        entries.push({ kind: 'moved', oldPath: matchedPath, newPath: path });
      }
    }

    return ok({ entries, unchanged, warnings });
  }

  /**
   * Pass 2: cataloged paths with nothing on disk.
   */
  async findMissing(): Promise<StoreResult<Classification[]>> {
    const paths = await this.store.listAllPaths();
    if (!paths.ok) {
      return paths;
    }

    const missing: Classification[] = [];
    try {
      for (const path of paths.value) {
        if (!(await pathExists(toAbsolutePath(this.root, path)))) {
          missing.push({ kind: 'missing', path });
        }
      }
    } catch (cause) {
      return err(
        'IO_ERROR',
        cause instanceof Error ? cause.message : 'Failed to check paths',
        cause
      );
    }
    return ok(missing);
  }

  /**
   * Both passes. Scan entries come first, then missing paths.
   */
  async verify(absPaths: string[]): Promise<StoreResult<ReconcileReport>> {
    const scanned = await this.scan(absPaths);
    if (!scanned.ok) {
      return scanned;
    }
    const missing = await this.findMissing();
    if (!missing.ok) {
      return missing;
    }
    return ok({
      ...scanned.value,
      entries: [...scanned.value.entries, ...missing.value],
    });
  }

  /**
   * Pass 1 for a single file. Errors propagate.
   * Files outside the root are looked up by content only and reported by
   * their absolute path.
   */
  async check(absPath: string): Promise<StoreResult<CheckResult>> {
    let path: string | null;
    try {
      path = toCatalogPath(this.root, absPath);
    } catch {
      path = null;
    }

    const fingerprint = await this.hasher(absPath);
    if (!fingerprint.ok) {
      return fingerprint;
    }
    const contentHash = fingerprint.value.contentHash;

    if (path !== null) {
      const own = await this.isRecordedAt(path, contentHash);
      if (!own.ok) {
        return own;
      }
      if (own.value) {
        return ok({ status: 'exists', path, matchedPath: path });
      }
    }

    const match = await this.store.findPathByHash(contentHash);
    if (!match.ok) {
      return match;
    }

    const reported = path ?? absPath;
    return ok(
      match.value === null
        ? { status: 'new', path: reported }
        : { status: 'exists', path: reported, matchedPath: match.value }
    );
  }

  /** Whether the record at path carries contentHash. */
  private async isRecordedAt(
    path: string,
    contentHash: string
  ): Promise<StoreResult<boolean>> {
    const { directory, filename } = splitCatalogPath(path);
    const record = await this.store.getFile(directory, filename);
    if (!record.ok) {
      return record;
    }
    return ok(record.value?.contentHash === contentHash);
  }

  private async isDuplicate(
    matchedPath: string
  ): Promise<StoreResult<boolean>> {
    if (!this.detectDuplicates) {
      return ok(false);
    }
    try {
      return ok(await pathExists(toAbsolutePath(this.root, matchedPath)));
    } catch (cause) {
      return err(
        'IO_ERROR',
        cause instanceof Error ? cause.message : 'Failed to check path',
        cause
      );
    }
  }
}
