/**
 * Renamer: normalize filenames on disk and keep the catalog in step.
 *
 * @module src/ingestion/rename
 */

import { rename, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { splitCatalogPath } from '../core/catalog-path';
import { pathExists } from '../core/file-ops';
import { normalizeFilename } from '../core/filename';
import { toCatalogPath } from '../core/validation';
import type { StorePort, StoreResult } from '../store/types';
import { err, isUserError, ok } from '../store/types';
import type { IngestWarning } from './types';

/** One rename, as catalog paths */
export type RenameOutcome = {
  from: string;
  to: string;
  /** Whether a catalog record moved with the file */
  cataloged: boolean;
};

export type RenameOptions = {
  dryRun?: boolean;
};

export type RenameAllResult = {
  renamed: RenameOutcome[];
  warnings: IngestWarning[];
};

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class Renamer {
  private readonly store: StorePort;
  private readonly root: string;

  constructor(store: StorePort, options: { root: string }) {
    this.store = store;
    this.root = options.root;
  }

  /**
   * Rename one file to its normalized name.
   * Returns null when the name is already normalized.
   */
  async normalize(
    absPath: string,
    options: RenameOptions = {}
  ): Promise<StoreResult<RenameOutcome | null>> {
    const newName = normalizeFilename(basename(absPath));
    if (newName === basename(absPath)) {
      return ok(null);
    }
    const target = join(dirname(absPath), newName);

    let from: string;
    let to: string;
    try {
      from = toCatalogPath(this.root, absPath);
      to = toCatalogPath(this.root, target);
    } catch (e) {
      return err('VALIDATION', describe(e));
    }

    try {
      const source = await stat(absPath);
      const existing = (await pathExists(target)) ? await stat(target) : null;
      // Case-only renames on case-insensitive filesystems hit the same inode
      if (existing && existing.ino !== source.ino) {
        return err('DUPLICATE', `Target already exists: ${to}`);
      }
    } catch (cause) {
      return err('IO_ERROR', `Cannot read ${from}: ${describe(cause)}`, cause);
    }

    if (options.dryRun) {
      const record = await this.isCataloged(from);
      if (!record.ok) {
        return record;
      }
      return ok({ from, to, cataloged: record.value });
    }

    try {
      await rename(absPath, target);
    } catch (cause) {
      return err(
        'IO_ERROR',
        `Cannot rename ${from} to ${to}: ${describe(cause)}`,
        cause
      );
    }

    const updated = await this.store.updateFilePath(from, to);
    if (!updated.ok) {
      // Put the file back so disk and catalog agree
      try {
        await rename(target, absPath);
      } catch (cause) {
        return err(
          'IO_ERROR',
          `${updated.error.message}; ${to} could not be renamed back: ${describe(cause)}`,
          cause
        );
      }
      return updated;
    }
    return ok({ from, to, cataloged: updated.value });
  }

  /**
   * Normalize files in order. Per-file failures become warnings.
   */
  async normalizeAll(
    absPaths: string[],
    options: RenameOptions = {}
  ): Promise<StoreResult<RenameAllResult>> {
    const renamed: RenameOutcome[] = [];
    const warnings: IngestWarning[] = [];

    for (const absPath of absPaths) {
      const result = await this.normalize(absPath, options);
      if (result.ok) {
        if (result.value) {
          renamed.push(result.value);
        }
        continue;
      }
      if (result.error.code === 'IO_ERROR' || isUserError(result.error)) {
        warnings.push({
          path: absPath,
          code: result.error.code,
          message: result.error.message,
        });
        continue;
      }
      return result;
    }

    return ok({ renamed, warnings });
  }

  private async isCataloged(path: string): Promise<StoreResult<boolean>> {
    const { directory, filename } = splitCatalogPath(path);
    const record = await this.store.getFile(directory, filename);
    if (!record.ok) {
      return record;
    }
    return ok(record.value !== null);
  }
}
