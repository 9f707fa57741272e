/**
 * Registrar: hash files and upsert them into the catalog.
 *
 * @module src/ingestion/register
 */

import { splitCatalogPath } from '../core/catalog-path';
import { toCatalogPath } from '../core/validation';
import type { FileRecordRow, StorePort, StoreResult } from '../store/types';
import { err, isUserError, ok } from '../store/types';
import { hashFile } from './hasher';
import type { Hasher, IngestWarning } from './types';

export type RegistrarOptions = {
  /** Catalog root (absolute) */
  root: string;
  hasher?: Hasher;
};

export type RegisterAllResult = {
  added: FileRecordRow[];
  warnings: IngestWarning[];
};

export class Registrar {
  private readonly store: StorePort;
  private readonly root: string;
  private readonly hasher: Hasher;

  constructor(store: StorePort, options: RegistrarOptions) {
    this.store = store;
    this.root = options.root;
    this.hasher = options.hasher ?? hashFile;
  }

  /**
   * Hash one file and upsert its record.
   */
  async register(absPath: string): Promise<StoreResult<FileRecordRow>> {
    let catalogPath: string;
    try {
      catalogPath = toCatalogPath(this.root, absPath);
    } catch (e) {
      return err('VALIDATION', e instanceof Error ? e.message : String(e));
    }

    const fingerprint = await this.hasher(absPath);
    if (!fingerprint.ok) {
      return fingerprint;
    }

    const { directory, filename } = splitCatalogPath(catalogPath);
    return this.store.registerFile({
      filename,
      directory,
      ...fingerprint.value,
    });
  }

  /**
   * Register files in order. IO and validation failures become warnings;
   * a store failure stops the run.
   */
  async registerAll(
    absPaths: string[]
  ): Promise<StoreResult<RegisterAllResult>> {
    const added: FileRecordRow[] = [];
    const warnings: IngestWarning[] = [];

    for (const absPath of absPaths) {
      const result = await this.register(absPath);
      if (result.ok) {
        added.push(result.value);
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

    return ok({ added, warnings });
  }
}
