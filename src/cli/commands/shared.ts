/**
 * Shared CLI command utilities.
 * Catalog acquisition, path expansion and result helpers.
 *
 * @module src/cli/commands/shared
 */

import { type CatalogLocation, resolveCatalogLocation } from '../../app/constants';
import { type Config, loadConfigOrDefault } from '../../config';
import { pathExists } from '../../core/file-ops';
import {
  defaultWalker,
  type IngestWarning,
  skippedToWarnings,
} from '../../ingestion';
import { SqliteAdapter } from '../../store/sqlite/adapter';
import type { StoreError } from '../../store/types';
import { isUserError } from '../../store/types';
import type { CommandFailure } from '../errors';

// ─────────────────────────────────────────────────────────────────────────────
// Result Types
// ─────────────────────────────────────────────────────────────────────────────

export type CommandResult<T> = { success: true; data: T } | CommandFailure;

/**
 * Map a store error to a command failure.
 * Bad input (validation, not found, duplicate) exits 1, the rest exits 2.
 */
export function storeFailure(error: StoreError): CommandFailure {
  return {
    success: false,
    error: error.message,
    isValidation: isUserError(error),
    storeCode: error.code,
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Acquisition
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Open catalog for one command. Closed by withCatalog when done.
 */
export type CatalogContext = {
  store: SqliteAdapter;
  location: CatalogLocation;
  config: Config;
};

export type CatalogOptions = {
  /** Override catalog database path */
  catalogPath?: string;
};

/**
 * Open the catalog, run fn and close the catalog again.
 * The catalog must already exist; `init` creates it.
 */
export async function withCatalog<T>(
  options: CatalogOptions,
  fn: (ctx: CatalogContext) => Promise<CommandResult<T>>
): Promise<CommandResult<T>> {
  const location = resolveCatalogLocation(options.catalogPath);

  let exists: boolean;
  try {
    exists = await pathExists(location.dbPath);
  } catch (cause) {
    return {
      success: false,
      error: cause instanceof Error ? cause.message : String(cause),
    };
  }
  if (!exists) {
    return {
      success: false,
      error: `No catalog at ${location.dbPath}. Run: stowl init`,
    };
  }

  const configResult = await loadConfigOrDefault(location.configPath);
  if (!configResult.ok) {
    return {
      success: false,
      error: configResult.error.message,
      isValidation: configResult.error.code !== 'IO_ERROR',
    };
  }

  const store = new SqliteAdapter();
  const openResult = await store.open(location.dbPath);
  if (!openResult.ok) {
    return storeFailure(openResult.error);
  }

  try {
    return await fn({ store, location, config: configResult.value });
  } finally {
    await store.close();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Path Expansion
// ─────────────────────────────────────────────────────────────────────────────

export type ExpandedPaths = {
  absPaths: string[];
  warnings: IngestWarning[];
};

/**
 * Expand files, directories and patterns into regular files, in input order.
 * The catalog's own files are never returned.
 */
export async function expandInputs(
  inputs: string[],
  ctx: CatalogContext
): Promise<ExpandedPaths> {
  const own = new Set([
    ctx.location.dbPath,
    `${ctx.location.dbPath}-wal`,
    `${ctx.location.dbPath}-shm`,
    `${ctx.location.dbPath}-journal`,
    ctx.location.configPath,
  ]);

  const absPaths: string[] = [];
  const warnings: IngestWarning[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    const { entries, skipped } = await defaultWalker.expand(input, {
      exclude: ctx.config.exclude,
      includeHidden: ctx.config.includeHidden,
    });
    warnings.push(...skippedToWarnings(skipped));
    for (const entry of entries) {
      if (own.has(entry.absPath) || seen.has(entry.absPath)) {
        continue;
      }
      seen.add(entry.absPath);
      absPaths.push(entry.absPath);
    }
  }

  return { absPaths, warnings };
}
