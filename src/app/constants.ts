/**
 * Central constants for Stowl - all user-visible identifiers.
 * Renaming the tool is a single-module change by modifying values here.
 *
 * @module src/app/constants
 */

import { dirname, isAbsolute, join, resolve } from 'node:path';
import pkg from '../../package.json';

// ─────────────────────────────────────────────────────────────────────────────
// Brand / Product Identity
// ─────────────────────────────────────────────────────────────────────────────

/** Product name (display) */
export const PRODUCT_NAME = 'Stowl';

/** CLI binary name */
export const CLI_NAME = 'stowl';

/** Version from package.json (single source of truth) */
export const VERSION: string = pkg.version;

// ─────────────────────────────────────────────────────────────────────────────
// Catalog Files
// ─────────────────────────────────────────────────────────────────────────────

/** Catalog database filename, created in the catalog root */
export const CATALOG_FILENAME = '.stowl';

/** Optional config filename, next to the catalog database */
export const CONFIG_FILENAME = '.stowl.yml';

/** Env var to override the catalog database path */
export const ENV_CATALOG = 'STOWL_CATALOG';

// ─────────────────────────────────────────────────────────────────────────────
// Taxonomy Defaults
// ─────────────────────────────────────────────────────────────────────────────

/** Taxonomy created at initialization and used when none is given */
export const DEFAULT_TAXONOMY = 'tags';

// ─────────────────────────────────────────────────────────────────────────────
// Path Resolution
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolved locations for one catalog.
 * The catalog root is the directory holding the database file; every
 * cataloged path is stored relative to it.
 */
export interface CatalogLocation {
  dbPath: string;
  root: string;
  configPath: string;
}

/**
 * Resolve the catalog location.
 * Precedence: explicit path > STOWL_CATALOG env > ./.stowl
 */
export function resolveCatalogLocation(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): CatalogLocation {
  const raw = explicitPath ?? env[ENV_CATALOG] ?? CATALOG_FILENAME;
  const dbPath = isAbsolute(raw) ? raw : resolve(cwd, raw);
  const root = dirname(dbPath);
  return { dbPath, root, configPath: join(root, CONFIG_FILENAME) };
}
