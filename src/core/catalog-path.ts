/**
 * Catalog path helpers.
 * A catalog path is relative to the catalog root, uses forward slashes,
 * and is stored as (directory, filename) with "." for the root directory.
 *
 * @module src/core/catalog-path
 */

import { posix } from 'node:path';

export interface CatalogPathParts {
  directory: string;
  filename: string;
}

/**
 * Split a catalog path into its real directory and filename.
 */
export function splitCatalogPath(catalogPath: string): CatalogPathParts {
  return {
    directory: posix.dirname(catalogPath),
    filename: posix.basename(catalogPath),
  };
}

/**
 * Join a stored directory and filename back into a catalog path.
 * joinCatalogPath('.', 'a.txt') === 'a.txt'
 */
export function joinCatalogPath(directory: string, filename: string): string {
  return posix.join(directory, filename);
}
