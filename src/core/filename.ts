/**
 * Filename normalization.
 *
 * Rules, applied to the stem (the extension is kept as-is):
 * - camelCase boundaries become hyphens
 * - lowercase
 * - "&" becomes "and", apostrophes are dropped
 * - anything that is not a letter, digit or hyphen becomes a hyphen
 * - runs of hyphens collapse, leading/trailing hyphens are trimmed
 *
 * @module src/core/filename
 */

import { extname } from 'node:path';

const CAMEL_BOUNDARY = /([\p{Ll}\p{N}])(\p{Lu})/gu;
const NOT_NAME_CHAR = /[^\p{L}\p{N}-]/gu;
const HYPHEN_RUN = /-+/g;
const EDGE_HYPHENS = /^-|-$/g;

/**
 * Normalize a filename (basename only, no directory).
 * Returns the input unchanged when the stem would become empty.
 */
export function normalizeFilename(filename: string): string {
  const ext = extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);

  const normalized = stem
    .replace(CAMEL_BOUNDARY, '$1-$2')
    .toLowerCase()
    .replaceAll('&', 'and')
    .replaceAll("'", '')
    .replace(NOT_NAME_CHAR, '-')
    .replace(HYPHEN_RUN, '-')
    .replace(EDGE_HYPHENS, '');

  if (normalized.length === 0) {
    return filename;
  }
  return `${normalized}${ext}`;
}
