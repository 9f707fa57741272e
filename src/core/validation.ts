/**
 * Shared validation helpers for catalog paths.
 *
 * @module src/core/validation
 */

// node:path for path utils
import {
  isAbsolute,
  normalize,
  posix,
  relative,
  resolve,
  sep,
} from 'node:path';

/**
 * Normalize path to POSIX format (forward slashes).
 */
export function toPosixPath(path: string): string {
  if (sep === '/') {
    return path;
  }
  return path.replaceAll(sep, '/');
}

/**
 * Validate a path relative to the catalog root.
 * Returns the normalized POSIX form.
 */
export function validateRelPath(relPath: string): string {
  if (relPath.trim().length === 0) {
    throw new Error('path cannot be empty');
  }
  if (isAbsolute(relPath)) {
    throw new Error('path must be relative');
  }
  if (relPath.includes('\0')) {
    throw new Error('path contains invalid characters');
  }

  const normalized = posix.normalize(toPosixPath(normalize(relPath)));
  const segments = normalized.split('/');
  if (segments.includes('..')) {
    throw new Error('path cannot escape catalog root');
  }
  if (normalized === '.') {
    throw new Error('path must name a file');
  }

  return normalized;
}

/**
 * Convert a user-supplied path (absolute, or relative to cwd) into a
 * catalog path relative to root. Throws if it lies outside the root.
 */
export function toCatalogPath(
  root: string,
  inputPath: string,
  cwd: string = process.cwd()
): string {
  if (inputPath.trim().length === 0) {
    throw new Error('path cannot be empty');
  }
  const absPath = resolve(cwd, inputPath);
  const rel = relative(root, absPath);
  try {
    return validateRelPath(rel);
  } catch {
    throw new Error(`${inputPath} is outside the catalog root ${root}`);
  }
}

/**
 * Absolute filesystem path for a catalog path.
 */
export function toAbsolutePath(root: string, catalogPath: string): string {
  return resolve(root, catalogPath);
}
