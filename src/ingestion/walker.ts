/**
 * File walker implementation.
 * Expands a file, directory or glob pattern using node:fs and minimatch,
 * skipping hidden entries and configured excludes.
 *
 * @module src/ingestion/walker
 */

import type { Dirent } from 'node:fs';
import { lstat, readdir } from 'node:fs/promises';
import { join, relative, resolve } from 'node:path';
import { minimatch } from 'minimatch';
import { toPosixPath } from '../core/validation';
import type { SkippedEntry, WalkConfig, WalkEntry, WalkerPort } from './types';

/** Characters that make an input a glob pattern */
const GLOB_CHARS_REGEX = /[*?[\]]/;

export function isGlobPattern(input: string): boolean {
  return GLOB_CHARS_REGEX.test(input);
}

/**
 * Split a pattern into its non-magic base directory and the rest.
 * "photos/2024/*.jpg" -> { base: "photos/2024", pattern: "*.jpg" }
 */
export function splitGlob(input: string): { base: string; pattern: string } {
  const segments = toPosixPath(input).split('/');
  const firstMagic = segments.findIndex((s) => isGlobPattern(s));
  if (firstMagic === -1) {
    return { base: input, pattern: '' };
  }
  const baseSegments = segments.slice(0, firstMagic);
  let base = baseSegments.join('/');
  if (base === '' && baseSegments.length > 0) {
    base = '/';
  }
  return {
    base: base === '' ? '.' : base,
    pattern: segments.slice(firstMagic).join('/'),
  };
}

/**
 * Check if an entry name matches any exclude.
 * Excludes match a name exactly or as a minimatch pattern.
 */
function matchesExclude(name: string, excludes: string[]): boolean {
  return excludes.some((pattern) => name === pattern || minimatch(name, pattern));
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function isMissing(cause: unknown): boolean {
  return cause instanceof Error && 'code' in cause && cause.code === 'ENOENT';
}

/**
 * File walker implementation using node:fs.
 */
export class FileWalker implements WalkerPort {
  async expand(
    input: string,
    config: WalkConfig
  ): Promise<{
    entries: WalkEntry[];
    skipped: SkippedEntry[];
  }> {
    const cwd = config.cwd ?? process.cwd();
    const entries: WalkEntry[] = [];
    const skipped: SkippedEntry[] = [];

    if (isGlobPattern(input)) {
      const { base, pattern } = splitGlob(input);
      const absBase = resolve(cwd, base);
      await this.walkDir(absBase, config, entries, skipped, (absPath) =>
        minimatch(toPosixPath(relative(absBase, absPath)), pattern, {
          dot: config.includeHidden,
        })
      );
    } else {
      const absPath = resolve(cwd, input);
      try {
        const info = await lstat(absPath);
        if (info.isDirectory()) {
          await this.walkDir(absPath, config, entries, skipped, () => true);
        } else if (info.isFile()) {
          // An explicitly named file is taken even if hidden or excluded
          entries.push({ absPath, size: info.size });
        } else {
          skipped.push({
            absPath,
            reason: 'NOT_A_FILE',
            message: `Not a regular file: ${input}`,
          });
        }
      } catch (cause) {
        skipped.push({
          absPath,
          reason: isMissing(cause) ? 'MISSING' : 'UNREADABLE',
          message: isMissing(cause)
            ? `No such file or directory: ${input}`
            : `Cannot read ${input}: ${describe(cause)}`,
        });
      }
    }

    // Code-unit order, independent of locale
    entries.sort((a, b) =>
      a.absPath < b.absPath ? -1 : a.absPath > b.absPath ? 1 : 0
    );

    return { entries, skipped };
  }

  private async walkDir(
    dir: string,
    config: WalkConfig,
    entries: WalkEntry[],
    skipped: SkippedEntry[],
    accept: (absPath: string) => boolean
  ): Promise<void> {
    let dirents: Dirent[];
    try {
      dirents = await readdir(dir, { withFileTypes: true });
    } catch (cause) {
      skipped.push({
        absPath: dir,
        reason: isMissing(cause) ? 'MISSING' : 'UNREADABLE',
        message: `Cannot read directory ${dir}: ${describe(cause)}`,
      });
      return;
    }

    for (const dirent of dirents) {
      if (!config.includeHidden && dirent.name.startsWith('.')) {
        continue;
      }
      if (matchesExclude(dirent.name, config.exclude)) {
        continue;
      }

      const absPath = join(dir, dirent.name);
      // Symlinks report neither isDirectory() nor isFile() on a Dirent
      if (dirent.isDirectory()) {
        await this.walkDir(absPath, config, entries, skipped, accept);
      } else if (dirent.isFile() && accept(absPath)) {
        try {
          const info = await lstat(absPath);
          entries.push({ absPath, size: info.size });
        } catch (cause) {
          skipped.push({
            absPath,
            reason: 'UNREADABLE',
            message: `Cannot stat ${absPath}: ${describe(cause)}`,
          });
        }
      }
    }
  }
}

/**
 * Default walker instance.
 */
export const defaultWalker = new FileWalker();
