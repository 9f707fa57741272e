/**
 * stowl ls command implementation.
 * List cataloged files.
 *
 * @module src/cli/commands/ls
 */

import type { FileRecordRow, FileTagRow } from '../../store/types';
import {
  type CatalogOptions,
  type CommandResult,
  storeFailure,
  withCatalog,
} from './shared';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type LsCommandOptions = CatalogOptions & {
  /** Include tags of each file */
  tags?: boolean;
};

export type LsEntry = FileRecordRow & { tags?: FileTagRow[] };

export type LsResult = CommandResult<LsEntry[]>;

// ─────────────────────────────────────────────────────────────────────────────
// Command
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Execute stowl ls.
 */
export function ls(options: LsCommandOptions = {}): Promise<LsResult> {
  return withCatalog(options, async (ctx) => {
    const files = await ctx.store.listFiles();
    if (!files.ok) {
      return storeFailure(files.error);
    }
    if (!options.tags) {
      return { success: true, data: files.value };
    }

    const entries: LsEntry[] = [];
    for (const file of files.value) {
      const tags = await ctx.store.getTagsForFile(file.id);
      if (!tags.ok) {
        return storeFailure(tags.error);
      }
      entries.push({ ...file, tags: tags.value });
    }
    return { success: true, data: entries };
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

function formatLong(entry: LsEntry): string {
  return [
    entry.contentHash.slice(0, 12),
    String(entry.sizeBytes).padStart(10),
    entry.modifiedAt,
    entry.path,
  ].join('  ');
}

function formatTags(tags: FileTagRow[]): string {
  return tags.map((t) => `${t.taxonomy}=${t.tag}`).join(', ');
}

/**
 * Format ls result for output.
 */
export function formatLs(
  result: LsResult,
  options: { json?: boolean; long?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }

  return result.data
    .map((entry) => {
      const line = options.long ? formatLong(entry) : entry.path;
      return entry.tags && entry.tags.length > 0
        ? `${line}  [${formatTags(entry.tags)}]`
        : line;
    })
    .join('\n');
}
