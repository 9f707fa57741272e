/**
 * stowl status command implementation.
 * Display catalog counts.
 *
 * @module src/cli/commands/status
 */

import type { CatalogStatus } from '../../store/types';
import { label } from '../colors';
import {
  type CatalogOptions,
  type CommandResult,
  storeFailure,
  withCatalog,
} from './shared';

export type StatusData = CatalogStatus & {
  root: string;
  configPath: string;
};

export type StatusResult = CommandResult<StatusData>;

/**
 * Execute stowl status.
 */
export function status(options: CatalogOptions = {}): Promise<StatusResult> {
  return withCatalog(options, async (ctx) => {
    const result = await ctx.store.getStatus();
    if (!result.ok) {
      return storeFailure(result.error);
    }
    return {
      success: true,
      data: {
        ...result.value,
        root: ctx.location.root,
        configPath: ctx.location.configPath,
      },
    };
  });
}

/**
 * Format a byte count for humans.
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * Format status result for output.
 */
export function formatStatus(
  result: StatusResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  const s = result.data;
  if (options.json) {
    return JSON.stringify(s, null, 2);
  }

  return [
    `${label('Catalog:')} ${s.dbPath}`,
    `${label('Root:')} ${s.root}`,
    `${label('Schema:')} v${s.schemaVersion}`,
    '',
    `Files: ${s.files} (${s.distinctHashes} distinct, ${formatBytes(s.totalBytes)})`,
    `Taxonomies: ${s.taxonomies}`,
    `Tags: ${s.tags}`,
    `Tag links: ${s.associations}`,
  ].join('\n');
}
