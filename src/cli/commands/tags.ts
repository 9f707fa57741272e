/**
 * stowl tags command implementation.
 * List tag values of a taxonomy with usage counts.
 *
 * @module src/cli/commands/tags
 */

import { DEFAULT_TAXONOMY } from '../../app/constants';
import type { TagUsageRow } from '../../store/types';
import { TaxonomyService } from '../../taxonomy/service';
import {
  type CatalogOptions,
  type CommandResult,
  storeFailure,
  withCatalog,
} from './shared';

export type TagsListResult = CommandResult<TagUsageRow[]>;

/**
 * Execute stowl tags [taxonomy].
 */
export function tagsList(
  taxonomy: string = DEFAULT_TAXONOMY,
  options: CatalogOptions = {}
): Promise<TagsListResult> {
  return withCatalog(options, async (ctx) => {
    const service = new TaxonomyService(ctx.store, { root: ctx.location.root });
    const result = await service.listTags(taxonomy);
    if (!result.ok) {
      return storeFailure(result.error);
    }
    return { success: true, data: result.value };
  });
}

/**
 * Format tags list for output.
 */
export function formatTagsList(
  result: TagsListResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(
      result.data.map((t) => ({ name: t.name, fileCount: t.fileCount })),
      null,
      2
    );
  }
  return result.data.map((t) => `${t.name}\t${t.fileCount}`).join('\n');
}
