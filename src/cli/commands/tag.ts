/**
 * stowl tag command implementation.
 * Attach tag values to a cataloged file.
 *
 * @module src/cli/commands/tag
 */

import {
  type TagAssignment,
  type TagResult,
  TaxonomyService,
} from '../../taxonomy/service';
import {
  type CatalogOptions,
  type CommandResult,
  storeFailure,
  withCatalog,
} from './shared';

export type TagCommandResult = CommandResult<TagResult[]>;

/**
 * Execute stowl tag. Each assignment is its own transaction; the first
 * failure stops the command and earlier assignments stay applied.
 */
export function tag(
  file: string,
  assignments: TagAssignment[],
  options: CatalogOptions = {}
): Promise<TagCommandResult> {
  return withCatalog(options, async (ctx) => {
    const service = new TaxonomyService(ctx.store, { root: ctx.location.root });
    const applied: TagResult[] = [];

    for (const { taxonomy, value } of assignments) {
      const result = await service.tag(file, taxonomy, value);
      if (!result.ok) {
        return storeFailure(result.error);
      }
      applied.push(result.value);
    }

    return { success: true, data: applied };
  });
}

/**
 * Format tag result for output.
 */
export function formatTag(
  result: TagCommandResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }
  return result.data
    .map((t) =>
      t.created
        ? `Tagged ${t.path} with ${t.taxonomy}=${t.value}`
        : `${t.path} already tagged ${t.taxonomy}=${t.value}`
    )
    .join('\n');
}
