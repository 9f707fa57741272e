/**
 * stowl search command implementation.
 * Find files by tag value.
 *
 * @module src/cli/commands/search
 */

import { normalizeTagValue, normalizeTaxonomyName } from '../../core/taxonomy';
import { type TagAssignment, TaxonomyService } from '../../taxonomy/service';
import {
  type CatalogOptions,
  type CommandResult,
  storeFailure,
  withCatalog,
} from './shared';

export type SearchData = {
  taxonomy: string;
  value: string;
  paths: string[];
};

export type SearchResult = CommandResult<SearchData>;

/**
 * Execute stowl search.
 */
export function search(
  term: TagAssignment,
  options: CatalogOptions = {}
): Promise<SearchResult> {
  return withCatalog(options, async (ctx) => {
    const service = new TaxonomyService(ctx.store, { root: ctx.location.root });
    const result = await service.search(term.taxonomy, term.value);
    if (!result.ok) {
      return storeFailure(result.error);
    }
    return {
      success: true,
      data: {
        taxonomy: normalizeTaxonomyName(term.taxonomy),
        value: normalizeTagValue(term.value),
        paths: result.value,
      },
    };
  });
}

/**
 * Format search result for output. One path per line.
 */
export function formatSearch(
  result: SearchResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }
  return result.data.paths.join('\n');
}
