/**
 * stowl taxonomy command implementation.
 * Define and list taxonomies.
 *
 * @module src/cli/commands/taxonomy
 */

import type { TaxonomyRow } from '../../store/types';
import { TaxonomyService } from '../../taxonomy/service';
import {
  type CatalogOptions,
  type CommandResult,
  storeFailure,
  withCatalog,
} from './shared';

export type TaxonomyInitResult = CommandResult<TaxonomyRow>;
export type TaxonomyListResult = CommandResult<TaxonomyRow[]>;

/**
 * Execute stowl taxonomy init <name>.
 */
export function taxonomyInit(
  name: string,
  options: CatalogOptions = {}
): Promise<TaxonomyInitResult> {
  return withCatalog(options, async (ctx) => {
    const service = new TaxonomyService(ctx.store, { root: ctx.location.root });
    const result = await service.defineTaxonomy(name);
    if (!result.ok) {
      return storeFailure(result.error);
    }
    return { success: true, data: result.value };
  });
}

/**
 * Execute stowl taxonomy list.
 */
export function taxonomyList(
  options: CatalogOptions = {}
): Promise<TaxonomyListResult> {
  return withCatalog(options, async (ctx) => {
    const service = new TaxonomyService(ctx.store, { root: ctx.location.root });
    const result = await service.listTaxonomies();
    if (!result.ok) {
      return storeFailure(result.error);
    }
    return { success: true, data: result.value };
  });
}

export function formatTaxonomyInit(
  result: TaxonomyInitResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }
  return `Created taxonomy ${result.data.name}`;
}

export function formatTaxonomyList(
  result: TaxonomyListResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(
      result.data.map((t) => t.name),
      null,
      2
    );
  }
  return result.data.map((t) => t.name).join('\n');
}
