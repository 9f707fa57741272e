/**
 * stowl normalize command implementation.
 * Rename files to normalized names and update the catalog.
 *
 * @module src/cli/commands/normalize
 */

import { type RenameAllResult, Renamer } from '../../ingestion';
import {
  type CatalogOptions,
  type CommandResult,
  expandInputs,
  storeFailure,
  withCatalog,
} from './shared';

export type NormalizeOptions = CatalogOptions & {
  dryRun?: boolean;
};

export type NormalizeData = RenameAllResult & { dryRun: boolean };

export type NormalizeResult = CommandResult<NormalizeData>;

/**
 * Execute stowl normalize [path|pattern]. Defaults to the catalog root.
 */
export function normalize(
  input: string | undefined,
  options: NormalizeOptions = {}
): Promise<NormalizeResult> {
  const dryRun = options.dryRun ?? false;

  return withCatalog(options, async (ctx) => {
    const expanded = await expandInputs([input ?? ctx.location.root], ctx);
    const renamer = new Renamer(ctx.store, { root: ctx.location.root });

    const result = await renamer.normalizeAll(expanded.absPaths, { dryRun });
    if (!result.ok) {
      return storeFailure(result.error);
    }

    return {
      success: true,
      data: {
        renamed: result.value.renamed,
        warnings: [...expanded.warnings, ...result.value.warnings],
        dryRun,
      },
    };
  });
}

/**
 * Format normalize result for output.
 */
export function formatNormalize(
  result: NormalizeResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }
  const verb = result.data.dryRun ? 'Would normalize:' : 'Normalized:';
  return result.data.renamed
    .map((r) => `${verb} ${r.from} -> ${r.to}`)
    .join('\n');
}
