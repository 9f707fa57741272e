/**
 * stowl verify command implementation.
 * Reconcile files on disk against the catalog.
 *
 * @module src/cli/commands/verify
 */

import {
  type Classification,
  type ReconcileReport,
  Reconciler,
} from '../../ingestion';
import * as colors from '../colors';
import {
  type CatalogOptions,
  type CommandResult,
  expandInputs,
  storeFailure,
  withCatalog,
} from './shared';

export type VerifyOptions = CatalogOptions & {
  /** Override the config's detectDuplicates */
  detectDuplicates?: boolean;
};

export type VerifyResult = CommandResult<ReconcileReport>;

/**
 * Execute stowl verify [path|pattern]. Defaults to the catalog root.
 */
export function verify(
  input: string | undefined,
  options: VerifyOptions = {}
): Promise<VerifyResult> {
  return withCatalog(options, async (ctx) => {
    const expanded = await expandInputs([input ?? ctx.location.root], ctx);
    const reconciler = new Reconciler(ctx.store, {
      root: ctx.location.root,
      detectDuplicates:
        options.detectDuplicates ?? ctx.config.detectDuplicates,
    });

    const report = await reconciler.verify(expanded.absPaths);
    if (!report.ok) {
      return storeFailure(report.error);
    }

    return {
      success: true,
      data: {
        ...report.value,
        warnings: [...expanded.warnings, ...report.value.warnings],
      },
    };
  });
}

/**
 * Format one classification as a line.
 */
export function formatClassification(entry: Classification): string {
  switch (entry.kind) {
    case 'new':
      return `${colors.added('New file:')} ${entry.path}`;
    case 'moved':
      return `${colors.moved('Moved/renamed:')} ${entry.oldPath} -> ${entry.newPath}`;
    case 'duplicate':
      return `${colors.duplicate('Duplicate:')} ${entry.path} (same content as ${entry.originalPath})`;
    case 'missing':
      return `${colors.missing('Missing file:')} ${entry.path}`;
  }
}

/**
 * Format verify result for output.
 */
export function formatVerify(
  result: VerifyResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }
  return result.data.entries.map(formatClassification).join('\n');
}
