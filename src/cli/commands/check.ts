/**
 * stowl check command implementation.
 * Report whether files are already cataloged by content.
 *
 * @module src/cli/commands/check
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  type CheckResult,
  type IngestWarning,
  isGlobPattern,
  Reconciler,
} from '../../ingestion';
import {
  type CatalogOptions,
  type CommandResult,
  expandInputs,
  storeFailure,
  withCatalog,
} from './shared';

export type CheckData = {
  results: CheckResult[];
  warnings: IngestWarning[];
};

export type CheckCommandResult = CommandResult<CheckData>;

/**
 * Execute stowl check [path].
 * A single file propagates its error; a directory or pattern turns
 * per-file errors into warnings. Defaults to the catalog root.
 */
export function check(
  input: string | undefined,
  options: CatalogOptions = {}
): Promise<CheckCommandResult> {
  return withCatalog(options, async (ctx) => {
    const target = input ?? ctx.location.root;
    const reconciler = new Reconciler(ctx.store, { root: ctx.location.root });

    if (!isGlobPattern(target) && !(await isDirectory(target))) {
      const result = await reconciler.check(resolve(target));
      if (!result.ok) {
        return storeFailure(result.error);
      }
      return { success: true, data: { results: [result.value], warnings: [] } };
    }

    const expanded = await expandInputs([target], ctx);
    const results: CheckResult[] = [];
    const warnings: IngestWarning[] = [...expanded.warnings];

    for (const absPath of expanded.absPaths) {
      const result = await reconciler.check(absPath);
      if (result.ok) {
        results.push(result.value);
      } else if (result.error.code === 'IO_ERROR') {
        warnings.push({
          path: absPath,
          code: result.error.code,
          message: result.error.message,
        });
      } else {
        return storeFailure(result.error);
      }
    }

    return { success: true, data: { results, warnings } };
  });
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Missing paths are reported by the hasher
    return false;
  }
}

/**
 * Format check result for output.
 */
export function formatCheck(
  result: CheckCommandResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }
  return result.data.results
    .map((r) =>
      r.status === 'exists'
        ? `File ${r.path} already exists at: ${r.matchedPath}`
        : `File ${r.path} is new`
    )
    .join('\n');
}
