/**
 * stowl add command implementation.
 * Hashes files and registers them in the catalog.
 *
 * @module src/cli/commands/add
 */

import { type IngestWarning, Registrar } from '../../ingestion';
import type { FileRecordRow } from '../../store/types';
import {
  type CatalogOptions,
  type CommandResult,
  expandInputs,
  storeFailure,
  withCatalog,
} from './shared';

export type AddData = {
  added: FileRecordRow[];
  warnings: IngestWarning[];
};

export type AddResult = CommandResult<AddData>;

/**
 * Execute stowl add for files, directories or patterns.
 */
export async function add(
  inputs: string[],
  options: CatalogOptions = {}
): Promise<AddResult> {
  if (inputs.length === 0) {
    return { success: false, error: 'No paths given', isValidation: true };
  }

  return withCatalog(options, async (ctx) => {
    const expanded = await expandInputs(inputs, ctx);
    const registrar = new Registrar(ctx.store, { root: ctx.location.root });

    const result = await registrar.registerAll(expanded.absPaths);
    if (!result.ok) {
      return storeFailure(result.error);
    }

    return {
      success: true,
      data: {
        added: result.value.added,
        warnings: [...expanded.warnings, ...result.value.warnings],
      },
    };
  });
}

/**
 * Format add result for output.
 */
export function formatAdd(
  result: AddResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  if (options.json) {
    return JSON.stringify(result.data, null, 2);
  }
  return result.data.added.map((f) => `Added ${f.path}`).join('\n');
}
