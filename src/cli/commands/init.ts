/**
 * stowl init command implementation.
 * Creates the catalog database and a default config file.
 *
 * @module src/cli/commands/init
 */

import { resolveCatalogLocation } from '../../app/constants';
import { createDefaultConfig, saveConfigToPath } from '../../config';
import { pathExists } from '../../core/file-ops';
import { SqliteAdapter } from '../../store/sqlite/adapter';
import { type CommandResult, storeFailure } from './shared';

/**
 * Options for init command.
 */
export type InitOptions = {
  /** Override catalog database path */
  catalogPath?: string;
};

export type InitData = {
  dbPath: string;
  configPath: string;
  /** False when the catalog was already up to date */
  created: boolean;
  schemaVersion: number;
  configWritten: boolean;
};

export type InitResult = CommandResult<InitData>;

/**
 * Execute stowl init. Running it again is a no-op.
 */
export async function init(options: InitOptions = {}): Promise<InitResult> {
  const location = resolveCatalogLocation(options.catalogPath);

  const store = new SqliteAdapter();
  const openResult = await store.open(location.dbPath);
  if (!openResult.ok) {
    return storeFailure(openResult.error);
  }
  await store.close();

  let configWritten = false;
  try {
    if (!(await pathExists(location.configPath))) {
      const saved = await saveConfigToPath(
        createDefaultConfig(),
        location.configPath
      );
      if (!saved.ok) {
        return { success: false, error: saved.error.message };
      }
      configWritten = true;
    }
  } catch (cause) {
    return {
      success: false,
      error: cause instanceof Error ? cause.message : String(cause),
    };
  }

  return {
    success: true,
    data: {
      dbPath: location.dbPath,
      configPath: location.configPath,
      created: openResult.value.applied.length > 0,
      schemaVersion: openResult.value.currentVersion,
      configWritten,
    },
  };
}

/**
 * Format init result for output.
 */
export function formatInit(
  result: InitResult,
  options: { json?: boolean } = {}
): string {
  if (!result.success) {
    return `Error: ${result.error}`;
  }
  const d = result.data;
  if (options.json) {
    return JSON.stringify(d, null, 2);
  }

  const lines = [
    d.created
      ? `Initialized catalog at ${d.dbPath}`
      : `Catalog already initialized at ${d.dbPath}`,
  ];
  if (d.configWritten) {
    lines.push(`Wrote config: ${d.configPath}`);
  }
  return lines.join('\n');
}
