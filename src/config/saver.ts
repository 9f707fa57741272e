/**
 * Config saving with atomic writes.
 * Writes config to temp file, then renames to target (atomic on POSIX).
 *
 * @module src/config/saver
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import yaml from 'js-yaml';
import { atomicWrite } from '../core/file-ops';
import { type Config, ConfigSchema } from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Result Types
// ─────────────────────────────────────────────────────────────────────────────

export type SaveResult =
  | { ok: true; path: string }
  | { ok: false; error: SaveError };

export type SaveError =
  | { code: 'VALIDATION_ERROR'; message: string }
  | { code: 'IO_ERROR'; message: string; cause: Error };

// ─────────────────────────────────────────────────────────────────────────────
// Saving Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Save config to a specific file path.
 * Creates parent directories if needed.
 */
export async function saveConfigToPath(
  config: Config,
  filePath: string
): Promise<SaveResult> {
  // Validate config before saving
  const validation = ConfigSchema.safeParse(config);
  if (!validation.success) {
    return {
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: `Invalid config: ${validation.error.issues[0]?.message ?? 'unknown error'}`,
      },
    };
  }

  const yamlContent = yaml.dump(validation.data);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await atomicWrite(filePath, yamlContent);
  } catch (cause) {
    return {
      ok: false,
      error: {
        code: 'IO_ERROR',
        message: `Failed to save config file: ${filePath}`,
        cause: cause instanceof Error ? cause : new Error(String(cause)),
      },
    };
  }

  return { ok: true, path: filePath };
}
