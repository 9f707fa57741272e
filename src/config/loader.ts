/**
 * Config loading and validation.
 * Loads YAML config and validates against Zod schema.
 *
 * @module src/config/loader
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { pathExists } from '../core/file-ops';
import { createDefaultConfig } from './defaults';
import { CONFIG_VERSION, type Config, ConfigSchema } from './types';

// ─────────────────────────────────────────────────────────────────────────────
// Result Types
// ─────────────────────────────────────────────────────────────────────────────

export type LoadResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: LoadError };

export type LoadError =
  | { code: 'NOT_FOUND'; message: string; path: string }
  | { code: 'PARSE_ERROR'; message: string; details: string }
  | { code: 'VALIDATION_ERROR'; message: string; issues: ZodError['issues'] }
  | {
      code: 'VERSION_MISMATCH';
      message: string;
      found: string;
      expected: string;
    }
  | { code: 'IO_ERROR'; message: string; cause: Error };

// ─────────────────────────────────────────────────────────────────────────────
// Loading Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Load config from a specific file path.
 */
export async function loadConfigFromPath(
  filePath: string
): Promise<LoadResult<Config>> {
  // Read file contents
  let content: string;
  try {
    if (!(await pathExists(filePath))) {
      return {
        ok: false,
        error: {
          code: 'NOT_FOUND',
          message: `Config file not found: ${filePath}`,
          path: filePath,
        },
      };
    }
    content = await readFile(filePath, 'utf8');
  } catch (cause) {
    return {
      ok: false,
      error: {
        code: 'IO_ERROR',
        message: `Failed to read config file: ${filePath}`,
        cause: cause instanceof Error ? cause : new Error(String(cause)),
      },
    };
  }

  // Parse YAML
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (cause) {
    return {
      ok: false,
      error: {
        code: 'PARSE_ERROR',
        message: 'Invalid YAML syntax',
        details: cause instanceof Error ? cause.message : String(cause),
      },
    };
  }

  // An empty file means all defaults
  if (parsed === undefined || parsed === null) {
    parsed = {};
  }

  // Check version before full validation
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'version' in parsed &&
    parsed.version !== CONFIG_VERSION
  ) {
    return {
      ok: false,
      error: {
        code: 'VERSION_MISMATCH',
        message: `Config version mismatch. Found "${String(parsed.version)}", expected "${CONFIG_VERSION}"`,
        found: String(parsed.version),
        expected: CONFIG_VERSION,
      },
    };
  }

  // Validate against schema
  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    return {
      ok: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: `Config validation failed: ${formatIssues(result.error.issues)}`,
        issues: result.error.issues,
      },
    };
  }

  return { ok: true, value: result.data };
}

/**
 * Load config, falling back to defaults when the file does not exist.
 */
export async function loadConfigOrDefault(
  filePath: string
): Promise<LoadResult<Config>> {
  const result = await loadConfigFromPath(filePath);
  if (!result.ok && result.error.code === 'NOT_FOUND') {
    return { ok: true, value: createDefaultConfig() };
  }
  return result;
}

function formatIssues(issues: ZodError['issues']): string {
  return issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
