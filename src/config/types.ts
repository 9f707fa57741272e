/**
 * Config schema definitions using Zod.
 * Defines the optional per-catalog config file.
 *
 * @module src/config/types
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Current config version */
export const CONFIG_VERSION = '1.0';

/** Default entry names skipped while walking */
export const DEFAULT_EXCLUDES: readonly string[] = [
  'node_modules',
  '.git',
  '__pycache__',
  '.DS_Store',
  'Thumbs.db',
];

// ─────────────────────────────────────────────────────────────────────────────
// Config Schema
// ─────────────────────────────────────────────────────────────────────────────

export const ConfigSchema = z.object({
  /** Config format version */
  version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),

  /** Entry names or patterns skipped by the walker */
  exclude: z
    .array(z.string().min(1, 'Exclude entries cannot be empty'))
    .default([...DEFAULT_EXCLUDES]),

  /** Walk entries whose name starts with "." */
  includeHidden: z.boolean().default(false),

  /** Report a hash match whose recorded path still exists as a duplicate */
  detectDuplicates: z.boolean().default(false),
});

export type Config = z.infer<typeof ConfigSchema>;
