/**
 * Ingestion subsystem types.
 * Defines Walker, Hasher and reconciliation interfaces.
 *
 * @module src/ingestion/types
 */

import type { StoreErrorCode, StoreResult } from '../store/types';

// ─────────────────────────────────────────────────────────────────────────────
// Walker Types
// ─────────────────────────────────────────────────────────────────────────────

/** File entry from walker */
export type WalkEntry = {
  /** Absolute path to file */
  absPath: string;
  /** File size in bytes */
  size: number;
};

/** Walker configuration */
export type WalkConfig = {
  /** Base for relative inputs (default: process.cwd()) */
  cwd?: string;
  /** Entry names or minimatch patterns to skip */
  exclude: string[];
  /** Walk entries whose name starts with "." */
  includeHidden: boolean;
};

/** Skipped entry (for warnings) */
export type SkippedEntry = {
  absPath: string;
  reason: 'MISSING' | 'UNREADABLE' | 'NOT_A_FILE';
  message: string;
};

/** Walker port interface */
export type WalkerPort = {
  /**
   * Expand a file, directory or glob pattern into regular files.
   * Entries are sorted by path.
   */
  expand(
    input: string,
    config: WalkConfig
  ): Promise<{
    entries: WalkEntry[];
    skipped: SkippedEntry[];
  }>;
};

// ─────────────────────────────────────────────────────────────────────────────
// Hasher Types
// ─────────────────────────────────────────────────────────────────────────────

/** Content identity and metadata of one file */
export type FileFingerprint = {
  /** Lower-case hex SHA-256 */
  contentHash: string;
  sizeBytes: number;
  /** UTC, "YYYY-MM-DD HH:MM:SS" */
  modifiedAt: string;
};

export type Hasher = (absPath: string) => Promise<StoreResult<FileFingerprint>>;

// ─────────────────────────────────────────────────────────────────────────────
// Bulk Operation Types
// ─────────────────────────────────────────────────────────────────────────────

/** Per-item failure in a bulk operation */
export type IngestWarning = {
  path: string;
  code: StoreErrorCode;
  message: string;
};

/** Convert walker skips into warnings */
export function skippedToWarnings(skipped: SkippedEntry[]): IngestWarning[] {
  return skipped.map((s) => ({
    path: s.absPath,
    code: s.reason === 'NOT_A_FILE' ? 'VALIDATION' : 'IO_ERROR',
    message: s.message,
  }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Reconciliation Types
// ─────────────────────────────────────────────────────────────────────────────

/** Classification of a filesystem path against the catalog */
export type Classification =
  | { kind: 'new'; path: string }
  | { kind: 'moved'; oldPath: string; newPath: string }
  | { kind: 'duplicate'; path: string; originalPath: string }
  | { kind: 'missing'; path: string };

/** Result of a scan or full verification */
export type ReconcileReport = {
  entries: Classification[];
  /** Paths whose catalog record already points at them */
  unchanged: number;
  warnings: IngestWarning[];
};

/**
 * Result of checking a single file. `path` is the catalog path, or the
 * absolute path for files outside the catalog root.
 */
export type CheckResult =
  | { status: 'exists'; path: string; matchedPath: string }
  | { status: 'new'; path: string };
