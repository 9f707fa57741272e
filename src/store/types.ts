/**
 * Store layer types and interfaces.
 * Defines StorePort (port interface) and all data types for persistence.
 *
 * @module src/store/types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/** Store error codes */
export type StoreErrorCode =
  // Domain errors (surfaced to the user as validation failures)
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'DUPLICATE'
  // Environment errors
  | 'IO_ERROR'
  | 'SCHEMA_ERROR'
  | 'CONNECTION_FAILED'
  | 'QUERY_FAILED'
  | 'TRANSACTION_FAILED';

/** Store error with structured details */
export interface StoreError {
  code: StoreErrorCode;
  message: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

/** Result type for store operations */
export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StoreError };

/** Create a success result */
export function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

/** Create an error result */
export function err<T>(
  code: StoreErrorCode,
  message: string,
  cause?: unknown,
  details?: Record<string, unknown>
): StoreResult<T> {
  return { ok: false, error: { code, message, cause, details } };
}

/** Codes that describe bad user input rather than a broken environment */
const USER_ERROR_CODES: ReadonlySet<StoreErrorCode> = new Set([
  'VALIDATION',
  'NOT_FOUND',
  'DUPLICATE',
]);

export function isUserError(error: StoreError): boolean {
  return USER_ERROR_CODES.has(error.code);
}

/**
 * Thrown by mustOk() so a failed step aborts the surrounding transaction.
 * withTransaction() unwraps it back into the original StoreError.
 */
export class StoreOperationError extends Error {
  readonly storeError: StoreError;

  constructor(storeError: StoreError) {
    super(storeError.message);
    this.storeError = storeError;
    this.name = 'StoreOperationError';
  }
}

/**
 * Unwrap a result or throw StoreOperationError.
 */
export function mustOk<T>(result: StoreResult<T>): T {
  if (!result.ok) {
    throw new StoreOperationError(result.error);
  }
  return result.value;
}

// ─────────────────────────────────────────────────────────────────────────────
// Row Types (DB representations)
// ─────────────────────────────────────────────────────────────────────────────

/** File record row */
export interface FileRecordRow {
  id: number;
  filename: string;
  /** Directory relative to the catalog root ("." for the root) */
  directory: string;
  /** directory/filename, as shown to users */
  path: string;
  contentHash: string;
  sizeBytes: number;
  /** UTC, "YYYY-MM-DD HH:MM:SS" */
  modifiedAt: string;
}

/** Taxonomy row */
export interface TaxonomyRow {
  id: number;
  name: string;
}

/** Tag value with the number of files carrying it */
export interface TagUsageRow {
  id: number;
  name: string;
  fileCount: number;
}

/** Tag attached to a file */
export interface FileTagRow {
  taxonomy: string;
  tag: string;
}

/** Catalog-level counts */
export interface CatalogStatus {
  dbPath: string;
  schemaVersion: number;
  files: number;
  distinctHashes: number;
  totalBytes: number;
  taxonomies: number;
  tags: number;
  associations: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Types
// ─────────────────────────────────────────────────────────────────────────────

/** Input for registering (upserting) a file */
export interface FileInput {
  filename: string;
  directory: string;
  contentHash: string;
  sizeBytes: number;
  modifiedAt: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Migration Types
// ─────────────────────────────────────────────────────────────────────────────

/** Migration result */
export interface MigrationResult {
  applied: number[];
  currentVersion: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transaction Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run several store calls as one all-or-nothing unit.
 * A throw inside fn rolls back every write made inside it.
 */
export type WithTransaction = <T>(
  fn: () => Promise<T>
) => Promise<StoreResult<T>>;

// ─────────────────────────────────────────────────────────────────────────────
// StorePort Interface
// ─────────────────────────────────────────────────────────────────────────────

/**
 * StorePort - Port interface for catalog persistence.
 * Implementations: SQLite adapter (src/store/sqlite/adapter.ts)
 */
export interface StorePort {
  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Open database connection, run migrations and ensure the default
   * taxonomy. Creates the DB file if it doesn't exist. Idempotent.
   */
  open(dbPath: string): Promise<StoreResult<MigrationResult>>;

  /**
   * Close database connection.
   */
  close(): Promise<void>;

  /**
   * Check if database is open.
   */
  isOpen(): boolean;

  withTransaction: WithTransaction;

  // ─────────────────────────────────────────────────────────────────────────
  // Files
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Upsert a file keyed by (directory, filename).
   * Overwrites hash/size/modifiedAt of an existing record.
   */
  registerFile(file: FileInput): Promise<StoreResult<FileRecordRow>>;

  /**
   * Get a file record by its location.
   */
  getFile(
    directory: string,
    filename: string
  ): Promise<StoreResult<FileRecordRow | null>>;

  /**
   * Path of one record with this hash, or null.
   * Which record is returned when several share the hash is unspecified.
   */
  findPathByHash(hash: string): Promise<StoreResult<string | null>>;

  /**
   * All cataloged paths (directory/filename).
   */
  listAllPaths(): Promise<StoreResult<string[]>>;

  /**
   * All file records, ordered by path.
   */
  listFiles(): Promise<StoreResult<FileRecordRow[]>>;

  /**
   * Resolve a record id. NOT_FOUND if the file is not cataloged.
   */
  resolveFileId(
    directory: string,
    filename: string
  ): Promise<StoreResult<number>>;

  /**
   * Move a record to a new path, keeping its id and tags.
   * Returns false when oldPath is not cataloged.
   */
  updateFilePath(
    oldPath: string,
    newPath: string
  ): Promise<StoreResult<boolean>>;

  // ─────────────────────────────────────────────────────────────────────────
  // Taxonomies & Tags
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Create a taxonomy. DUPLICATE if the name exists.
   * Name must already be normalized.
   */
  createTaxonomy(name: string): Promise<StoreResult<TaxonomyRow>>;

  /**
   * Get or create a taxonomy, returning its id.
   */
  getOrCreateTaxonomy(name: string): Promise<StoreResult<number>>;

  /**
   * Get or create a tag under a taxonomy, returning its id.
   */
  getOrCreateTag(
    taxonomyId: number,
    name: string
  ): Promise<StoreResult<number>>;

  /**
   * Link a file to a tag. Returns true if a new link was created.
   */
  associateTag(fileId: number, tagId: number): Promise<StoreResult<boolean>>;

  /**
   * Paths of files carrying tagName under taxonomyName.
   */
  searchByTag(
    taxonomyName: string,
    tagName: string
  ): Promise<StoreResult<string[]>>;

  /**
   * All taxonomies, ordered by name.
   */
  listTaxonomies(): Promise<StoreResult<TaxonomyRow[]>>;

  /**
   * Tags of one taxonomy with usage counts. NOT_FOUND for unknown taxonomy.
   */
  listTags(taxonomyName: string): Promise<StoreResult<TagUsageRow[]>>;

  /**
   * Tags attached to a file.
   */
  getTagsForFile(fileId: number): Promise<StoreResult<FileTagRow[]>>;

  // ─────────────────────────────────────────────────────────────────────────
  // Status
  // ─────────────────────────────────────────────────────────────────────────

  getStatus(): Promise<StoreResult<CatalogStatus>>;
}
