/**
 * Store layer public exports.
 *
 * @module src/store
 */

export { getSchemaVersion, migrations, runMigrations } from './migrations';
export type { Migration } from './migrations';
export { SqliteAdapter } from './sqlite/adapter';
export type {
  CatalogStatus,
  FileInput,
  FileRecordRow,
  FileTagRow,
  MigrationResult,
  StoreError,
  StoreErrorCode,
  StorePort,
  StoreResult,
  TagUsageRow,
  TaxonomyRow,
  WithTransaction,
} from './types';
export { StoreOperationError, err, isUserError, mustOk, ok } from './types';
