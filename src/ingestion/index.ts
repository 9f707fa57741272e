/**
 * Ingestion subsystem - public exports.
 *
 * @module src/ingestion
 */

// Hasher
export { formatModifiedAt, hashFile } from './hasher';
// Reconciler
export { Reconciler } from './reconcile';
export type { ReconcilerOptions } from './reconcile';
// Registrar
export { Registrar } from './register';
export type { RegisterAllResult, RegistrarOptions } from './register';
// Renamer
export { Renamer } from './rename';
export type { RenameAllResult, RenameOptions, RenameOutcome } from './rename';
// Types
export type {
  CheckResult,
  Classification,
  FileFingerprint,
  Hasher,
  IngestWarning,
  ReconcileReport,
  SkippedEntry,
  WalkConfig,
  WalkEntry,
  WalkerPort,
} from './types';
export { skippedToWarnings } from './types';
// Walker
export { defaultWalker, FileWalker, isGlobPattern, splitGlob } from './walker';
