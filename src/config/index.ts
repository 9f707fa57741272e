/**
 * Config module public API.
 *
 * @module src/config
 */

export { createDefaultConfig } from './defaults';
// Loading
export {
  type LoadError,
  type LoadResult,
  loadConfigFromPath,
  loadConfigOrDefault,
} from './loader';
// Saving
export { type SaveError, type SaveResult, saveConfigToPath } from './saver';
// Types and schemas
export {
  CONFIG_VERSION,
  type Config,
  ConfigSchema,
  DEFAULT_EXCLUDES,
} from './types';
