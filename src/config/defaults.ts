/**
 * Default config factory.
 *
 * @module src/config/defaults
 */

import { CONFIG_VERSION, type Config, DEFAULT_EXCLUDES } from './types';

/**
 * Create a default config object.
 * Used when a catalog has no config file, and written by init.
 */
export function createDefaultConfig(): Config {
  return {
    version: CONFIG_VERSION,
    exclude: [...DEFAULT_EXCLUDES],
    includeHidden: false,
    detectDuplicates: false,
  };
}
