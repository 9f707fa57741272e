/**
 * Terminal colors with --no-color support.
 *
 * @module src/cli/colors
 */

import pc from 'picocolors';

// Track whether colors are enabled (global state for CLI lifetime)
let colorsEnabled = true;

/**
 * Set colors enabled/disabled.
 * Called by applyGlobalOptions based on --no-color flag and NO_COLOR env.
 */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

// Wrapper functions that respect --no-color
function wrap(fn: (s: string) => string): (s: string) => string {
  return (s: string) => (colorsEnabled ? fn(s) : s);
}

// Primary styles
export const bold = wrap(pc.bold);

// Semantic colors
export const warning = wrap(pc.yellow);

// Reconciliation labels
export const added = wrap(pc.green);
export const moved = wrap(pc.yellow);
export const duplicate = wrap(pc.magenta);
export const missing = wrap(pc.red);

// Combined styles
export const label = (s: string): string => bold(s);
