/**
 * Taxonomy and tag name normalization.
 *
 * Taxonomy names are case-insensitive: trimmed, NFC-normalized and
 * lower-cased before they reach the store. Tag values are free-form; they are
 * trimmed and NFC-normalized, and compared case-insensitively by the store.
 *
 * @module src/core/taxonomy
 */

/**
 * Normalize a taxonomy name.
 * - Trim whitespace
 * - NFC unicode normalization
 * - Lowercase
 */
export function normalizeTaxonomyName(name: string): string {
  return name.trim().normalize('NFC').toLowerCase();
}

/**
 * Normalize a tag value. Case is preserved.
 */
export function normalizeTagValue(value: string): string {
  return value.trim().normalize('NFC');
}

/**
 * Check a normalized name is usable (non-empty, no control characters).
 */
export function isValidName(name: string): boolean {
  return name.length > 0 && !/[\u0000-\u001f]/.test(name);
}
