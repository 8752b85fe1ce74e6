/**
 * Identifier helpers.
 *
 * Parsers number entities per call (`rule_0`, `binding_3`); entities created
 * by edit operations get a time-based id that cannot collide with those.
 *
 * @module ids
 */

/**
 * Generate a unique identifier.
 * Format: <prefix>_<timestamp>_<random>
 * Example: binding_1699887123456_a7b3c9d
 */
export function generateId(prefix: string): string {
  const timestamp = Date.now();
  const randomId = Math.random().toString(36).substring(2, 9).padEnd(7, "0"); // 7 chars
  return `${prefix}_${timestamp}_${randomId}`;
}
