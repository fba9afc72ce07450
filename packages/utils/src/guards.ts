/**
 * Type Guards
 */

export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

/**
 * Narrow a caught value to an Error, wrapping anything else.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
