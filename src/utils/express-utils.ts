/**
 * Utility functions for handling Express request values
 */

/**
 * Reduce a route param or query value to a single string
 */
export function toSingleString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    const [first] = value;
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}
