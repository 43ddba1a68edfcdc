const UNSIGNED_PATTERN = /^\+?[0-9]+$/;

/**
 * Parse a base-10 unsigned integer token. Returns null for anything that is
 * not one, including values past Number.MAX_SAFE_INTEGER.
 * Surrounding whitespace is not stripped.
 */
export function parseUnsigned(token: string): number | null {
  if (!UNSIGNED_PATTERN.test(token)) return null;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : null;
}
