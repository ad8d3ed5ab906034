export function isPlainObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolves a dot-separated path against nested mappings.
 * A missing segment, or an intermediate value that is not a mapping,
 * resolves to undefined.
 */
export function resolvePath(
  context: Record<string, unknown>,
  path: string,
): unknown {
  let current: unknown = context;
  for (const segment of path.split('.')) {
    if (!isPlainObject(current) || !(segment in current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}
