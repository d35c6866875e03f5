export const ERROR_SCHEMA_VERSION = '1';

const RESERVED_KEYS = new Set<string>(['schemaVersion', 'name', 'code', 'message', 'hint', 'context']);

/** Drops context keys that would shadow top-level fields of a serialized error. */
export function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  topLevelKeys: readonly string[] = []
): Record<string, string> {
  if (!context) return {};
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (RESERVED_KEYS.has(key) || topLevelKeys.includes(key)) continue;
    sanitized[key] = value;
  }
  return sanitized;
}
