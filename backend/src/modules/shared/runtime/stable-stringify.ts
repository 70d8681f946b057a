/**
 * Deterministic JSON stringification with stable key ordering.
 * Compact output: no indentation, no whitespace between tokens.
 */

export function stableStringify(value: unknown): string {
  return JSON.stringify(value, stableReplacer);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stableReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = value[key];
  }
  return sorted;
}
