// src/utils/guards.ts

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Landscape-style YAML wraps each node in a single key (`- item: {...}`)
 */
export function unwrap(key: string): (value: unknown) => unknown {
  return (value) => (isRecord(value) && isRecord(value[key]) ? value[key] : value);
}

export function firstString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === 'string' && value.trim() !== '') return value;
  }
  return undefined;
}
