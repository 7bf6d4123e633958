// Narrowing helpers for vCloud Director JSON payloads
export type JsonObject = { [key: string]: unknown };

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function objectAt(source: unknown, key: string): JsonObject | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return isJsonObject(value) ? value : undefined;
}

/** Objects in `source[key]`; a single object is treated as a one-element list. */
export function arrayAt(source: unknown, key: string): JsonObject[] {
  if (!isJsonObject(source)) return [];
  const value = source[key];
  if (Array.isArray(value)) return value.filter(isJsonObject);
  return isJsonObject(value) ? [value] : [];
}

export function stringAt(source: unknown, key: string): string | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

export function numberAt(source: unknown, key: string): number | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return typeof value === 'number' ? value : undefined;
}

export function booleanAt(source: unknown, key: string): boolean | undefined {
  if (!isJsonObject(source)) return undefined;
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

/** Walk nested objects, e.g. `pathAt(vdc, 'tasks', 'task')`. */
export function pathAt(source: unknown, ...keys: string[]): unknown {
  let current: unknown = source;
  for (const key of keys) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return current;
}
