export type JsonValue = string | number | boolean | JsonValue[] | { [key: string]: JsonValue };

/**
 * Deep copy of `value` with every null or undefined field removed, so absent
 * values are omitted from tool output instead of showing up as `null`.
 * Array elements that are null are dropped as well.
 */
export function compactJson(value: unknown): JsonValue | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const compacted = compactJson(item);
      if (compacted !== undefined) {
        items.push(compacted);
      }
    }
    return items;
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, field] of Object.entries(value)) {
      const compacted = compactJson(field);
      if (compacted !== undefined) {
        result[key] = compacted;
      }
    }
    return result;
  }
  return undefined;
}
