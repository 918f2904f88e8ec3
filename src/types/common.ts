import { z } from 'zod';

/**
 * Paged listing envelope returned by every list endpoint. Items live under
 * `_embedded.<key>`; HAL `_links` and other unknown fields are dropped.
 */
const PageEnvelopeSchema = z.object({
  index: z.number().default(0),
  limit: z.number().default(0),
  total: z.number().default(0),
  filter: z.string().nullish(),
  _embedded: z.record(z.unknown()).nullish(),
});

export interface Page<T> {
  index: number;
  limit: number;
  total: number;
  items: T[];
}

export function parsePage<T extends z.ZodTypeAny>(
  raw: unknown,
  embeddedKey: string,
  itemSchema: T,
): Page<z.output<T>> {
  const envelope = PageEnvelopeSchema.parse(raw);
  const items = z.array(itemSchema).parse(envelope._embedded?.[embeddedKey] ?? []);
  return {
    index: envelope.index,
    limit: envelope.limit,
    total: envelope.total,
    items,
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads `_embedded.<key>` or the doubly nested `_embedded.<key>._embedded.<key>`
 * shape some endpoints use for sub-collections.
 */
export function embeddedList(raw: unknown, key: string): unknown[] {
  if (!isRecord(raw) || !isRecord(raw._embedded)) {
    return [];
  }
  const entry = raw._embedded[key];
  if (Array.isArray(entry)) {
    return entry;
  }
  if (isRecord(entry) && isRecord(entry._embedded)) {
    const nested = entry._embedded[key];
    return Array.isArray(nested) ? nested : [];
  }
  return [];
}

/**
 * Moves values from wire aliases to canonical keys when the canonical key is absent.
 */
export function renameKeys(aliases: Record<string, string>) {
  return (value: unknown): unknown => {
    if (!isRecord(value)) {
      return value;
    }
    const result: Record<string, unknown> = { ...value };
    for (const [alias, canonical] of Object.entries(aliases)) {
      if (result[canonical] === undefined && result[alias] !== undefined) {
        result[canonical] = result[alias];
      }
    }
    return result;
  };
}
