import { Logger } from 'pino';
import { isCanonicalId } from '../../utils/id.utils';

/**
 * Call-scoped index over one listing, keyed both by id and by display name.
 * The first item seen for a given name keeps it.
 */
export class LookupIndex<T> {
  private readonly byId = new Map<string, T>();
  private readonly byName = new Map<string, T>();

  constructor(
    items: Iterable<T>,
    idOf: (item: T) => string,
    nameOf: (item: T) => string | null | undefined,
  ) {
    for (const item of items) {
      const id = idOf(item);
      if (!this.byId.has(id)) {
        this.byId.set(id, item);
      }
      const name = nameOf(item);
      if (name && !this.byName.has(name)) {
        this.byName.set(name, item);
      }
    }
  }

  static byEntityName<T extends { id: string; name: string }>(items: Iterable<T>): LookupIndex<T> {
    return new LookupIndex(items, (item) => item.id, (item) => item.name);
  }

  static byColumnName<T extends { id: string; columnName: string }>(items: Iterable<T>): LookupIndex<T> {
    return new LookupIndex(items, (item) => item.id, (item) => item.columnName);
  }

  /**
   * Looks in the map the identifier's shape points to, then in the other one.
   */
  resolve(idOrName: string): T | undefined {
    const [primary, secondary] = isCanonicalId(idOrName)
      ? [this.byId, this.byName]
      : [this.byName, this.byId];
    return primary.get(idOrName) ?? secondary.get(idOrName);
  }

  get size(): number {
    return this.byId.size;
  }
}

/**
 * Linear scan for an exact name. Several matches resolve to the first, with a warning.
 */
export function findFirstByName<T>(
  items: readonly T[],
  name: string,
  nameOf: (item: T) => string | null | undefined,
  logger: Logger,
  kind: string,
): T | undefined {
  const matches = items.filter((item) => nameOf(item) === name);
  if (matches.length > 1) {
    logger.warn({ kind, name, matches: matches.length }, `Multiple ${kind} entries named '${name}', using the first one`);
  }
  return matches[0];
}
