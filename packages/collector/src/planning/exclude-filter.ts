import type { EntityRecord } from '../store/types.js';
import type { ExcludeFilter } from './types.js';

type CollectedIdLookup = (entityId: string) => ReadonlySet<string>;

/**
 * Ids already stored per entity, handed to the crawler so it skips them at
 * the source. Entities with nothing collected get no entry.
 */
export function buildExcludeFilter(
  entities: readonly Pick<EntityRecord, 'id'>[],
  collectedIds: CollectedIdLookup,
): ExcludeFilter {
  const filter: ExcludeFilter = new Map();

  for (const entity of entities) {
    const ids = collectedIds(entity.id);
    if (ids.size === 0) {
      continue;
    }

    filter.set(entity.id, [...ids].sort());
  }

  return filter;
}

export function excludeFilterToRecord(
  filter: ExcludeFilter,
): Record<string, string[]> {
  return Object.fromEntries(filter);
}

export type { CollectedIdLookup };
