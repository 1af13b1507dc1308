import type { RecordCache } from './record-cache.js';
import type { RecordQuery } from './types.js';

export interface RecordIdResolver {
  /** Provider identifier of an existing record, `null` when none matches */
  resolve(query: RecordQuery): Promise<string | null>;
}

/**
 * Resolve record identifiers from `meta.id` first, then from the record cache.
 * A zone that has never been listed is synthesized once to fill the cache.
 */
export function createRecordIdResolver(
  cache: RecordCache,
  loadZone: (zone: string) => Promise<unknown>
): RecordIdResolver {
  return {
    async resolve(query) {
      if (query.meta?.id) return query.meta.id;

      if (!cache.isLoaded(query.zone)) {
        await loadZone(query.zone);
      }

      return cache.find(query)?.meta.id ?? null;
    },
  };
}
