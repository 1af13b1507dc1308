import type { CanonicalRecord, RecordQuery } from './types.js';

/** Per-zone store of records with known provider identifiers */
export interface RecordCache {
  add(record: CanonicalRecord): void;
  remove(record: RecordQuery): boolean;
  /** First cached record matching name and type, and parameter when given */
  find(query: RecordQuery): CanonicalRecord | undefined;
  /** Copies of a zone's cached records */
  records(zone: string): CanonicalRecord[];
  /** Whether the zone has been listed in full */
  isLoaded(zone: string): boolean;
  /** Drop a zone's records and mark it as freshly listed */
  reset(zone: string): void;
  /** Forget a zone entirely */
  clear(zone: string): void;
}

/** Cache key of a record: name, type and parameter */
export function getCacheKey(record: {
  name: string;
  type: string;
  parameter?: string;
}): string {
  return [
    record.name.toLowerCase(),
    record.type.toUpperCase(),
    record.parameter ?? '',
  ].join('|');
}

export function createRecordCache(): RecordCache {
  const zones = new Map<string, Map<string, CanonicalRecord>>();
  const loaded = new Set<string>();

  function zoneMap(zone: string): Map<string, CanonicalRecord> {
    let map = zones.get(zone);
    if (!map) {
      map = new Map();
      zones.set(zone, map);
    }
    return map;
  }

  function matches(record: CanonicalRecord, query: RecordQuery): boolean {
    if (record.name !== query.name || record.type !== query.type.toUpperCase()) {
      return false;
    }
    if (query.meta?.id !== undefined) return record.meta.id === query.meta.id;
    return query.parameter === undefined || record.parameter === query.parameter;
  }

  return {
    add(record) {
      zoneMap(record.zone).set(getCacheKey(record), record);
    },

    remove(query) {
      const map = zones.get(query.zone);
      if (!map) return false;
      if (query.parameter !== undefined) {
        return map.delete(getCacheKey(query));
      }
      for (const [key, record] of map) {
        if (matches(record, query)) return map.delete(key);
      }
      return false;
    },

    find(query) {
      const map = zones.get(query.zone);
      if (!map) return undefined;
      if (query.parameter !== undefined) {
        const hit = map.get(getCacheKey(query));
        if (hit) return hit;
      }
      for (const record of map.values()) {
        if (matches(record, query)) return record;
      }
      return undefined;
    },

    records(zone) {
      return [...(zones.get(zone)?.values() ?? [])].map((r) => structuredClone(r));
    },

    isLoaded(zone) {
      return loaded.has(zone);
    },

    reset(zone) {
      zones.set(zone, new Map());
      loaded.add(zone);
    },

    clear(zone) {
      zones.delete(zone);
      loaded.delete(zone);
    },
  };
}
