import { z } from 'zod';
import { fetchAllPages } from './api.js';
import type { LinodeApi } from './api.js';
import type { Logger } from './logger.js';

export const linodeZoneSchema = z
  .object({
    id: z.union([z.number(), z.string()]).transform(String),
    domain: z.string(),
    type: z.string().optional(),
    status: z.string().optional(),
    soa_email: z.string().nullish(),
  })
  .passthrough();

export type ZoneMetadataEntry = z.infer<typeof linodeZoneSchema>;

export interface ZoneMetaCache {
  /** Provider identifier of a zone, `null` when the credential does not own it */
  zoneId(domain: string): Promise<string | null>;
  /** Everything Linode reported about a zone */
  zoneMeta(domain: string): Promise<ZoneMetadataEntry | null>;
}

/** Fetch every zone visible to the credential */
export function fetchAllZones(api: LinodeApi): Promise<ZoneMetadataEntry[]> {
  return fetchAllPages(api, 'domains', linodeZoneSchema);
}

/**
 * Lazily loaded index of zones by domain name.
 *
 * Entries are merged in and never evicted; a miss triggers a full listing so
 * zones created since the last pass are picked up.
 */
export function createZoneMetaCache(api: LinodeApi, logger?: Logger): ZoneMetaCache {
  const entries = new Map<string, ZoneMetadataEntry>();

  async function populate(): Promise<void> {
    const zones = await fetchAllZones(api);
    for (const zone of zones) {
      entries.set(zone.domain.toLowerCase(), zone);
    }
    logger?.debug({ zones: zones.length }, 'zone metadata cache populated');
  }

  async function zoneMeta(domain: string): Promise<ZoneMetadataEntry | null> {
    const key = domain.toLowerCase();
    if (!entries.has(key)) {
      await populate();
    }
    return entries.get(key) ?? null;
  }

  return {
    zoneMeta,

    async zoneId(domain) {
      const meta = await zoneMeta(domain);
      return meta ? meta.id : null;
    },
  };
}
