import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { createLinodeApi } from '../api.js';
import type { LinodeApi } from '../api.js';
import { createZoneSynthesizer } from '../axfr.js';
import { canonicalizeQuery, canonicalizeRecord } from '../canonicalize.js';
import type { CanonicalizeOptions } from '../canonicalize.js';
import { encodeRecord } from '../codec.js';
import {
  DNS_TTL,
  LINODE_DELETE_OK,
  LINODE_NAMESERVERS,
  ZONE_POLL_ATTEMPTS,
  ZONE_POLL_INTERVAL_MS,
} from '../constants.js';
import { normalizeZone } from '../domain.js';
import {
  ProviderError,
  RecordNotFoundError,
  RequestError,
  ZoneNotFoundError,
} from '../errors.js';
import { createChildLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { DnsZoneProvider } from '../provider.js';
import { createRecordCache } from '../record-cache.js';
import type { RecordCache } from '../record-cache.js';
import { createRecordIdResolver } from '../resolver.js';
import { lookupSoa } from '../soa.js';
import type { SoaLookup } from '../soa.js';
import { createZoneMetaCache, fetchAllZones } from '../zone-cache.js';
import type { ZoneMetaCache } from '../zone-cache.js';

export interface LinodeOptions {
  apiToken: string;
  /** Override the API root, mainly for tests */
  baseUrl?: string;
  /** TTL for records added without one */
  defaultTtl?: number;
  /** Zone lookups after creating a zone before giving up */
  zonePollAttempts?: number;
  /** Pause between those lookups */
  zonePollIntervalMs?: number;
  /** Where the SOA for zone text comes from; defaults to asking the nameservers */
  lookupSoa?: SoaLookup;
  logger?: Logger;
  /** Replaces the pause between zone lookups, for tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface LinodeZone {
  id: string;
  domain: string;
}

/** The adapter together with the caches it keeps, exposed for inspection */
export interface LinodeDnsProvider extends DnsZoneProvider {
  readonly zones: ZoneMetaCache;
  readonly records: RecordCache;
}

const createdRecordSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
});

/**
 * List all zones (domains) accessible with the given API token.
 */
export async function listLinodeZones(
  apiToken: string,
  baseUrl?: string
): Promise<LinodeZone[]> {
  if (!apiToken) {
    throw new Error('Linode: apiToken is required');
  }

  const zones = await fetchAllZones(createLinodeApi({ apiToken, baseUrl }));
  return zones.map((z) => ({ id: z.id, domain: z.domain }));
}

/**
 * Create a Linode DNS provider adapter.
 *
 * Uses Linode API v4 with native `fetch` (Node 18+). Zone identifiers and
 * record identifiers are cached for the life of the adapter, so one instance
 * should serve all operations of a process.
 */
export function linode(options: LinodeOptions): LinodeDnsProvider {
  const { apiToken } = options;

  if (!apiToken) {
    throw new Error('Linode: apiToken is required');
  }

  const logger = options.logger ?? createChildLogger({ provider: 'linode' });
  const api: LinodeApi = createLinodeApi({
    apiToken,
    baseUrl: options.baseUrl,
    logger,
  });
  const pollAttempts = options.zonePollAttempts ?? ZONE_POLL_ATTEMPTS;
  const pollInterval = options.zonePollIntervalMs ?? ZONE_POLL_INTERVAL_MS;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const canonical: CanonicalizeOptions = {
    defaultTtl: options.defaultTtl ?? DNS_TTL,
    cnameApexRestriction: true,
  };

  const zones = createZoneMetaCache(api, logger);
  const records = createRecordCache();
  const synthesizer = createZoneSynthesizer({
    api,
    zones,
    cache: records,
    lookupSoa: options.lookupSoa ?? lookupSoa,
    nameservers: LINODE_NAMESERVERS,
    logger,
  });
  const resolver = createRecordIdResolver(records, synthesizer.load);

  async function call<T>(message: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RequestError) throw new ProviderError(message, err);
      throw err;
    }
  }

  async function requireZoneId(zone: string): Promise<string> {
    const id = await zones.zoneId(zone);
    if (!id) throw new ZoneNotFoundError(zone);
    return id;
  }

  function fqdn(name: string, zone: string): string {
    return [name, zone].filter(Boolean).join('.');
  }

  return {
    zones,
    records,

    async addRecord(zone, name, type, parameter, ttl) {
      const record = canonicalizeRecord(
        { zone, name, type, parameter, ttl },
        canonical
      );
      const host = fqdn(record.name, record.zone);
      const message = `Failed to create record \`${host}' (rr: \`${record.type}', param: \`${record.parameter}')`;

      const data = await call(message, async () => {
        const zoneId = await requireZoneId(record.zone);
        return api.do('POST', `domains/${zoneId}/records`, encodeRecord(record));
      });

      const created = createdRecordSchema.safeParse(data);
      if (!created.success) {
        throw new ProviderError(
          message,
          new RequestError(
            200,
            JSON.stringify(data),
            'Linode API answered without a record id'
          )
        );
      }

      record.meta.id = created.data.id;
      records.add(record);
      logger.info(
        { zone: record.zone, name: record.name, type: record.type, id: record.meta.id },
        'record created'
      );
      return structuredClone(record);
    },

    async removeRecord(zone, name, type, parameter) {
      const query = canonicalizeQuery({ zone, name, type, parameter }, canonical);
      const host = fqdn(query.name, query.zone);

      const message = `Failed to delete record \`${host}' type ${query.type}`;

      const id = await call(message, () => resolver.resolve(query));
      if (!id) {
        throw new RecordNotFoundError(
          `Record \`${host}' (rr: \`${query.type}', param: \`${query.parameter ?? ''}') does not exist`
        );
      }
      const res = await call(message, async () => {
        const zoneId = await requireZoneId(query.zone);
        return api.request('DELETE', `domains/${zoneId}/records/${id}`);
      });
      if (res.status !== LINODE_DELETE_OK) {
        throw new ProviderError(
          message,
          new RequestError(
            res.status,
            JSON.stringify(res.data),
            `Linode API answered ${res.status}`
          )
        );
      }

      records.remove({ ...query, meta: { id } });
      logger.info({ zone: query.zone, name: query.name, type: query.type, id }, 'record deleted');
    },

    async updateRecord(zone, old, patch) {
      const current = canonicalizeRecord({ zone, ...old }, canonical);
      if (old.meta?.id) current.meta.id = old.meta.id;

      const merged = canonicalizeRecord(
        {
          zone: current.zone,
          name: patch.name ?? current.name,
          type: patch.type ?? current.type,
          parameter: patch.parameter ?? current.parameter,
          ttl: patch.ttl ?? current.ttl,
        },
        canonical
      );

      const message = `Failed to update record \`${current.name}' on zone \`${current.zone}' (old - rr: \`${current.type}', param: \`${current.parameter}'; new - name: \`${merged.name}', rr: \`${merged.type}', param: \`${merged.parameter}')`;

      const id = await call(message, () => resolver.resolve(current));
      if (!id) {
        throw new RecordNotFoundError(
          `failed to find record ID in Linode zone \`${current.zone}' - does \`${current.name}' (rr: \`${current.type}', parameter: \`${current.parameter}') exist?`
        );
      }

      const body = encodeRecord(merged);
      await call(message, async () => {
        const zoneId = await requireZoneId(current.zone);
        return api.do('PUT', `domains/${zoneId}/records/${id}`, body);
      });

      merged.meta.id = id;
      records.remove(current);
      records.add(merged);
      logger.info({ zone: merged.zone, name: merged.name, type: merged.type, id }, 'record updated');
      return structuredClone(merged);
    },

    async addZone(domain) {
      const zone = normalizeZone(domain);
      await call(`Failed to add zone \`${zone}'`, () =>
        api.do('POST', 'domains', {
          domain: zone,
          type: 'master',
          soa_email: `hostmaster@${zone}`,
        })
      );

      for (let attempt = 1; attempt <= pollAttempts; attempt++) {
        const id = await call(`Failed to look up zone \`${zone}'`, () =>
          zones.zoneId(zone)
        );
        if (id) {
          logger.info({ zone, id }, 'zone created');
          return id;
        }
        if (attempt < pollAttempts) await sleep(pollInterval);
      }

      logger.warn(
        { zone, attempts: pollAttempts },
        'zone created but Linode has not reported it yet'
      );
      return null;
    },

    async removeZone(domain) {
      const zone = normalizeZone(domain);
      const message = `Failed to remove zone \`${zone}'`;
      const id = await call(message, () => zones.zoneId(zone));
      if (!id) {
        logger.warn({ zone }, `Domain ID not found - \`${zone}' already removed?`);
        return false;
      }

      await call(message, () => api.do('DELETE', `domains/${id}`));
      records.clear(zone);
      logger.info({ zone, id }, 'zone removed');
      return true;
    },

    zoneAxfr(domain) {
      return synthesizer.zoneAxfr(normalizeZone(domain));
    },

    async getZoneRecords(domain) {
      const zone = normalizeZone(domain);
      if (!records.isLoaded(zone)) {
        await call(`Failed to list records of zone \`${zone}'`, () =>
          synthesizer.load(zone)
        );
      }
      return records.records(zone);
    },

    getHostingNameservers() {
      return [...LINODE_NAMESERVERS];
    },

    hasCnameApexRestriction() {
      return true;
    },
  };
}
