import { fetchAllPages } from './api.js';
import type { LinodeApi } from './api.js';
import {
  decodeName,
  decodeParameter,
  decodeRecord,
  linodeRecordSchema,
} from './codec.js';
import type { LinodeRecord } from './codec.js';
import { toFqdn } from './domain.js';
import { DnsAdapterError, RequestError } from './errors.js';
import type { Logger } from './logger.js';
import type { RecordCache } from './record-cache.js';
import { soaTtl } from './soa.js';
import type { SoaLookup } from './soa.js';
import type { ZoneMetaCache } from './zone-cache.js';

export interface ZoneSynthesizerOptions {
  api: LinodeApi;
  zones: ZoneMetaCache;
  cache: RecordCache;
  lookupSoa: SoaLookup;
  nameservers: string[];
  logger: Logger;
}

export interface ZoneSynthesizer {
  /**
   * List a zone and refill its cache. Listing failures other than 401 are
   * thrown as `RequestError`.
   */
  load(domain: string): Promise<string | null>;
  /** Like `load`, but a failed listing is logged and gives `null` */
  zoneAxfr(domain: string): Promise<string | null>;
}

/**
 * Build zone-file text for a domain out of its Linode records.
 *
 * The SOA and NS preamble comes from the authoritative nameservers, since
 * Linode does not list those records. Every record seen is written to the
 * record cache, replacing what was cached for the zone before.
 *
 * Text is `null` when the zone is unknown or empty. A 401 on the listing
 * counts as an unknown zone.
 */
export function createZoneSynthesizer(
  options: ZoneSynthesizerOptions
): ZoneSynthesizer {
  const { api, zones, cache, nameservers, logger } = options;

  async function listRecords(domain: string): Promise<LinodeRecord[] | null> {
    try {
      const zoneId = await zones.zoneId(domain);
      if (!zoneId) return null;

      return await fetchAllPages(
        api,
        `domains/${zoneId}/records`,
        linodeRecordSchema
      );
    } catch (err) {
      if (err instanceof RequestError && err.status === 401) {
        logger.debug({ domain }, 'zone listing unauthorized, treating as absent');
        return null;
      }
      throw err;
    }
  }

  async function load(domain: string): Promise<string | null> {
    const records = await listRecords(domain);
    if (!records) return null;

    cache.reset(domain);
    if (records.length === 0) return null;

    const lines: string[] = [];
    const soa = await options.lookupSoa(domain, nameservers);
    const ttl = soaTtl(soa);
    if (soa) {
      lines.push(`${domain}.\t${ttl}\tIN\tSOA\t${soa}`);
    }
    for (const ns of nameservers) {
      lines.push(`${domain}.\t${ttl}\tIN\tNS\t${ns}.`);
    }

    for (const r of records) {
      const parameter = decodeParameter(r);
      const fqdn = toFqdn(decodeName(r), domain);
      lines.push(`${fqdn}\t${r.ttl_sec}\tIN\t${r.type}\t${parameter}`);

      try {
        cache.add(decodeRecord(r, domain));
      } catch (err) {
        if (!(err instanceof DnsAdapterError)) throw err;
        logger.warn(
          { domain, id: r.id, type: r.type, reason: err.message },
          'record not cached'
        );
      }
    }

    return lines.join('\n');
  }

  return {
    load,

    async zoneAxfr(domain) {
      try {
        return await load(domain);
      } catch (err) {
        if (!(err instanceof RequestError)) throw err;
        logger.error(
          { domain, status: err.status },
          'Failed to transfer DNS records from Linode - try again later'
        );
        return null;
      }
    },
  };
}
