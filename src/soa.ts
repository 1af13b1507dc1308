import dns from 'node:dns';
import { DNS_TTL } from './constants.js';
import { stripTrailingDot } from './domain.js';

/** Fetch the SOA of a zone as a zone-file parameter, asking the given nameservers */
export type SoaLookup = (
  domain: string,
  nameservers: string[]
) => Promise<string | null>;

/**
 * Look up a zone's SOA directly on its authoritative nameservers.
 *
 * Uses Node.js `dns.promises`. The nameserver names are resolved first, then
 * a dedicated resolver is pointed at them. Returns `null` when the zone has no
 * SOA there yet.
 */
export const lookupSoa: SoaLookup = async (domain, nameservers) => {
  const addresses = (
    await Promise.all(
      nameservers.map((ns) =>
        dns.promises.resolve4(ns).catch((): string[] => [])
      )
    )
  ).flat();

  const resolver = new dns.promises.Resolver();
  if (addresses.length > 0) {
    resolver.setServers(addresses);
  }

  try {
    const soa = await resolver.resolveSoa(domain);
    return [
      `${stripTrailingDot(soa.nsname)}.`,
      `${stripTrailingDot(soa.hostmaster)}.`,
      soa.serial,
      soa.refresh,
      soa.retry,
      soa.expire,
      soa.minttl,
    ].join(' ');
  } catch {
    return null;
  }
};

/** TTL carried by an SOA parameter: its seventh field, or the default */
export function soaTtl(soa: string | null): number {
  const field = soa?.trim().split(/\s+/)[6];
  const ttl = field === undefined ? NaN : Number.parseInt(field, 10);
  return Number.isNaN(ttl) ? DNS_TTL : ttl;
}
