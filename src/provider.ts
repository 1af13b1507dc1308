import type {
  CanonicalRecord,
  ExistingRecord,
  RecordPatch,
} from './types.js';

/** Zone and record lifecycle a host control panel drives a DNS provider through */
export interface DnsZoneProvider {
  /** Create a record; resolves to it with its provider identifier in `meta.id` */
  addRecord(
    zone: string,
    name: string,
    type: string,
    parameter: string,
    ttl?: number
  ): Promise<CanonicalRecord>;
  /** Delete a record; an omitted parameter removes the first record of that name and type */
  removeRecord(
    zone: string,
    name: string,
    type: string,
    parameter?: string
  ): Promise<void>;
  /** Apply a sparse change to an existing record in one write */
  updateRecord(
    zone: string,
    old: ExistingRecord,
    patch: RecordPatch
  ): Promise<CanonicalRecord>;
  /** Create a zone; resolves to its identifier once the provider reports it */
  addZone(domain: string): Promise<string | null>;
  /** Delete a zone; resolves to `false` when it was already gone */
  removeZone(domain: string): Promise<boolean>;
  /** Zone-file rendering of a zone, `null` when it cannot be produced */
  zoneAxfr(domain: string): Promise<string | null>;
  /** Every record known for a zone */
  getZoneRecords(domain: string): Promise<CanonicalRecord[]>;
  getHostingNameservers(domain?: string): string[];
  /** Whether a CNAME may not sit at the zone apex */
  hasCnameApexRestriction(): boolean;
}
