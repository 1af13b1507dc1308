export { linode, listLinodeZones } from './providers/linode.js';
export { createLinodeApi, fetchAllPages } from './api.js';
export { canonicalizeRecord, canonicalizeQuery } from './canonicalize.js';
export { encodeRecord, decodeRecord, decodeParameter } from './codec.js';
export { createZoneMetaCache } from './zone-cache.js';
export { createRecordCache, getCacheKey } from './record-cache.js';
export { lookupSoa } from './soa.js';
export { validateLinodeKey } from './validate-key.js';
export { loadConfig } from './config.js';
export { getLogger, setLogLevel } from './logger.js';
export { normalizeZone, toRelativeName, toFqdn } from './domain.js';
export {
  DnsAdapterError,
  ValidationError,
  ZoneNotFoundError,
  RecordNotFoundError,
  UnsupportedRecordTypeError,
  RequestError,
  ProviderError,
  renderMessage,
} from './errors.js';
export {
  DNS_TTL,
  LINODE_API,
  LINODE_NAMESERVERS,
  PERMITTED_RECORD_TYPES,
} from './constants.js';
export type { DnsZoneProvider } from './provider.js';
export type {
  LinodeOptions,
  LinodeDnsProvider,
  LinodeZone,
} from './providers/linode.js';
export type { LinodeApi, HttpMethod, ApiResponse } from './api.js';
export type { LinodeRecord, LinodeRecordFields } from './codec.js';
export type { ZoneMetaCache, ZoneMetadataEntry } from './zone-cache.js';
export type { RecordCache } from './record-cache.js';
export type { SoaLookup } from './soa.js';
export type { ZoneSynthesizer } from './axfr.js';
export type { KeyValidation } from './validate-key.js';
export type { AdapterConfig } from './config.js';
export type {
  CanonicalRecord,
  RecordType,
  RecordQuery,
  RecordPatch,
  RecordInput,
  ExistingRecord,
  MxMeta,
  SrvMeta,
  CaaMeta,
  BaseMeta,
} from './types.js';
