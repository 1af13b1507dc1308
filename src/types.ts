import type { PERMITTED_RECORD_TYPES } from './constants.js';

/** Every resource record type the host knows about */
export type RecordType =
  | 'A'
  | 'AAAA'
  | 'CAA'
  | 'CNAME'
  | 'MX'
  | 'NS'
  | 'PTR'
  | 'SRV'
  | 'TXT'
  | 'ANY';

/** Record types this provider accepts */
export type PermittedRecordType = (typeof PERMITTED_RECORD_TYPES)[number];

/** Types whose parameter is sent to the provider as-is */
export type PlainRecordType = Exclude<RecordType, 'MX' | 'SRV' | 'CAA'>;

interface RecordBase {
  /** Owning domain, no trailing dot */
  zone: string;
  /** Relative subdomain, `''` for the apex */
  name: string;
  /** Canonical value, shape depends on `type` */
  parameter: string;
  ttl: number;
}

/** Provider-assigned fields every record may carry */
export interface BaseMeta {
  id?: string;
}

export interface MxMeta extends BaseMeta {
  priority: number;
  data: string;
}

export interface SrvMeta extends BaseMeta {
  priority: number;
  weight: number;
  port: number;
  data: string;
  /** Service label without its leading underscore */
  service: string;
  /** Protocol label without its leading underscore */
  protocol: string;
}

export interface CaaMeta extends BaseMeta {
  flags: number;
  tag: string;
  data: string;
}

export interface PlainRecord extends RecordBase {
  type: PlainRecordType;
  meta: BaseMeta;
}

export interface MxRecord extends RecordBase {
  type: 'MX';
  meta: MxMeta;
}

export interface SrvRecord extends RecordBase {
  type: 'SRV';
  meta: SrvMeta;
}

export interface CaaRecord extends RecordBase {
  type: 'CAA';
  meta: CaaMeta;
}

/** Host-normalized representation of one resource record */
export type CanonicalRecord = PlainRecord | MxRecord | SrvRecord | CaaRecord;

/** Addresses an existing record; an omitted parameter matches any value */
export interface RecordQuery {
  zone: string;
  name: string;
  type: string;
  parameter?: string;
  meta?: BaseMeta;
}

/** Sparse change applied on top of an existing record */
export interface RecordPatch {
  name?: string;
  type?: string;
  parameter?: string;
  ttl?: number;
}

/** Raw record input before canonicalization */
export interface RecordInput {
  zone: string;
  name: string;
  type: string;
  parameter: string;
  ttl?: number;
}

/** A record already present in a zone, as the host describes it */
export interface ExistingRecord {
  name: string;
  type: string;
  parameter: string;
  ttl?: number;
  meta?: BaseMeta;
}
