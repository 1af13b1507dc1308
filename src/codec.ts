import { z } from 'zod';
import { buildRecord, isRecordType } from './canonicalize.js';
import { DNS_TTL } from './constants.js';
import { UnsupportedRecordTypeError } from './errors.js';
import type { CanonicalRecord } from './types.js';

/** A record as Linode returns it from `domains/{id}/records` */
export const linodeRecordSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
  type: z.string(),
  name: z.string().default(''),
  target: z.string().default(''),
  priority: z.number().nullish(),
  weight: z.number().nullish(),
  port: z.number().nullish(),
  service: z.string().nullish(),
  protocol: z.string().nullish(),
  tag: z.string().nullish(),
  ttl_sec: z.number().default(0),
});

export type LinodeRecord = z.infer<typeof linodeRecordSchema>;

type Common = { ttl_sec: number };

/** Request body for creating or updating a record, shaped per type */
export type LinodeRecordFields =
  | (Common & {
      type: 'A' | 'AAAA' | 'CNAME' | 'TXT' | 'NS' | 'PTR';
      name: string;
      target: string;
    })
  | (Common & { type: 'MX'; name: string; priority: number; target: string })
  | (Common & {
      type: 'SRV';
      protocol: string;
      service: string;
      target: string;
      priority: number;
      weight: number;
      port: number;
    })
  | (Common & { type: 'CAA'; name: string; tag: string; target: string });

/**
 * Format a record the way Linode expects it on create and update.
 *
 * SRV records carry no `name`: Linode derives it from service and protocol.
 * CAA flags are not sent; Linode always stores 0.
 */
export function encodeRecord(record: CanonicalRecord): LinodeRecordFields {
  const ttl_sec = record.ttl;

  switch (record.type) {
    case 'A':
    case 'AAAA':
    case 'CNAME':
    case 'TXT':
    case 'NS':
    case 'PTR':
      return {
        type: record.type,
        ttl_sec,
        name: record.name,
        target: record.parameter,
      };
    case 'MX':
      return {
        type: record.type,
        ttl_sec,
        name: record.name,
        priority: Math.trunc(record.meta.priority),
        target: record.meta.data,
      };
    case 'SRV':
      return {
        type: record.type,
        ttl_sec,
        protocol: record.meta.protocol.replace(/^_+/, ''),
        service: record.meta.service,
        target: record.meta.data,
        priority: Math.trunc(record.meta.priority),
        weight: Math.trunc(record.meta.weight),
        port: Math.trunc(record.meta.port),
      };
    case 'CAA':
      return {
        type: record.type,
        ttl_sec,
        name: record.name,
        tag: record.meta.tag,
        target: record.meta.data.replace(/^"+|"+$/g, ''),
      };
    default:
      throw new UnsupportedRecordTypeError(record.type);
  }
}

/** Render a provider record's value as a single-line zone-file parameter */
export function decodeParameter(r: LinodeRecord): string {
  switch (r.type.toUpperCase()) {
    case 'CAA':
      // Linode does not report flags
      return `0 ${r.tag ?? ''} ${r.target}`;
    case 'SRV':
      return `${r.priority ?? 0} ${r.weight ?? 0} ${r.port ?? 0} ${r.target}`;
    case 'MX':
      return `${r.priority ?? 0} ${r.target}`;
    default:
      return r.target;
  }
}

/** Owner name of a provider record relative to its zone */
export function decodeName(r: LinodeRecord): string {
  if (r.type.toUpperCase() !== 'SRV' || r.name.startsWith('_')) return r.name;
  if (!r.service || !r.protocol) return r.name;

  const owner = `_${r.service.replace(/^_+/, '')}._${r.protocol.replace(/^_+/, '')}`;
  return r.name ? `${owner}.${r.name}` : owner;
}

/**
 * Turn a provider record back into a canonical one, carrying its identifier
 * in `meta.id`.
 *
 * Throws `UnsupportedRecordTypeError` for a type the host does not model and
 * `ValidationError` when the stored value cannot be parsed.
 */
export function decodeRecord(r: LinodeRecord, zone: string): CanonicalRecord {
  const type = r.type.toUpperCase();
  if (!isRecordType(type)) {
    throw new UnsupportedRecordTypeError(r.type);
  }

  return buildRecord(
    { zone, name: decodeName(r).toLowerCase(), ttl: r.ttl_sec || DNS_TTL },
    type,
    decodeParameter(r),
    { id: r.id }
  );
}
