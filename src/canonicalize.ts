import { z } from 'zod';
import { DNS_TTL, PERMITTED_RECORD_TYPES } from './constants.js';
import { normalizeZone, stripTrailingDot, toRelativeName } from './domain.js';
import { ValidationError } from './errors.js';
import { parseCaa, parseMx, parseSrv, unquote } from './parse-parameter.js';
import type {
  BaseMeta,
  CanonicalRecord,
  PermittedRecordType,
  RecordInput,
  RecordQuery,
  RecordType,
} from './types.js';

export interface CanonicalizeOptions {
  /** TTL applied when the input carries none */
  defaultTtl?: number;
  /** Refuse a CNAME at the zone apex */
  cnameApexRestriction?: boolean;
}

const RECORD_TYPES: readonly RecordType[] = [
  'A',
  'AAAA',
  'CAA',
  'CNAME',
  'MX',
  'NS',
  'PTR',
  'SRV',
  'TXT',
  'ANY',
];

const LABEL = '(\\*|[a-z0-9_](?:[a-z0-9_-]*[a-z0-9_])?)';
const NAME_PATTERN = new RegExp(`^(${LABEL}(\\.${LABEL})*)?$`);
const HOST_PATTERN = /^[a-z0-9_-]+(\.[a-z0-9_-]+)*$/;

const recordInputSchema = z.object({
  zone: z.string().trim().min(1, 'zone is required'),
  name: z.string(),
  type: z.string().trim().min(1, 'record type is required'),
  parameter: z.string().optional(),
  ttl: z.number().int().min(0).max(2 ** 31 - 1).optional(),
});

const ipv4 = z.string().ip({ version: 'v4' });
const ipv6 = z.string().ip({ version: 'v6' });

export function isRecordType(type: string): type is RecordType {
  return RECORD_TYPES.some((t) => t === type);
}

export function isPermittedType(type: string): type is PermittedRecordType {
  return PERMITTED_RECORD_TYPES.some((t) => t === type);
}

/**
 * Validate and normalize a record before it reaches the provider.
 *
 * - zone is lowercased without its trailing dot
 * - name becomes relative to the zone (`@` and the zone itself become `''`)
 * - type is uppercased and must be one the provider accepts
 * - parameter is rewritten into its canonical form and decomposed into `meta`
 *
 * Throws `ValidationError` on any rejected field.
 */
export function canonicalizeRecord(
  input: RecordInput,
  options: CanonicalizeOptions = {}
): CanonicalRecord {
  const { zone, name, type, ttl } = canonicalizeFields(input, options);
  return buildRecord(
    { zone, name, ttl: ttl ?? options.defaultTtl ?? DNS_TTL },
    type,
    input.parameter
  );
}

/**
 * Normalize the fields that address an existing record. The parameter is
 * optional; when given it is canonicalized the same way as for a new record.
 */
export function canonicalizeQuery(
  query: RecordQuery,
  options: CanonicalizeOptions = {}
): RecordQuery {
  const { zone, name, type } = canonicalizeFields(query, {
    ...options,
    cnameApexRestriction: false,
  });
  const result: RecordQuery = { zone, name, type };
  if (query.parameter !== undefined && query.parameter !== '') {
    result.parameter = buildRecord(
      { zone, name, ttl: DNS_TTL },
      type,
      query.parameter
    ).parameter;
  }
  if (query.meta) result.meta = query.meta;
  return result;
}

/**
 * Assemble a typed record from already normalized address fields. The
 * parameter is validated and decomposed for the given type.
 */
export function buildRecord(
  base: { zone: string; name: string; ttl: number },
  type: RecordType,
  rawParameter: string,
  meta: BaseMeta = {}
): CanonicalRecord {
  const raw = rawParameter.trim();
  const { zone, name, ttl } = base;
  const fail = (reason: string) =>
    new ValidationError(
      `Linode: invalid ${type} parameter \`${rawParameter}' for \`${name || '@'}': ${reason}`
    );

  switch (type) {
    case 'MX': {
      const fields = parseMx(raw);
      if (!fields || !HOST_PATTERN.test(fields.data)) {
        throw fail('expected "<priority> <target>"');
      }
      return {
        zone,
        name,
        ttl,
        type,
        parameter: `${fields.priority} ${fields.data}`,
        meta: { ...meta, ...fields },
      };
    }
    case 'SRV': {
      const fields = parseSrv(raw, name);
      if (!fields || !HOST_PATTERN.test(fields.data)) {
        throw fail(
          'expected "<priority> <weight> <port> <target>" at _service._protocol'
        );
      }
      return {
        zone,
        name,
        ttl,
        type,
        parameter: `${fields.priority} ${fields.weight} ${fields.port} ${fields.data}`,
        meta: { ...meta, ...fields },
      };
    }
    case 'CAA': {
      const fields = parseCaa(raw);
      if (!fields) throw fail('expected "<flags> <tag> <value>"');
      return {
        zone,
        name,
        ttl,
        type,
        parameter: `${fields.flags} ${fields.tag} ${fields.data}`,
        meta: { ...meta, ...fields },
      };
    }
    case 'A':
      if (!ipv4.safeParse(raw).success) throw fail('not an IPv4 address');
      return { zone, name, ttl, type, parameter: raw, meta: { ...meta } };
    case 'AAAA':
      if (!ipv6.safeParse(raw).success) throw fail('not an IPv6 address');
      return {
        zone,
        name,
        ttl,
        type,
        parameter: raw.toLowerCase(),
        meta: { ...meta },
      };
    case 'CNAME':
    case 'NS':
    case 'PTR': {
      const host = stripTrailingDot(raw.toLowerCase());
      if (!HOST_PATTERN.test(host)) throw fail('not a hostname');
      return { zone, name, ttl, type, parameter: host, meta: { ...meta } };
    }
    case 'TXT': {
      const text = unquote(raw);
      if (!text) throw fail('empty text');
      return { zone, name, ttl, type, parameter: text, meta: { ...meta } };
    }
    case 'ANY':
      return { zone, name, ttl, type, parameter: raw, meta: { ...meta } };
  }
}

function canonicalizeFields(
  input: { zone: string; name: string; type: string; parameter?: string; ttl?: number },
  options: CanonicalizeOptions
): { zone: string; name: string; type: PermittedRecordType; ttl?: number } {
  const parsed = recordInputSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => i.message).join('; ');
    throw new ValidationError(`Linode: invalid record: ${details}`);
  }

  const zone = normalizeZone(parsed.data.zone);
  const name = toRelativeName(parsed.data.name, zone);
  const type = parsed.data.type.toUpperCase();

  if (!NAME_PATTERN.test(name)) {
    throw new ValidationError(`Linode: invalid record name \`${parsed.data.name}'`);
  }
  if (!isPermittedType(type)) {
    throw new ValidationError(
      `Linode: unsupported record type "${type}" (permitted: ${PERMITTED_RECORD_TYPES.join(', ')})`
    );
  }
  if (options.cnameApexRestriction && type === 'CNAME' && name === '') {
    throw new ValidationError(
      `Linode: CNAME record cannot be placed at the apex of \`${zone}'`
    );
  }

  return { zone, name, type, ttl: parsed.data.ttl };
}
