import { stripTrailingDot } from './domain.js';
import type { CaaMeta, MxMeta, SrvMeta } from './types.js';

type Fields<T> = Omit<T, 'id'>;

/**
 * Parse an MX parameter (`<priority> <target>`).
 * Returns `null` if the string is not a valid MX value.
 */
export function parseMx(raw: string): Fields<MxMeta> | null {
  const parts = raw.trim().split(/\s+/);
  if (parts.length !== 2) return null;

  const priority = parseUint(parts[0], 0xffff);
  const target = parts[1];
  if (priority === null || !target) return null;

  return { priority, data: stripTrailingDot(target.toLowerCase()) };
}

/**
 * Parse an SRV parameter (`<priority> <weight> <port> <target>`) together with
 * the owner name it lives at (`_service._protocol[.sub]`).
 * Returns `null` if either part is malformed.
 */
export function parseSrv(raw: string, name: string): Fields<SrvMeta> | null {
  const parts = raw.trim().split(/\s+/);
  if (parts.length !== 4) return null;

  const priority = parseUint(parts[0], 0xffff);
  const weight = parseUint(parts[1], 0xffff);
  const port = parseUint(parts[2], 0xffff);
  const target = parts[3];
  if (priority === null || weight === null || port === null || !target) {
    return null;
  }

  const labels = name.split('.');
  const service = labels[0];
  const protocol = labels[1];
  if (!service?.startsWith('_') || !protocol?.startsWith('_')) return null;
  if (service.length < 2 || protocol.length < 2) return null;

  return {
    priority,
    weight,
    port,
    data: stripTrailingDot(target.toLowerCase()),
    service: service.slice(1),
    protocol: protocol.slice(1),
  };
}

/**
 * Parse a CAA parameter (`<flags> <tag> <value>`). The value may be quoted
 * and may contain spaces.
 * Returns `null` if the string is not a valid CAA value.
 */
export function parseCaa(raw: string): Fields<CaaMeta> | null {
  const match = /^(\d+)\s+([A-Za-z0-9]+)\s+(.+)$/.exec(raw.trim());
  if (!match) return null;

  const flags = parseUint(match[1], 0xff);
  const tag = match[2];
  const value = match[3];
  if (flags === null || !tag || !value) return null;

  const data = unquote(value);
  if (!data) return null;

  return { flags, tag: tag.toLowerCase(), data };
}

/** Remove one pair of surrounding double quotes */
export function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

function parseUint(raw: string | undefined, max: number): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const num = Number(raw);
  return num <= max ? num : null;
}
