/**
 * Normalize a zone name: lowercase, trimmed, without the trailing dot.
 *
 * Examples:
 * - `Example.COM.` → `example.com`
 * - ` example.com ` → `example.com`
 */
export function normalizeZone(input: string): string {
  let zone = input.trim().toLowerCase();

  // Remove trailing dot (FQDN notation)
  if (zone.endsWith('.')) {
    zone = zone.slice(0, -1);
  }

  return zone;
}

/**
 * Convert a record name to a label relative to its zone.
 *
 * E.g. "www.example.com." with zone "example.com" → "www"
 *      "example.com." with zone "example.com" → "" (empty string = apex)
 *      "@" → ""
 *
 * Names without a trailing dot are already relative and are only lowercased.
 */
export function toRelativeName(name: string, zone: string): string {
  const trimmed = name.trim().toLowerCase();
  if (trimmed === '' || trimmed === '@') return '';
  if (!trimmed.endsWith('.')) return trimmed;

  const fqdn = trimmed.slice(0, -1);
  if (fqdn === zone) return '';
  const suffix = `.${zone}`;
  if (fqdn.endsWith(suffix)) return fqdn.slice(0, -suffix.length);
  return fqdn;
}

/**
 * Build the absolute name of a record, with the trailing dot.
 *
 * E.g. "www" in "example.com" → "www.example.com."
 *      "" in "example.com" → "example.com."
 */
export function toFqdn(name: string, zone: string): string {
  return `${[name, zone].filter(Boolean).join('.')}.`;
}

/** Strip a single trailing dot from a hostname */
export function stripTrailingDot(host: string): string {
  return host.endsWith('.') ? host.slice(0, -1) : host;
}
