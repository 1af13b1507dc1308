/** Linode API v4 root */
export const LINODE_API = 'https://api.linode.com/v4';

/** Default record TTL in seconds */
export const DNS_TTL = 1800;

/** Items requested per page of a listing */
export const LINODE_PAGE_SIZE = 100;

/** Record types this provider accepts */
export const PERMITTED_RECORD_TYPES = [
  'A',
  'AAAA',
  'CAA',
  'CNAME',
  'MX',
  'NS',
  'SRV',
  'TXT',
] as const;

/** Authoritative nameservers for every Linode-hosted zone */
export const LINODE_NAMESERVERS = [
  'ns1.linode.com',
  'ns2.linode.com',
  'ns3.linode.com',
  'ns4.linode.com',
  'ns5.linode.com',
];

/** Times to look for a freshly created zone before giving up */
export const ZONE_POLL_ATTEMPTS = 10;

/** Pause between zone lookups after creation */
export const ZONE_POLL_INTERVAL_MS = 1000;

/** Status code Linode answers a successful DELETE with */
export const LINODE_DELETE_OK = 200;
