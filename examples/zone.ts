/**
 * Live test: print a Linode zone as zone-file text, optionally adding a record.
 *
 * Usage:
 *   LINODE_API_TOKEN=xxx npx tsx examples/zone.ts example.com
 *   LINODE_API_TOKEN=xxx npx tsx examples/zone.ts example.com www A 203.0.113.5
 */

import {
  linode,
  listLinodeZones,
  loadConfig,
  setLogLevel,
  validateLinodeKey,
} from '../src/index.js';

const [domain, name, type, parameter] = process.argv.slice(2);

if (!domain) {
  console.error(
    'Usage: LINODE_API_TOKEN=xxx npx tsx examples/zone.ts <domain> [name type parameter]'
  );
  process.exit(1);
}

async function main(zone: string) {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const check = await validateLinodeKey(config.apiToken, config.apiUrl);
  if (!check.valid) {
    console.error(`Linode key rejected: ${check.reason}`);
    process.exit(1);
  }

  console.log(`\nLooking up zones for your API token...`);
  const zones = await listLinodeZones(config.apiToken, config.apiUrl);
  for (const z of zones) {
    const marker = z.domain === zone ? ' <--' : '';
    console.log(`  ${z.domain} (${z.id})${marker}`);
  }

  const provider = linode({
    apiToken: config.apiToken,
    baseUrl: config.apiUrl,
    defaultTtl: config.defaultTtl,
    zonePollAttempts: config.zonePollAttempts,
    zonePollIntervalMs: config.zonePollIntervalMs,
  });

  if (name !== undefined && type && parameter) {
    const record = await provider.addRecord(zone, name, type, parameter);
    console.log(`\n  + Created: ${record.type} ${record.name || '@'} -> ${record.parameter} (#${record.meta.id})`);
  }

  const text = await provider.zoneAxfr(zone);
  if (text === null) {
    console.error(`\nZone "${zone}" has no records on Linode.`);
    process.exit(1);
  }

  console.log(`\n${text}`);
}

main(domain).catch((err) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
