import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import pino from 'pino';
import {
  ProviderError,
  RecordNotFoundError,
  ValidationError,
  ZoneNotFoundError,
} from '../../src/errors.js';
import { linode, listLinodeZones } from '../../src/providers/linode.js';
import type { LinodeOptions } from '../../src/providers/linode.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterAll(() => {
  vi.unstubAllGlobals();
});

interface FakeZone {
  id: number;
  domain: string;
  type: string;
  status: string;
}

interface FakeRecord {
  id: number;
  type: string;
  name: string;
  target: string;
  ttl_sec: number;
  priority?: number;
  weight?: number;
  port?: number;
  service?: string;
  protocol?: string;
  tag?: string;
}

interface Call {
  method: string;
  path: string;
  body?: Record<string, unknown>;
}

function respond(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(JSON.stringify(body)),
  };
}

/**
 * In-process stand-in for the Linode domains API, answering the stubbed fetch.
 */
function createFakeLinode() {
  const fake = {
    zones: [{ id: 100, domain: 'example.com', type: 'master', status: 'active' }] as FakeZone[],
    records: new Map<number, FakeRecord[]>([[100, []]]),
    calls: [] as Call[],
    failures: new Map<string, { status: number; body: unknown }>(),
    deleteStatus: 200,
    /** Listings a newly created zone stays invisible for */
    propagationDelay: 1,
    pending: [] as { zone: FakeZone; remaining: number }[],
    nextId: 1000,
  };

  mockFetch.mockImplementation(async (url: string, init: RequestInit) => {
    const u = new URL(url);
    const path = u.pathname.replace(/^\/v4\//, '');
    const method = init.method ?? 'GET';
    const body =
      typeof init.body === 'string'
        ? (JSON.parse(init.body) as Record<string, unknown>)
        : undefined;
    fake.calls.push({ method, path, body });

    const failure = fake.failures.get(`${method} ${path}`);
    if (failure) return respond(failure.status, failure.body);

    const parts = path.split('/');
    const zoneId = Number(parts[1]);

    if (path === 'domains' && method === 'GET') {
      for (const p of fake.pending) p.remaining--;
      for (const p of fake.pending.filter((p) => p.remaining <= 0)) {
        fake.zones.push(p.zone);
        fake.records.set(p.zone.id, []);
      }
      fake.pending = fake.pending.filter((p) => p.remaining > 0);
      return respond(200, { data: fake.zones, page: 1, pages: 1, results: fake.zones.length });
    }
    if (path === 'domains' && method === 'POST') {
      const zone = {
        id: fake.nextId++,
        domain: String(body?.domain),
        type: 'master',
        status: 'active',
      };
      fake.pending.push({ zone, remaining: fake.propagationDelay });
      return respond(200, zone);
    }
    if (parts.length === 2 && method === 'DELETE') {
      fake.zones = fake.zones.filter((z) => z.id !== zoneId);
      return respond(200, {});
    }

    const list = fake.records.get(zoneId);
    if (!list) return respond(404, { errors: [{ reason: 'Not found' }] });

    if (parts.length === 3 && method === 'GET') {
      return respond(200, { data: list, page: 1, pages: 1, results: list.length });
    }
    if (parts.length === 3 && method === 'POST') {
      const record = { ...body, id: fake.nextId++ } as unknown as FakeRecord;
      list.push(record);
      return respond(200, record);
    }

    const recordId = Number(parts[3]);
    const index = list.findIndex((r) => r.id === recordId);
    if (index === -1) return respond(404, { errors: [{ reason: 'Not found' }] });

    if (method === 'PUT') {
      const updated = { ...list[index], ...body, id: recordId } as FakeRecord;
      list[index] = updated;
      return respond(200, updated);
    }
    if (method === 'DELETE') {
      list.splice(index, 1);
      return respond(fake.deleteStatus, {});
    }

    return respond(405, { errors: [{ reason: 'Method not allowed' }] });
  });

  return fake;
}

function seed(fake: ReturnType<typeof createFakeLinode>, ...records: FakeRecord[]) {
  fake.records.get(100)!.push(...records);
}

const wwwRecord: FakeRecord = {
  id: 7,
  type: 'A',
  name: 'www',
  target: '203.0.113.5',
  ttl_sec: 3600,
};

const SOA = 'ns1.linode.com. hostmaster.example.com. 2024010101 14400 14400 1209600 300';

function createProvider(overrides: Partial<LinodeOptions> = {}) {
  return linode({
    apiToken: 'test-secret',
    lookupSoa: vi.fn().mockResolvedValue(null),
    logger: pino({ level: 'silent' }),
    sleep: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  });
}

function writes(fake: ReturnType<typeof createFakeLinode>) {
  return fake.calls.filter((c) => c.method !== 'GET');
}

describe('linode', () => {
  it('throws if apiToken is missing', () => {
    expect(() => linode({ apiToken: '' })).toThrow('apiToken is required');
  });

  it('reports the Linode nameservers and the apex CNAME restriction', () => {
    const provider = createProvider();
    expect(provider.getHostingNameservers()).toEqual([
      'ns1.linode.com',
      'ns2.linode.com',
      'ns3.linode.com',
      'ns4.linode.com',
      'ns5.linode.com',
    ]);
    expect(provider.hasCnameApexRestriction()).toBe(true);
  });
});

describe('addRecord', () => {
  it('posts the encoded record and caches it with its new id', async () => {
    const fake = createFakeLinode();
    const provider = createProvider();

    const record = await provider.addRecord('example.com', 'www', 'A', '203.0.113.5', 3600);

    expect(writes(fake)).toEqual([
      {
        method: 'POST',
        path: 'domains/100/records',
        body: { type: 'A', ttl_sec: 3600, name: 'www', target: '203.0.113.5' },
      },
    ]);
    expect(record.meta.id).toBe('1000');
    expect(
      provider.records.find({
        zone: 'example.com',
        name: 'www',
        type: 'A',
        parameter: '203.0.113.5',
      })?.meta.id
    ).toBe('1000');
  });

  it('fails when the created record comes back without an id', async () => {
    const fake = createFakeLinode();
    fake.failures.set('POST domains/100/records', { status: 200, body: {} });
    const provider = createProvider();

    await expect(
      provider.addRecord('example.com', 'www', 'A', '203.0.113.5')
    ).rejects.toThrow(
      "Failed to create record `www.example.com' (rr: `A', param: `203.0.113.5'): Linode API answered without a record id"
    );
    expect(provider.records.records('example.com')).toEqual([]);
  });

  it('uses the configured default TTL', async () => {
    const fake = createFakeLinode();
    const provider = createProvider({ defaultTtl: 600 });

    await provider.addRecord('example.com', '', 'MX', '10 mail.example.com');

    expect(writes(fake)[0]?.body).toEqual({
      type: 'MX',
      ttl_sec: 600,
      name: '',
      priority: 10,
      target: 'mail.example.com',
    });
  });

  it('rejects invalid input before any network call', async () => {
    const fake = createFakeLinode();
    const provider = createProvider();

    await expect(
      provider.addRecord('example.com', 'www', 'PTR', 'host.example.com')
    ).rejects.toThrow(ValidationError);
    await expect(
      provider.addRecord('example.com', '@', 'CNAME', 'elsewhere.example.net')
    ).rejects.toThrow(ValidationError);
    expect(fake.calls).toEqual([]);
  });

  it('fails when the zone is not hosted', async () => {
    const fake = createFakeLinode();
    const provider = createProvider();

    await expect(
      provider.addRecord('missing.test', 'www', 'A', '203.0.113.5')
    ).rejects.toThrow(ZoneNotFoundError);
    expect(writes(fake)).toEqual([]);
  });

  it('surfaces the provider reason and leaves the cache alone', async () => {
    const fake = createFakeLinode();
    fake.failures.set('POST domains/100/records', {
      status: 400,
      body: { errors: [{ reason: 'Invalid target', field: 'target' }] },
    });
    const provider = createProvider();

    await expect(
      provider.addRecord('example.com', 'www', 'A', '203.0.113.5')
    ).rejects.toThrow(
      "Failed to create record `www.example.com' (rr: `A', param: `203.0.113.5'): Invalid target"
    );
    expect(provider.records.records('example.com')).toEqual([]);
  });
});

describe('removeRecord', () => {
  it('resolves the id from the zone listing and deletes it', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    await provider.removeRecord('example.com', 'www', 'A', '203.0.113.5');

    expect(fake.calls.map((c) => `${c.method} ${c.path}`)).toEqual([
      'GET domains',
      'GET domains/100/records',
      'DELETE domains/100/records/7',
    ]);
    expect(provider.records.records('example.com')).toEqual([]);
  });

  it('removes the first match when no parameter is given', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord, { ...wwwRecord, id: 8, target: '203.0.113.6' });
    const provider = createProvider();

    await provider.removeRecord('example.com', 'www', 'A');

    expect(writes(fake).map((c) => c.path)).toEqual(['domains/100/records/7']);
    expect(provider.records.records('example.com').map((r) => r.meta.id)).toEqual(['8']);
  });

  it('never deletes a record it cannot resolve', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    await expect(
      provider.removeRecord('example.com', 'www', 'A', '203.0.113.9')
    ).rejects.toThrow(
      "Record `www.example.com' (rr: `A', param: `203.0.113.9') does not exist"
    );
    await expect(
      provider.removeRecord('example.com', 'www', 'A', '203.0.113.9')
    ).rejects.toThrow(RecordNotFoundError);
    expect(writes(fake)).toEqual([]);
  });

  it('treats any status other than 200 as failure', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    fake.deleteStatus = 204;
    const provider = createProvider();

    await expect(
      provider.removeRecord('example.com', 'www', 'A', '203.0.113.5')
    ).rejects.toThrow(ProviderError);
    expect(provider.records.records('example.com')).toHaveLength(1);
  });

  it('keeps the cache when the delete is refused', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    fake.failures.set('DELETE domains/100/records/7', {
      status: 500,
      body: { errors: [{ reason: 'Internal error' }] },
    });
    const provider = createProvider();

    await expect(
      provider.removeRecord('example.com', 'www', 'A', '203.0.113.5')
    ).rejects.toThrow("Failed to delete record `www.example.com' type A: Internal error");
    expect(provider.records.records('example.com')).toHaveLength(1);
  });

  it('reports a failed listing instead of a missing record', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    fake.failures.set('GET domains/100/records', {
      status: 503,
      body: { errors: [{ reason: 'Unavailable' }] },
    });
    const provider = createProvider();

    const err = await provider
      .removeRecord('example.com', 'www', 'A', '203.0.113.5')
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({
      status: 503,
      message: "Failed to delete record `www.example.com' type A: Unavailable",
    });
    expect(writes(fake)).toEqual([]);
    expect(provider.records.isLoaded('example.com')).toBe(false);
  });
});

describe('updateRecord', () => {
  const old = { name: 'www', type: 'A', parameter: '203.0.113.5', ttl: 3600 };

  it('keeps the old fields when only the TTL changes', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    await provider.updateRecord('example.com', old, { ttl: 60 });

    expect(writes(fake)).toEqual([
      {
        method: 'PUT',
        path: 'domains/100/records/7',
        body: { type: 'A', ttl_sec: 60, name: 'www', target: '203.0.113.5' },
      },
    ]);
  });

  it('merges a new parameter onto the old record', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    const merged = await provider.updateRecord('example.com', old, {
      parameter: '203.0.113.9',
    });

    expect(writes(fake)[0]?.body).toEqual({
      type: 'A',
      ttl_sec: 3600,
      name: 'www',
      target: '203.0.113.9',
    });
    expect(merged).toEqual({
      zone: 'example.com',
      name: 'www',
      type: 'A',
      parameter: '203.0.113.9',
      ttl: 3600,
      meta: { id: '7' },
    });
    expect(provider.records.records('example.com')).toEqual([merged]);
  });

  it('skips the listing when the old record carries its id', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    await provider.updateRecord(
      'example.com',
      { ...old, meta: { id: '7' } },
      { name: 'web' }
    );

    expect(fake.calls.map((c) => `${c.method} ${c.path}`)).toEqual([
      'GET domains',
      'PUT domains/100/records/7',
    ]);
    expect(fake.calls[1]?.body).toMatchObject({ name: 'web' });
  });

  it('validates both records before touching the network', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    await expect(
      provider.updateRecord('example.com', old, { parameter: 'not-an-ip' })
    ).rejects.toThrow(ValidationError);
    await expect(
      provider.updateRecord('example.com', { ...old, type: 'BOGUS' }, { ttl: 60 })
    ).rejects.toThrow(ValidationError);
    expect(fake.calls).toEqual([]);
  });

  it('fails when the old record cannot be found', async () => {
    const fake = createFakeLinode();
    const provider = createProvider();

    await expect(
      provider.updateRecord('example.com', old, { ttl: 60 })
    ).rejects.toThrow(
      "failed to find record ID in Linode zone `example.com' - does `www' (rr: `A', parameter: `203.0.113.5') exist?"
    );
    expect(writes(fake)).toEqual([]);
  });

  it('reports a failed listing while resolving the old record', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    fake.failures.set('GET domains/100/records', {
      status: 503,
      body: { errors: [{ reason: 'Unavailable' }] },
    });
    const provider = createProvider();

    await expect(
      provider.updateRecord('example.com', old, { ttl: 60 })
    ).rejects.toThrow(ProviderError);
    expect(writes(fake)).toEqual([]);
  });

  it('names both records and keeps the cache when the update is refused', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    fake.failures.set('PUT domains/100/records/7', {
      status: 400,
      body: { errors: [{ reason: 'Invalid target' }] },
    });
    const provider = createProvider();

    await expect(
      provider.updateRecord('example.com', old, { parameter: '203.0.113.9' })
    ).rejects.toThrow(
      "Failed to update record `www' on zone `example.com' (old - rr: `A', param: `203.0.113.5'; new - name: `www', rr: `A', param: `203.0.113.9'): Invalid target"
    );
    expect(provider.records.records('example.com').map((r) => r.parameter)).toEqual([
      '203.0.113.5',
    ]);
  });
});

describe('zoneAxfr', () => {
  it('renders the preamble and every record, caching them', async () => {
    const fake = createFakeLinode();
    seed(
      fake,
      wwwRecord,
      { id: 8, type: 'MX', name: '', target: 'mail.example.com', priority: 10, ttl_sec: 3600 },
      { id: 9, type: 'CAA', name: '', target: 'letsencrypt.org', tag: 'issue', ttl_sec: 3600 },
      {
        id: 10,
        type: 'SRV',
        name: '_sip._tcp',
        target: 'sip.example.com',
        priority: 10,
        weight: 20,
        port: 5060,
        service: 'sip',
        protocol: 'tcp',
        ttl_sec: 300,
      }
    );
    const lookupSoa = vi.fn().mockResolvedValue(SOA);
    const provider = createProvider({ lookupSoa });

    const text = await provider.zoneAxfr('Example.com.');

    expect(text).toBe(
      [
        `example.com.\t300\tIN\tSOA\t${SOA}`,
        'example.com.\t300\tIN\tNS\tns1.linode.com.',
        'example.com.\t300\tIN\tNS\tns2.linode.com.',
        'example.com.\t300\tIN\tNS\tns3.linode.com.',
        'example.com.\t300\tIN\tNS\tns4.linode.com.',
        'example.com.\t300\tIN\tNS\tns5.linode.com.',
        'www.example.com.\t3600\tIN\tA\t203.0.113.5',
        'example.com.\t3600\tIN\tMX\t10 mail.example.com',
        'example.com.\t3600\tIN\tCAA\t0 issue letsencrypt.org',
        '_sip._tcp.example.com.\t300\tIN\tSRV\t10 20 5060 sip.example.com',
      ].join('\n')
    );
    expect(lookupSoa).toHaveBeenCalledWith('example.com', [
      'ns1.linode.com',
      'ns2.linode.com',
      'ns3.linode.com',
      'ns4.linode.com',
      'ns5.linode.com',
    ]);
    expect(provider.records.records('example.com').map((r) => r.meta.id)).toEqual([
      '7',
      '8',
      '9',
      '10',
    ]);
    expect(provider.records.isLoaded('example.com')).toBe(true);
  });

  it('omits the SOA line and uses the default TTL without an SOA', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    const text = await provider.zoneAxfr('example.com');

    expect(text?.split('\n')[0]).toBe('example.com.\t1800\tIN\tNS\tns1.linode.com.');
    expect(text?.split('\n')).toHaveLength(6);
  });

  it('returns null for a zone Linode does not host', async () => {
    const fake = createFakeLinode();
    const provider = createProvider();

    await expect(provider.zoneAxfr('missing.test')).resolves.toBeNull();
    expect(fake.calls.map((c) => c.path)).toEqual(['domains']);
  });

  it('returns null for a zone with no records', async () => {
    createFakeLinode();
    const provider = createProvider();

    await expect(provider.zoneAxfr('example.com')).resolves.toBeNull();
  });

  it('forgets cached records once the zone comes back empty', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();
    await provider.zoneAxfr('example.com');

    fake.records.set(100, []);

    await expect(provider.zoneAxfr('example.com')).resolves.toBeNull();
    await expect(provider.getZoneRecords('example.com')).resolves.toEqual([]);
    await expect(
      provider.removeRecord('example.com', 'www', 'A', '203.0.113.5')
    ).rejects.toThrow(RecordNotFoundError);
  });

  it('returns null without throwing when the listing is unauthorized', async () => {
    const fake = createFakeLinode();
    fake.failures.set('GET domains/100/records', {
      status: 401,
      body: { errors: [{ reason: 'Invalid Token' }] },
    });
    const provider = createProvider();

    await expect(provider.zoneAxfr('example.com')).resolves.toBeNull();
  });

  it('logs and returns null on other failures', async () => {
    const fake = createFakeLinode();
    fake.failures.set('GET domains/100/records', {
      status: 503,
      body: { errors: [{ reason: 'Unavailable' }] },
    });
    const logger = pino({ level: 'silent' });
    const error = vi.spyOn(logger, 'error');
    const provider = createProvider({ logger });

    await expect(provider.zoneAxfr('example.com')).resolves.toBeNull();
    expect(error).toHaveBeenCalledWith(
      { domain: 'example.com', status: 503 },
      'Failed to transfer DNS records from Linode - try again later'
    );
  });
});

describe('getZoneRecords', () => {
  it('lists the zone once and then serves the cache', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    const first = await provider.getZoneRecords('example.com');
    const second = await provider.getZoneRecords('example.com');

    expect(first).toEqual(second);
    expect(first.map((r) => r.parameter)).toEqual(['203.0.113.5']);
    expect(fake.calls.filter((c) => c.path === 'domains/100/records')).toHaveLength(1);
  });

  it('reports a failed listing', async () => {
    const fake = createFakeLinode();
    fake.failures.set('GET domains/100/records', {
      status: 503,
      body: { errors: [{ reason: 'Unavailable' }] },
    });
    const provider = createProvider();

    await expect(provider.getZoneRecords('example.com')).rejects.toThrow(
      "Failed to list records of zone `example.com': Unavailable"
    );
  });

  it('hands out copies of the cached records', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();

    const [listed] = await provider.getZoneRecords('example.com');
    if (!listed) throw new Error('expected a record');
    listed.parameter = '198.51.100.1';
    listed.meta.id = '99';
    const added = await provider.addRecord('example.com', 'mail', 'A', '203.0.113.7');
    added.name = 'changed';

    const again = await provider.getZoneRecords('example.com');
    expect(again.map((r) => [r.name, r.parameter, r.meta.id])).toEqual([
      ['www', '203.0.113.5', '7'],
      ['mail', '203.0.113.7', '1000'],
    ]);
  });
});

describe('addZone', () => {
  it('creates the zone and polls until Linode reports it', async () => {
    const fake = createFakeLinode();
    fake.propagationDelay = 3;
    const sleep = vi.fn().mockResolvedValue(undefined);
    const provider = createProvider({ sleep });

    const id = await provider.addZone('New.test');

    expect(id).toBe('1000');
    expect(writes(fake)).toEqual([
      {
        method: 'POST',
        path: 'domains',
        body: { domain: 'new.test', type: 'master', soa_email: 'hostmaster@new.test' },
      },
    ]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('warns but succeeds when the zone never shows up', async () => {
    const fake = createFakeLinode();
    fake.propagationDelay = 99;
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const sleep = vi.fn().mockResolvedValue(undefined);
    const provider = createProvider({
      logger,
      sleep,
      zonePollAttempts: 3,
      zonePollIntervalMs: 50,
    });

    await expect(provider.addZone('new.test')).resolves.toBeNull();
    expect(fake.calls.filter((c) => c.method === 'GET')).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(50);
    expect(warn).toHaveBeenCalledWith(
      { zone: 'new.test', attempts: 3 },
      'zone created but Linode has not reported it yet'
    );
  });

  it('surfaces a refused creation', async () => {
    const fake = createFakeLinode();
    fake.failures.set('POST domains', {
      status: 400,
      body: { errors: [{ reason: 'Domain already exists' }] },
    });
    const provider = createProvider();

    await expect(provider.addZone('example.com')).rejects.toThrow(
      "Failed to add zone `example.com': Domain already exists"
    );
  });
});

describe('removeZone', () => {
  it('deletes the zone and forgets its records', async () => {
    const fake = createFakeLinode();
    seed(fake, wwwRecord);
    const provider = createProvider();
    await provider.zoneAxfr('example.com');

    await expect(provider.removeZone('example.com')).resolves.toBe(true);
    expect(writes(fake).map((c) => `${c.method} ${c.path}`)).toEqual([
      'DELETE domains/100',
    ]);
    expect(provider.records.isLoaded('example.com')).toBe(false);
  });

  it('warns when the zone is already gone', async () => {
    const fake = createFakeLinode();
    const logger = pino({ level: 'silent' });
    const warn = vi.spyOn(logger, 'warn');
    const provider = createProvider({ logger });

    await expect(provider.removeZone('missing.test')).resolves.toBe(false);
    expect(writes(fake)).toEqual([]);
    expect(warn).toHaveBeenCalledWith(
      { zone: 'missing.test' },
      "Domain ID not found - `missing.test' already removed?"
    );
  });
});

describe('listLinodeZones', () => {
  it('returns every zone for the token', async () => {
    const fake = createFakeLinode();
    fake.zones.push({ id: 101, domain: 'example.org', type: 'master', status: 'active' });

    await expect(listLinodeZones('test-secret')).resolves.toEqual([
      { id: '100', domain: 'example.com' },
      { id: '101', domain: 'example.org' },
    ]);
  });

  it('throws if apiToken is missing', async () => {
    await expect(listLinodeZones('')).rejects.toThrow('apiToken is required');
  });
});
