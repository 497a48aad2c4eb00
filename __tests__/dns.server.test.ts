/**
 * ResolverLookup against a real UDP reply from an in-process server, so the
 * errors come from c-ares itself rather than from test doubles.
 */

jest.mock('../lib/logger', () => ({
  __esModule: true,
  default: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

import { ResolverLookup } from '../lib/dns';
import { RCODE, StubDnsServer } from './helpers/dnsServer';

const REPLIES: Record<string, number | null> = {
  'nxdomain.example': RCODE.NXDOMAIN,
  'servfail.example': RCODE.SERVFAIL,
  'refused.example': RCODE.REFUSED,
  'empty.example': RCODE.NOERROR,
  'silent.example': null,
};

describe('ResolverLookup with a live resolver', () => {
  let server: StubDnsServer;

  beforeAll(async () => {
    server = await StubDnsServer.start((name) => REPLIES[name] ?? null);
  });

  afterAll(() => server.stop());

  test('NXDOMAIN counts as answered', async () => {
    const lookup = new ResolverLookup('127.0.0.1', server.port);
    await expect(lookup.query('nxdomain.example', 'A', 1000)).resolves.toBe(true);
  });

  test('SERVFAIL and REFUSED count as answered', async () => {
    const lookup = new ResolverLookup('127.0.0.1', server.port);
    await expect(lookup.query('servfail.example', 'A', 1000)).resolves.toBe(true);
    await expect(lookup.query('refused.example', 'A', 1000)).resolves.toBe(true);
  });

  test('NOERROR with no records counts as answered', async () => {
    const lookup = new ResolverLookup('127.0.0.1', server.port);
    await expect(lookup.query('empty.example', 'A', 1000)).resolves.toBe(true);
    await expect(lookup.query('empty.example', 'AAAA', 1000)).resolves.toBe(true);
  });

  test('a resolver that never replies fails within the timeout', async () => {
    const lookup = new ResolverLookup('127.0.0.1', server.port);
    const started = Date.now();

    await expect(lookup.query('silent.example', 'A', 300)).resolves.toBe(false);
    expect(Date.now() - started).toBeLessThan(1500);
    expect(server.queries).toContain('silent.example');
  });
});
