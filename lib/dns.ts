import { Resolver } from 'dns/promises';
import { withTimeout } from './net/timeout';
import logger from './logger';
import { DigLookup } from './dig';
import type { WarmConfig } from './config';
import type { DnsLookup, RecordType } from './types';

// The resolver replied, only not with records. dig exits 0 for these too.
const ANSWERED_CODES = new Set([
  'ENODATA',
  'ENOTFOUND',
  'ESERVFAIL',
  'EREFUSED',
  'ENOTIMP',
  'EFORMERR',
]);

function errorCode(err: unknown): string | undefined {
  // c-ares errors are not instances of this realm's Error under some runners.
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function serverAddress(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

/**
 * Queries the resolver directly with Node's c-ares client, one try per lookup.
 */
export class ResolverLookup implements DnsLookup {
  readonly name = 'resolver';
  private readonly resolvers = new Map<number, Resolver>();

  constructor(private readonly host: string, private readonly port: number) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async query(domain: string, type: RecordType, timeoutMs: number): Promise<boolean> {
    const resolver = this.resolverFor(timeoutMs);
    const pending = type === 'A' ? resolver.resolve4(domain) : resolver.resolve6(domain);

    try {
      await withTimeout(pending, timeoutMs);
      return true;
    } catch (err) {
      const code = errorCode(err);
      if (code && ANSWERED_CODES.has(code)) return true;
      if (!code) resolver.cancel();
      logger.debug({ err, domain, type }, 'resolver lookup failed');
      return false;
    }
  }

  private resolverFor(timeoutMs: number): Resolver {
    let resolver = this.resolvers.get(timeoutMs);
    if (!resolver) {
      resolver = new Resolver({ timeout: timeoutMs, tries: 1 });
      resolver.setServers([serverAddress(this.host, this.port)]);
      this.resolvers.set(timeoutMs, resolver);
    }
    return resolver;
  }
}

export function createLookup(config: WarmConfig): DnsLookup {
  const { HOST, PORT } = config.RESOLVER;
  return config.LOOKUP_BACKEND === 'dig' ? new DigLookup(HOST, PORT) : new ResolverLookup(HOST, PORT);
}
