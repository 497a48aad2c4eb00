import logger from './logger';
import { sleep as defaultSleep } from './net/timeout';
import { observeLookup, type WarmMetrics } from './metrics';
import type { WarmConfig } from './config';
import type { DnsLookup, RecordType, WarmStats } from './types';

export interface WarmOptions {
  lookup: DnsLookup;
  config: Pick<WarmConfig, 'DELAY_MS' | 'LOOKUP_TIMEOUT_MS' | 'PROGRESS_EVERY'>;
  metrics?: WarmMetrics;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Warm each domain in order, one at a time: an A lookup, then AAAA only if the
 * resolver answered the A lookup. A failed A lookup is counted and the loop moves on.
 */
export async function warmDomains(domains: readonly string[], opts: WarmOptions): Promise<WarmStats> {
  const { lookup, config, metrics } = opts;
  const pause = opts.sleep ?? defaultSleep;
  const stats: WarmStats = { total: domains.length, processed: 0, failed: 0, lookups: 0 };

  const query = async (domain: string, type: RecordType): Promise<boolean> => {
    const started = performance.now();
    const answered = await lookup.query(domain, type, config.LOOKUP_TIMEOUT_MS);
    stats.lookups++;
    if (metrics) {
      observeLookup(metrics, type, answered ? 'answered' : 'failed', (performance.now() - started) / 1000);
    }
    return answered;
  };

  for (const domain of domains) {
    if (await query(domain, 'A')) {
      await query(domain, 'AAAA');
    } else {
      stats.failed++;
    }

    stats.processed++;
    if (stats.processed % config.PROGRESS_EVERY === 0) {
      logger.info(`Progress: ${stats.processed}/${stats.total} domains processed...`);
    }

    if (config.DELAY_MS > 0) {
      await pause(config.DELAY_MS);
    }
  }

  return stats;
}

export default warmDomains;
