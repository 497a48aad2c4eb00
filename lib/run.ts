import logger from './logger';
import { checkPreconditions } from './preconditions';
import { QueryLogReader } from './queryLog';
import { warmDomains } from './warmer';
import { reportSummary } from './summary';
import { createWarmMetrics } from './metrics';
import { createLookup } from './dns';
import { WarmCacheError } from './errors';
import type { WarmConfig } from './config';
import type { DnsLookup } from './types';

export interface RunDeps {
  lookup?: DnsLookup;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

async function selectDomains(config: WarmConfig, now: number): Promise<string[]> {
  const reader = await QueryLogReader.open(config.DB_PATH);
  try {
    return reader.topDomains({ daysBack: config.DAYS_BACK, limit: config.MAX_DOMAINS, now }).map((r) => r.domain);
  } finally {
    reader.close();
  }
}

/**
 * One warming run: check, select, warm, report. Resolves to the process exit code.
 */
export async function runWarmCache(config: WarmConfig, deps: RunDeps = {}): Promise<number> {
  const lookup = deps.lookup ?? createLookup(config);
  const now = deps.now ?? Date.now;

  try {
    await checkPreconditions(config, lookup);

    logger.info(`Extracting top ${config.MAX_DOMAINS} domains from the last ${config.DAYS_BACK} days...`);
    const domains = await selectDomains(config, now());

    if (domains.length === 0) {
      logger.warn('No domains found in the database for the specified period.');
      return 0;
    }

    logger.info(`Found ${domains.length} domains to warm up`);

    const metrics = createWarmMetrics();
    const startedAt = now();
    const stats = await warmDomains(domains, { lookup, config, metrics, sleep: deps.sleep });
    reportSummary(stats, startedAt, now());

    if (logger.isLevelEnabled('debug')) {
      logger.debug({ metrics: await metrics.registry.getMetricsAsJSON() }, 'lookup metrics');
    }
    return 0;
  } catch (err) {
    if (err instanceof WarmCacheError) {
      if (err.cause === undefined) logger.error(err.message);
      else logger.error({ err: err.cause }, err.message);
      return err.exitCode;
    }
    throw err;
  }
}

export default runWarmCache;
