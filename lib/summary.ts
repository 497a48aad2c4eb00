import logger from './logger';
import type { WarmStats } from './types';

export function elapsedSeconds(startedAt: number, finishedAt: number): number {
  return Math.max(0, Math.round((finishedAt - startedAt) / 1000));
}

/**
 * Log the end-of-run summary. Returns the elapsed seconds it reported.
 */
export function reportSummary(stats: WarmStats, startedAt: number, finishedAt: number): number {
  const duration = elapsedSeconds(startedAt, finishedAt);

  logger.info('Cache warming complete!');
  logger.info(`  Domains processed: ${stats.processed}`);
  logger.info(`  Failed lookups: ${stats.failed}`);
  logger.info(`  Duration: ${duration}s`);

  return duration;
}
