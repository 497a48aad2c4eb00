import { existsSync } from 'fs';
import logger from './logger';
import { PreconditionError } from './errors';
import type { WarmConfig } from './config';
import type { DnsLookup } from './types';

// Name queried to see whether the resolver answers at all.
const PROBE_NAME = 'localhost';

/**
 * Fails fast on a missing database or lookup backend; a silent resolver only warns,
 * since it may be restarting and warming is best-effort.
 */
export async function checkPreconditions(config: WarmConfig, lookup: DnsLookup): Promise<void> {
  if (!existsSync(config.DB_PATH)) {
    throw new PreconditionError(`Pi-hole FTL database not found at ${config.DB_PATH}`);
  }

  if (!(await lookup.isAvailable())) {
    throw new PreconditionError(
      lookup.name === 'dig'
        ? 'dig command not found. Please install bind-tools.'
        : `DNS lookup backend "${lookup.name}" is not available`,
    );
  }

  const { HOST, PORT } = config.RESOLVER;
  const answered = await lookup.query(PROBE_NAME, 'A', config.PROBE_TIMEOUT_MS);
  if (!answered) {
    logger.warn(`Resolver may not be responding on ${HOST}:${PORT}, continuing anyway...`);
  }
}
