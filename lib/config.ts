// Runtime configuration for the cache warmer.
// Values are read from env with sane defaults; tests pass their own env object.

type Env = Record<string, string | undefined>;

export type LookupBackendName = 'resolver' | 'dig';

export interface WarmConfig {
  DAYS_BACK: number;
  MAX_DOMAINS: number;
  DELAY_MS: number;
  DB_PATH: string;
  RESOLVER: {
    HOST: string;
    PORT: number;
  };
  LOOKUP_BACKEND: LookupBackendName;
  LOOKUP_TIMEOUT_MS: number;
  PROBE_TIMEOUT_MS: number;
  PROGRESS_EVERY: number;
}

export const DEFAULT_DB_PATH = '/etc/pihole/pihole-FTL.db';

function envInt(env: Env, name: string, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n >= min && n <= max ? n : fallback;
}

function envBackend(env: Env): LookupBackendName {
  const v = env.WARM_CACHE_LOOKUP?.trim().toLowerCase();
  return v === 'dig' ? 'dig' : 'resolver';
}

export function loadConfig(env: Env = process.env): WarmConfig {
  return {
    DAYS_BACK: envInt(env, 'WARM_CACHE_DAYS', 3),
    MAX_DOMAINS: envInt(env, 'WARM_CACHE_MAX', 500),
    DELAY_MS: envInt(env, 'WARM_CACHE_DELAY_MS', 10, 0),
    DB_PATH: env.WARM_CACHE_DB || DEFAULT_DB_PATH,

    RESOLVER: {
      HOST: env.WARM_CACHE_RESOLVER || '127.0.0.1',
      PORT: envInt(env, 'UNBOUND_PORT', 5335, 1, 65535),
    },

    LOOKUP_BACKEND: envBackend(env),
    LOOKUP_TIMEOUT_MS: 5000,
    PROBE_TIMEOUT_MS: 2000,
    PROGRESS_EVERY: 50,
  };
}

export default loadConfig;
