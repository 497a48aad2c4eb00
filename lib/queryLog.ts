import { readFile } from 'fs/promises';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';
import { QueryLogError } from './errors';
import type { DomainRecord } from './types';

// FTL status codes for queries that were answered rather than blocked:
// 2 = forwarded upstream, 3 = served from FTL's own cache.
export const ANSWERED_STATUSES = [2, 3] as const;

const SECONDS_PER_DAY = 86_400;

const TOP_DOMAINS_SQL = `
  SELECT domain, COUNT(*) AS hits
  FROM queries
  WHERE timestamp > ?
    AND status IN (${ANSWERED_STATUSES.map(() => '?').join(', ')})
    AND domain NOT LIKE '%arpa'
    AND domain NOT LIKE 'localhost%'
  GROUP BY domain
  ORDER BY hits DESC
  LIMIT ?
`;

export interface TopDomainsOptions {
  daysBack: number;
  limit: number;
  now?: number; // epoch ms, defaults to Date.now()
}

let sqlModule: Promise<SqlJsStatic> | null = null;

/**
 * The sql.js WASM module, loaded once per process.
 */
export function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlModule) sqlModule = initSqlJs();
  return sqlModule;
}

/**
 * Epoch seconds a log entry must be newer than to fall inside the look-back window.
 */
export function windowCutoff(daysBack: number, now: number): number {
  return Math.floor(now / 1000) - daysBack * SECONDS_PER_DAY;
}

/**
 * Read-only view of the Pi-hole FTL query log. The file is read into memory
 * once; nothing is ever written back to it.
 */
export class QueryLogReader {
  constructor(private readonly db: Database) {}

  static async open(path: string): Promise<QueryLogReader> {
    try {
      const [SQL, contents] = await Promise.all([loadSqlJs(), readFile(path)]);
      return new QueryLogReader(new SQL.Database(contents));
    } catch (err) {
      throw new QueryLogError(`Cannot open query log database at ${path}`, 1, { cause: err });
    }
  }

  /**
   * Most-queried answered domains inside the window, most popular first.
   */
  topDomains({ daysBack, limit, now = Date.now() }: TopDomainsOptions): DomainRecord[] {
    try {
      const stmt = this.db.prepare(TOP_DOMAINS_SQL);
      try {
        stmt.bind([windowCutoff(daysBack, now), ...ANSWERED_STATUSES, limit]);
        const rows: DomainRecord[] = [];
        while (stmt.step()) {
          const { domain, hits } = stmt.getAsObject();
          if (typeof domain === 'string' && typeof hits === 'number') rows.push({ domain, hits });
        }
        return rows;
      } finally {
        stmt.free();
      }
    } catch (err) {
      throw new QueryLogError('Query log lookup failed', 1, { cause: err });
    }
  }

  close(): void {
    this.db.close();
  }
}

export default QueryLogReader;
