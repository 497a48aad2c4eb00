import { execFile } from 'child_process';
import { promisify } from 'util';
import logger from './logger';
import type { DnsLookup, RecordType } from './types';

const execFileAsync = promisify(execFile);

const DIG_BIN = 'dig';
// Grace period on top of dig's own +time before the child is killed.
const KILL_GRACE_MS = 1000;

/**
 * Runs `dig` once per lookup. The exit status decides the outcome: dig exits 0
 * whenever the resolver replied, whatever the rcode.
 */
export class DigLookup implements DnsLookup {
  readonly name = DIG_BIN;

  constructor(private readonly host: string, private readonly port: number) {}

  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(DIG_BIN, ['-v']);
      return true;
    } catch (err) {
      logger.debug({ err }, 'dig probe failed');
      return false;
    }
  }

  async query(domain: string, type: RecordType, timeoutMs: number): Promise<boolean> {
    try {
      await execFileAsync(DIG_BIN, digArgs(this.host, this.port, domain, type, timeoutMs), {
        timeout: timeoutMs + KILL_GRACE_MS,
      });
      return true;
    } catch (err) {
      logger.debug({ err, domain, type }, 'dig lookup failed');
      return false;
    }
  }
}

export function digArgs(host: string, port: number, domain: string, type: RecordType, timeoutMs: number): string[] {
  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return [`@${host}`, '-p', String(port), domain, type, '+short', `+time=${seconds}`, '+tries=1'];
}
