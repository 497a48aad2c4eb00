export type RecordType = 'A' | 'AAAA';

/**
 * A way of asking the target resolver for a record. `query` resolves to
 * `true` when the resolver answered (with or without records) and `false`
 * on timeout or transport failure; it never rejects.
 */
export interface DnsLookup {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  query(domain: string, type: RecordType, timeoutMs: number): Promise<boolean>;
}

export interface DomainRecord {
  domain: string;
  hits: number; // occurrences inside the look-back window
}

export interface WarmStats {
  total: number;
  processed: number;
  failed: number;
  lookups: number; // A + AAAA queries issued
}
