/**
 * Fatal conditions that end a run. The runner maps them to the process exit code.
 */
export class WarmCacheError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Missing query-log database or lookup backend. */
export class PreconditionError extends WarmCacheError {}

/** The query-log database could not be opened or queried. */
export class QueryLogError extends WarmCacheError {}
