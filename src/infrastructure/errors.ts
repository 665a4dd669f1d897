/**
 * Typed failures of the backend client.
 *
 * - `transport`: DNS failure, connection refused or reset
 * - `timeout`:   no answer within the per-request timeout
 * - `http`:      the backend answered with a non-2xx status
 * - `parse`:     body is not JSON or does not match the metrics contract
 *
 * Every kind means "backend unreachable" for the refresh cycle.
 */
export type FetchErrorKind = 'transport' | 'timeout' | 'http' | 'parse';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status: number | undefined;

  constructor(kind: FetchErrorKind, message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.status = options.status;
  }
}

/** Failure of a best-effort `POST /ingest`. Callers discard it. */
export class IngestError extends Error {
  readonly kind: Exclude<FetchErrorKind, 'parse'>;

  constructor(kind: Exclude<FetchErrorKind, 'parse'>, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'IngestError';
    this.kind = kind;
  }
}

/** Invalid process configuration; fatal at start-up. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function errorName(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'name' in e && typeof e.name === 'string') {
    return e.name;
  }
  return undefined;
}

/** True for the abort raised by `AbortSignal.timeout()`. */
export function isTimeout(e: unknown): boolean {
  const name = errorName(e);
  return name === 'TimeoutError' || name === 'AbortError';
}

/**
 * Human-readable reason for a failed `fetch()`.
 * Node's fetch wraps the socket error (ECONNREFUSED, ENOTFOUND) in `cause`.
 */
export function describeFailure(e: unknown): string {
  if (e instanceof Error) {
    return e.cause instanceof Error ? `${e.message} (${e.cause.message})` : e.message;
  }
  return String(e);
}
