/* ------------------------------------------------------------------ */
/*  Backend client — the only module that talks to the metrics API     */
/*                                                                     */
/*  Neither method rejects: failures come back as a Result so the      */
/*  scheduler and the burst sender each decide what to do with them.   */
/*  There is no retry here; the next scheduled poll is the retry.      */
/* ------------------------------------------------------------------ */

import { ok, err, type LogRecord, type MetricsSnapshot, type Result } from '../domain/index.js';
import { metricsPayloadSchema, toSnapshot } from '../application/metrics-schema.js';
import { FetchError, IngestError, describeFailure, isTimeout } from './errors.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 3_000;
export const DEFAULT_INGEST_TIMEOUT_MS = 1_000;

/** Read side consumed by the refresh scheduler. */
export interface MetricsSource {
  fetchMetrics(): Promise<Result<MetricsSnapshot, FetchError>>;
}

/** Write side consumed by the burst sender. */
export interface EventSink {
  sendEvent(record: LogRecord): Promise<Result<void, IngestError>>;
}

export interface MetricsClientOptions {
  baseUrl: string;
  requestTimeoutMs?: number;
  ingestTimeoutMs?: number;
}

export class MetricsClient implements MetricsSource, EventSink {
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly ingestTimeoutMs: number;

  constructor(options: MetricsClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.ingestTimeoutMs = options.ingestTimeoutMs ?? DEFAULT_INGEST_TIMEOUT_MS;
  }

  async fetchMetrics(): Promise<Result<MetricsSnapshot, FetchError>> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/metrics`, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (e: unknown) {
      return err(this.requestFailure(e));
    }

    if (!res.ok) {
      return err(new FetchError('http', `GET /metrics returned ${res.status}`, { status: res.status }));
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (e: unknown) {
      // The timeout also covers reading the body.
      if (isTimeout(e)) return err(this.requestFailure(e));
      return err(new FetchError('parse', 'GET /metrics returned a body that is not JSON', { cause: e }));
    }

    const parsed = metricsPayloadSchema.safeParse(body);
    if (!parsed.success) {
      return err(new FetchError('parse', 'GET /metrics returned an unexpected payload', { cause: parsed.error }));
    }

    return ok(toSnapshot(parsed.data));
  }

  async sendEvent(record: LogRecord): Promise<Result<void, IngestError>> {
    try {
      const res = await fetch(`${this.baseUrl}/ingest`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(record),
        signal: AbortSignal.timeout(this.ingestTimeoutMs),
      });
      if (!res.ok) {
        return err(new IngestError('http', `POST /ingest returned ${res.status}`));
      }
      return ok(undefined);
    } catch (e: unknown) {
      if (isTimeout(e)) {
        return err(new IngestError('timeout', `POST /ingest timed out after ${this.ingestTimeoutMs}ms`, { cause: e }));
      }
      return err(new IngestError('transport', `POST /ingest failed: ${describeFailure(e)}`, { cause: e }));
    }
  }

  private requestFailure(e: unknown): FetchError {
    if (isTimeout(e)) {
      return new FetchError('timeout', `GET /metrics timed out after ${this.requestTimeoutMs}ms`, { cause: e });
    }
    return new FetchError('transport', `GET /metrics failed: ${describeFailure(e)}`, { cause: e });
  }
}
