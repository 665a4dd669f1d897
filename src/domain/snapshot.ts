/**
 * Core value types for the metrics pipeline.
 *
 * These carry no framework dependencies. A snapshot is frozen when it is
 * built and is never mutated afterwards.
 */

/** One fetched metrics payload: the backend's current aggregate state. */
export interface MetricsSnapshot {
  readonly requestsPerMinute: number;
  readonly errorRate: number; // 0..1
  readonly p50Latency: number; // ms
  readonly p95Latency: number;
  readonly p99Latency: number;
  readonly estimatedCostUsd: number;
  readonly perUserRequests: Readonly<Record<string, number>>;
  readonly anomalies: readonly string[];
}

/** A point on the trend charts, derived from one successful fetch. */
export interface HistoryRecord {
  readonly time: string; // ISO-8601 instant of the fetch
  readonly label: string; // HH:MM:SS, local wall clock
  readonly throughput: number;
  readonly errorRatePercent: number;
}

export function createSnapshot(fields: Partial<MetricsSnapshot>): MetricsSnapshot {
  return Object.freeze({
    requestsPerMinute: fields.requestsPerMinute ?? 0,
    errorRate: fields.errorRate ?? 0,
    p50Latency: fields.p50Latency ?? 0,
    p95Latency: fields.p95Latency ?? 0,
    p99Latency: fields.p99Latency ?? 0,
    estimatedCostUsd: fields.estimatedCostUsd ?? 0,
    perUserRequests: Object.freeze({ ...fields.perUserRequests }),
    anomalies: Object.freeze([...(fields.anomalies ?? [])]),
  });
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `HH:MM:SS` in the process's local time zone. */
export function formatClock(at: Date): string {
  return `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`;
}

/** `YYYY-MM-DD HH:MM:SS` in the process's local time zone. */
export function formatDateTime(at: Date): string {
  return `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())} ${formatClock(at)}`;
}

/** Converts a 0..1 ratio to a percentage rounded to 4 decimals. */
export function toPercent(ratio: number): number {
  return parseFloat((ratio * 100).toFixed(4));
}

/**
 * Derives the trend record for a snapshot fetched at `fetchedAt`.
 * Deterministic: same inputs, same record.
 */
export function deriveHistoryRecord(snapshot: MetricsSnapshot, fetchedAt: Date): HistoryRecord {
  return Object.freeze({
    time: fetchedAt.toISOString(),
    label: formatClock(fetchedAt),
    throughput: snapshot.requestsPerMinute,
    errorRatePercent: toPercent(snapshot.errorRate),
  });
}
