import { z } from 'zod';
import { createSnapshot, type MetricsSnapshot } from '../domain/index.js';

/**
 * Zod schema for the backend's `GET /metrics` body.
 *
 * Every field is optional; `null` is read the same as absent. A field that
 * is present with the wrong type fails the parse, which the client reports
 * as a malformed body.
 */
const count = z.number().nullish();

export const metricsPayloadSchema = z.object({
  requests_per_min: count,
  error_rate: count,
  p50_latency: count,
  p95_latency: count,
  p99_latency: count,
  estimated_cost_usd: count,
  per_user_requests: z.record(z.string(), z.number()).nullish(),
  anomalies: z.array(z.string()).nullish(),
});

export type MetricsPayload = z.infer<typeof metricsPayloadSchema>;

/** Maps the wire payload onto a frozen snapshot, defaulting absent fields. */
export function toSnapshot(payload: MetricsPayload): MetricsSnapshot {
  return createSnapshot({
    requestsPerMinute: payload.requests_per_min ?? 0,
    errorRate: payload.error_rate ?? 0,
    p50Latency: payload.p50_latency ?? 0,
    p95Latency: payload.p95_latency ?? 0,
    p99Latency: payload.p99_latency ?? 0,
    estimatedCostUsd: payload.estimated_cost_usd ?? 0,
    perUserRequests: payload.per_user_requests ?? {},
    anomalies: payload.anomalies ?? [],
  });
}
