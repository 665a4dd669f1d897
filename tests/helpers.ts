import { vi } from 'vitest';
import { createSnapshot, ok, type MetricsSnapshot, type Result } from '../src/domain/index.js';
import type { FetchError } from '../src/infrastructure/errors.js';
import type { MetricsSource } from '../src/infrastructure/metrics-client.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Snapshot with just throughput and error rate set. */
export function snapshotOf(requestsPerMinute: number, errorRate: number): MetricsSnapshot {
  return createSnapshot({ requestsPerMinute, errorRate });
}

export function okSnapshot(s: MetricsSnapshot): Result<MetricsSnapshot, FetchError> {
  return ok(s);
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

/** A promise the test settles by hand. */
export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** MetricsSource whose fetchMetrics is a vi.fn the test programs. */
export function fakeSource() {
  const fetchMetrics = vi.fn<() => Promise<Result<MetricsSnapshot, FetchError>>>();
  const source: MetricsSource = { fetchMetrics };
  return { source, fetchMetrics };
}
