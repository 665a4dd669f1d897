/* ------------------------------------------------------------------ */
/*  Tests for src/infrastructure/metrics-client.ts                     */
/*  Verifies URLs, payload mapping and the error taxonomy.             */
/* ------------------------------------------------------------------ */

import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { MetricsClient } from '../../src/infrastructure/metrics-client.js';
import { FetchError, IngestError } from '../../src/infrastructure/errors.js';

// Mock global fetch
const fetchMock = vi.fn();
vi.stubGlobal('fetch', fetchMock);

function respond(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    json: () => Promise.resolve(body),
  };
}

function unparseable() {
  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    json: () => Promise.reject(new SyntaxError('Unexpected token < in JSON at position 0')),
  };
}

const refused = () =>
  new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:8000') });

const timedOut = () => new DOMException('The operation was aborted due to timeout', 'TimeoutError');

const client = new MetricsClient({ baseUrl: 'http://backend.test/' });

beforeEach(() => {
  fetchMock.mockReset();
});

afterAll(() => {
  vi.unstubAllGlobals();
});

describe('MetricsClient.fetchMetrics', () => {
  it('GETs /metrics under the base URL with a timeout signal', async () => {
    fetchMock.mockResolvedValue(respond({}));
    await client.fetchMetrics();

    expect(fetchMock).toHaveBeenCalledWith(
      'http://backend.test/metrics',
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('returns the parsed snapshot', async () => {
    fetchMock.mockResolvedValue(respond({
      requests_per_min: 18,
      error_rate: 0.1,
      p95_latency: 350,
      per_user_requests: { bob_002: 9 },
      anomalies: ['CRITICAL: error rate 10%'],
    }));

    const result = await client.fetchMetrics();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.requestsPerMinute).toBe(18);
    expect(result.value.errorRate).toBe(0.1);
    expect(result.value.p95Latency).toBe(350);
    expect(result.value.p50Latency).toBe(0);
    expect(result.value.perUserRequests).toEqual({ bob_002: 9 });
    expect(result.value.anomalies).toEqual(['CRITICAL: error rate 10%']);
  });

  it('treats an empty object as an all-zero snapshot', async () => {
    fetchMock.mockResolvedValue(respond({}));
    const result = await client.fetchMetrics();

    expect(result).toEqual({
      ok: true,
      value: {
        requestsPerMinute: 0,
        errorRate: 0,
        p50Latency: 0,
        p95Latency: 0,
        p99Latency: 0,
        estimatedCostUsd: 0,
        perUserRequests: {},
        anomalies: [],
      },
    });
  });

  it('reports a refused connection as a transport error', async () => {
    fetchMock.mockRejectedValue(refused());
    const result = await client.fetchMetrics();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.error.kind).toBe('transport');
    expect(result.error.message).toBe('GET /metrics failed: fetch failed (connect ECONNREFUSED 127.0.0.1:8000)');
  });

  it('reports a timeout', async () => {
    fetchMock.mockRejectedValue(timedOut());
    const result = await client.fetchMetrics();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('timeout');
    expect(result.error.message).toBe('GET /metrics timed out after 3000ms');
  });

  it('uses the configured request timeout in the message', async () => {
    const fast = new MetricsClient({ baseUrl: 'http://backend.test', requestTimeoutMs: 250 });
    fetchMock.mockRejectedValue(timedOut());

    const result = await fast.fetchMetrics();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('GET /metrics timed out after 250ms');
  });

  it('reports a non-2xx status as an http error', async () => {
    fetchMock.mockResolvedValue(respond({ detail: 'boom' }, 500));
    const result = await client.fetchMetrics();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('http');
    expect(result.error.status).toBe(500);
    expect(result.error.message).toBe('GET /metrics returned 500');
  });

  it('does not read an error body as a zero-valued snapshot', async () => {
    const json = vi.fn(() => Promise.resolve({ detail: 'Internal Server Error' }));
    fetchMock.mockResolvedValue({ ok: false, status: 500, statusText: 'Internal Server Error', json });

    const result = await client.fetchMetrics();

    expect(result.ok).toBe(false);
    expect(json).not.toHaveBeenCalled();
  });

  it('reports a body that is not JSON as a parse error', async () => {
    fetchMock.mockResolvedValue(unparseable());
    const result = await client.fetchMetrics();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('parse');
    expect(result.error.message).toBe('GET /metrics returned a body that is not JSON');
  });

  it('reports a payload of the wrong shape as a parse error', async () => {
    fetchMock.mockResolvedValue(respond(['not', 'an', 'object']));
    const result = await client.fetchMetrics();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('parse');
    expect(result.error.message).toBe('GET /metrics returned an unexpected payload');
  });

  it('never rejects', async () => {
    fetchMock.mockRejectedValue('not even an Error');
    await expect(client.fetchMetrics()).resolves.toMatchObject({ ok: false });
  });
});

describe('MetricsClient.sendEvent', () => {
  const record = {
    timestamp: '2026-07-14T10:30:00.000Z',
    user_id: 'alice_001',
    latency_ms: 420,
    tokens_used: 900,
    is_error: false,
  };

  it('POSTs the record as JSON to /ingest', async () => {
    fetchMock.mockResolvedValue(respond({ status: 'ok' }));
    const result = await client.sendEvent(record);

    expect(result).toEqual({ ok: true, value: undefined });
    expect(fetchMock).toHaveBeenCalledWith(
      'http://backend.test/ingest',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(record),
      }),
    );
  });

  it('returns a transport error instead of throwing', async () => {
    fetchMock.mockRejectedValue(refused());
    const result = await client.sendEvent(record);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(IngestError);
    expect(result.error.kind).toBe('transport');
  });

  it('returns a timeout error after the ingest timeout', async () => {
    fetchMock.mockRejectedValue(timedOut());
    const result = await client.sendEvent(record);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('timeout');
    expect(result.error.message).toBe('POST /ingest timed out after 1000ms');
  });

  it('returns an http error for a non-2xx status', async () => {
    fetchMock.mockResolvedValue(respond({}, 503));
    const result = await client.sendEvent(record);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('http');
    expect(result.error.message).toBe('POST /ingest returned 503');
  });
});
