import { describe, it, expect, vi } from 'vitest';
import {
  generateLogRecord,
  sendBurst,
  BURST_SIZE,
  BURST_USERS,
} from '../../src/application/burst-generator.js';
import { IngestError } from '../../src/infrastructure/errors.js';
import { err, ok, type LogRecord, type Result } from '../../src/domain/index.js';
import type { EventSink } from '../../src/infrastructure/metrics-client.js';
import { fakeLogger } from '../helpers.js';

const NOW = new Date(Date.UTC(2026, 6, 14, 10, 30, 0));

/** Replays the given values, in order, as Math.random would. */
function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length] ?? 0;
}

function fakeSink(result: Result<void, IngestError>) {
  const sendEvent = vi.fn<(record: LogRecord) => Promise<Result<void, IngestError>>>()
    .mockResolvedValue(result);
  const sink: EventSink = { sendEvent };
  return { sink, sendEvent };
}

describe('generateLogRecord', () => {
  it('takes the low end of every range when random() is 0', () => {
    expect(generateLogRecord(() => 0, NOW)).toEqual({
      timestamp: '2026-07-14T10:30:00.000Z',
      user_id: 'alice_001',
      latency_ms: 100,
      tokens_used: 50,
      is_error: true,
    });
  });

  it('stays inside the ranges when random() approaches 1', () => {
    expect(generateLogRecord(() => 0.999, NOW)).toEqual({
      timestamp: '2026-07-14T10:30:00.000Z',
      user_id: 'charlie_003',
      latency_ms: 1499,
      tokens_used: 1999,
      is_error: false,
    });
  });

  it('draws user, latency, tokens and error flag in that order', () => {
    const record = generateLogRecord(sequence(0.5, 0.5, 0.5, 0.08), NOW);
    expect(record).toEqual({
      timestamp: '2026-07-14T10:30:00.000Z',
      user_id: 'bob_002',
      latency_ms: 800,
      tokens_used: 1025,
      is_error: false,
    });
  });

  it('only draws known users and integer values', () => {
    for (let i = 0; i < 200; i++) {
      const r = generateLogRecord(Math.random, NOW);
      expect(BURST_USERS).toContain(r.user_id);
      expect(Number.isInteger(r.latency_ms)).toBe(true);
      expect(r.latency_ms).toBeGreaterThanOrEqual(100);
      expect(r.latency_ms).toBeLessThanOrEqual(1500);
      expect(r.tokens_used).toBeGreaterThanOrEqual(50);
      expect(r.tokens_used).toBeLessThanOrEqual(2000);
    }
  });
});

describe('sendBurst', () => {
  it('sends 30 records by default', async () => {
    const { sink, sendEvent } = fakeSink(ok(undefined));
    const receipt = sendBurst(sink, fakeLogger(), { random: () => 0, now: () => NOW });

    expect(BURST_SIZE).toBe(30);
    expect(receipt.attempted).toBe(30);
    expect(sendEvent).toHaveBeenCalledTimes(30);
    await expect(receipt.settled).resolves.toBeUndefined();
  });

  it('honours a custom count', () => {
    const { sink, sendEvent } = fakeSink(ok(undefined));
    const receipt = sendBurst(sink, fakeLogger(), { count: 5 });

    expect(receipt.attempted).toBe(5);
    expect(sendEvent).toHaveBeenCalledTimes(5);
  });

  it('returns before any send has settled', () => {
    const sendEvent = vi.fn(() => new Promise<Result<void, IngestError>>(() => {}));
    const receipt = sendBurst({ sendEvent }, fakeLogger(), { count: 3 });

    expect(receipt.attempted).toBe(3);
    expect(sendEvent).toHaveBeenCalledTimes(3);
  });

  it('swallows delivery failures', async () => {
    const { sink } = fakeSink(err(new IngestError('transport', 'POST /ingest failed: fetch failed')));
    const log = fakeLogger();

    const receipt = sendBurst(sink, log, { count: 4, random: () => 0 });

    await expect(receipt.settled).resolves.toBeUndefined();
    expect(log.debug).toHaveBeenCalledTimes(4);
    expect(log.debug).toHaveBeenCalledWith(
      { kind: 'transport', user_id: 'alice_001' },
      'Burst record not delivered',
    );
  });

  it('settles even when the sink rejects', async () => {
    const failure = new Error('socket hang up');
    const sendEvent = vi.fn<(record: LogRecord) => Promise<Result<void, IngestError>>>()
      .mockRejectedValue(failure);
    const log = fakeLogger();

    const receipt = sendBurst({ sendEvent }, log, { count: 2, random: () => 0 });

    await expect(receipt.settled).resolves.toBeUndefined();
    expect(log.debug).toHaveBeenCalledTimes(2);
    expect(log.debug).toHaveBeenCalledWith(
      { err: failure, user_id: 'alice_001' },
      'Burst record not delivered',
    );
  });

  it('logs the burst as sent regardless of outcome', () => {
    const { sink } = fakeSink(err(new IngestError('timeout', 'POST /ingest timed out after 1000ms')));
    const log = fakeLogger();

    sendBurst(sink, log);

    expect(log.info).toHaveBeenCalledWith({ count: 30 }, 'Burst sent');
  });
});
