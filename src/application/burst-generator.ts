import type { Logger } from 'pino';
import type { LogRecord } from '../domain/index.js';
import type { EventSink } from '../infrastructure/metrics-client.js';

export const BURST_SIZE = 30;
export const BURST_USERS = ['alice_001', 'bob_002', 'charlie_003'] as const;
export const LATENCY_RANGE_MS = { min: 100, max: 1500 } as const;
export const TOKEN_RANGE = { min: 50, max: 2000 } as const;
export const ERROR_PROBABILITY = 0.08;

/** Uniform in [0, 1), like Math.random. */
export type RandomSource = () => number;

/** Inclusive integer in [min, max]. */
function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  return items[Math.floor(random() * items.length)] ?? items[0];
}

/** One synthetic `/ingest` record. */
export function generateLogRecord(random: RandomSource = Math.random, now: Date = new Date()): LogRecord {
  return {
    timestamp: now.toISOString(),
    user_id: pick(random, BURST_USERS),
    latency_ms: randomInt(random, LATENCY_RANGE_MS.min, LATENCY_RANGE_MS.max),
    tokens_used: randomInt(random, TOKEN_RANGE.min, TOKEN_RANGE.max),
    is_error: random() < ERROR_PROBABILITY,
  };
}

export interface BurstOptions {
  count?: number;
  random?: RandomSource;
  now?: () => Date;
}

export interface BurstReceipt {
  /** Records handed to the sink. "Sent" means attempted, not delivered. */
  readonly attempted: number;
  /** Resolves once every send has settled. Never rejects. */
  readonly settled: Promise<void>;
}

/**
 * Fires a burst of synthetic records at the backend without waiting.
 *
 * Delivery failures are dropped on purpose: the burst is best-effort test
 * traffic and the user only ever sees "sent".
 */
export function sendBurst(sink: EventSink, log: Logger, options: BurstOptions = {}): BurstReceipt {
  const count = options.count ?? BURST_SIZE;
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());

  const sends: Promise<void>[] = [];
  for (let i = 0; i < count; i++) {
    const record = generateLogRecord(random, now());
    sends.push(
      sink.sendEvent(record).then(
        (result) => {
          if (!result.ok) {
            // Discarded: best-effort delivery.
            log.debug({ kind: result.error.kind, user_id: record.user_id }, 'Burst record not delivered');
          }
        },
        (e: unknown) => {
          log.debug({ err: e, user_id: record.user_id }, 'Burst record not delivered');
        },
      ),
    );
  }

  log.info({ count }, 'Burst sent');

  return {
    attempted: count,
    settled: Promise.all(sends).then(() => undefined),
  };
}
