import type { Logger } from 'pino';
import type { HistoryRecord } from '../domain/index.js';
import type { MetricsSource } from '../infrastructure/metrics-client.js';
import { FetchError, describeFailure } from '../infrastructure/errors.js';
import type { DashboardSession } from './dashboard-session.js';

export const DEFAULT_REFRESH_INTERVAL_MS = 5_000;

/** `idle → fetching → idle`; a cycle ends either updated or stale. */
export type CyclePhase = 'idle' | 'fetching';

export type CycleOutcome =
  | { readonly status: 'updated'; readonly record: HistoryRecord }
  | { readonly status: 'stale'; readonly error: FetchError };

export interface RefreshSchedulerOptions {
  source: MetricsSource;
  session: DashboardSession;
  log: Logger;
  intervalMs?: number;
  now?: () => Date;
}

/**
 * Drives the fetch-and-update cycle on a fixed interval.
 *
 * Single-flight: while a cycle is pending, further triggers (timer or
 * manual) join it instead of starting a second fetch. A failed cycle leaves
 * the session's snapshot and history untouched and never stops the timer.
 */
export class RefreshScheduler {
  private readonly source: MetricsSource;
  private readonly session: DashboardSession;
  private readonly log: Logger;
  private readonly intervalMs: number;
  private readonly now: () => Date;

  private inFlight: Promise<CycleOutcome> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private completed = 0;

  constructor(options: RefreshSchedulerOptions) {
    this.source = options.source;
    this.session = options.session;
    this.log = options.log;
    this.intervalMs = options.intervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  get phase(): CyclePhase {
    return this.inFlight ? 'fetching' : 'idle';
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Number of cycles that have reached `idle` again. */
  get cycles(): number {
    return this.completed;
  }

  /** Arms the timer and runs one cycle right away. No-op when already running. */
  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      void this.trigger();
    }, this.intervalMs);

    this.log.info({ intervalMs: this.intervalMs }, 'Auto-refresh started');
    void this.trigger();
  }

  /** Disarms the timer. A cycle already in flight still settles. */
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info('Auto-refresh stopped');
  }

  setLive(enabled: boolean): void {
    if (enabled) this.start();
    else this.stop();
  }

  /** Runs a cycle, or returns the pending one. Never rejects. */
  trigger(): Promise<CycleOutcome> {
    if (this.inFlight) {
      this.log.debug('Refresh already in flight, trigger coalesced');
      return this.inFlight;
    }

    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  private async runCycle(): Promise<CycleOutcome> {
    let outcome: CycleOutcome;

    try {
      const result = await this.source.fetchMetrics();

      if (result.ok) {
        const record = this.session.applySnapshot(result.value, this.now());
        this.log.debug(
          { throughput: record.throughput, errorRatePercent: record.errorRatePercent },
          'Metrics snapshot applied',
        );
        outcome = { status: 'updated', record };
      } else {
        this.session.recordFailure(result.error);
        this.log.warn(
          { kind: result.error.kind, reason: result.error.message },
          'Backend unreachable, keeping previous snapshot',
        );
        outcome = { status: 'stale', error: result.error };
      }
    } catch (e: unknown) {
      const error = new FetchError('transport', `Refresh cycle failed: ${describeFailure(e)}`, { cause: e });
      this.session.recordFailure(error);
      this.log.error({ err: e }, 'Refresh cycle threw');
      outcome = { status: 'stale', error };
    }

    this.completed++;
    return outcome;
  }
}
