import type { Logger } from 'pino';
import type { DashboardSettings } from '../domain/index.js';
import type { DashboardConfig } from '../infrastructure/config.js';
import type { EventSink, MetricsSource } from '../infrastructure/metrics-client.js';
import { sendBurst, type BurstReceipt, type RandomSource } from './burst-generator.js';
import { DashboardSession } from './dashboard-session.js';
import { buildDashboardView, type DashboardView } from './dashboard-view.js';
import { RefreshScheduler } from './refresh-scheduler.js';
import type { SettingsPatch } from './settings-schema.js';

export interface DashboardServiceOptions {
  client: MetricsSource & EventSink;
  config: Pick<DashboardConfig, 'refreshIntervalMs' | 'sensitivity' | 'liveStream'>;
  log: Logger;
  now?: () => Date;
  random?: RandomSource;
}

/**
 * Use cases behind the HTTP interface.
 *
 * Owns one DashboardSession for the lifetime of the process and the
 * scheduler that feeds it. The live-stream setting decides whether the
 * scheduler's timer is armed.
 */
export class DashboardService {
  readonly session: DashboardSession;
  readonly scheduler: RefreshScheduler;
  private readonly client: MetricsSource & EventSink;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly random: RandomSource;

  constructor(options: DashboardServiceOptions) {
    this.client = options.client;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;

    this.session = new DashboardSession(
      { sensitivity: options.config.sensitivity, liveStream: options.config.liveStream },
      options.log,
    );
    this.scheduler = new RefreshScheduler({
      source: options.client,
      session: this.session,
      log: options.log,
      intervalMs: options.config.refreshIntervalMs,
      now: this.now,
    });
  }

  /** Arms auto-refresh when the live stream is on. */
  start(): void {
    this.scheduler.setLive(this.session.getSettings().liveStream);
  }

  stop(): void {
    this.scheduler.stop();
  }

  view(): DashboardView {
    return buildDashboardView(this.session.state());
  }

  /** Runs (or joins) a refresh cycle and returns the settled view. */
  async refresh(): Promise<DashboardView> {
    await this.scheduler.trigger();
    return this.view();
  }

  getSettings(): DashboardSettings {
    return this.session.getSettings();
  }

  updateSettings(patch: SettingsPatch): DashboardSettings {
    const before = this.session.getSettings();
    const next = this.session.updateSettings(patch);
    if (next.liveStream !== before.liveStream) {
      this.scheduler.setLive(next.liveStream);
    }
    return next;
  }

  /** Independent of the polling cycle; returns before any record is delivered. */
  burst(): BurstReceipt {
    return sendBurst(this.client, this.log, { random: this.random, now: this.now });
  }
}
