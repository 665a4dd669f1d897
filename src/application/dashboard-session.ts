import type { Logger } from 'pino';
import {
  deriveHistoryRecord,
  type DashboardSettings,
  type HistoryRecord,
  type MetricsSnapshot,
} from '../domain/index.js';
import type { FetchError } from '../infrastructure/errors.js';
import { HistoryBuffer } from './history-buffer.js';

export type BackendStatus = 'pending' | 'reachable' | 'unreachable';

/** Settled, read-only view of the session handed to readers. */
export interface SessionState {
  readonly current: MetricsSnapshot | null;
  readonly fetchedAt: Date | null;
  readonly history: readonly HistoryRecord[];
  readonly backend: BackendStatus;
  readonly lastError: FetchError | null;
  readonly settings: DashboardSettings;
}

/**
 * Owner of everything that lives across refresh cycles.
 *
 * Created empty at start-up and handed to the scheduler and the view;
 * dropped with the process. Nothing here is module-level state.
 *
 * Node.js runs `applySnapshot()` to completion before any reader gets the
 * event loop back, so readers see either the old snapshot/history pair or
 * the new one, never a mix.
 */
export class DashboardSession {
  private readonly history: HistoryBuffer;
  private current: MetricsSnapshot | null = null;
  private fetchedAt: Date | null = null;
  private backend: BackendStatus = 'pending';
  private lastError: FetchError | null = null;
  private settings: DashboardSettings;
  private readonly log: Logger;

  constructor(settings: DashboardSettings, log: Logger, history: HistoryBuffer = new HistoryBuffer()) {
    this.settings = settings;
    this.log = log;
    this.history = history;
  }

  /** Replaces the current snapshot and appends its trend record, as one step. */
  applySnapshot(snapshot: MetricsSnapshot, fetchedAt: Date): HistoryRecord {
    const record = deriveHistoryRecord(snapshot, fetchedAt);
    this.current = snapshot;
    this.fetchedAt = fetchedAt;
    this.history.append(record);
    this.backend = 'reachable';
    this.lastError = null;
    return record;
  }

  /** Marks the backend unreachable. Snapshot and history are left as they were. */
  recordFailure(error: FetchError): void {
    this.backend = 'unreachable';
    this.lastError = error;
  }

  updateSettings(patch: Partial<DashboardSettings>): DashboardSettings {
    const next: DashboardSettings = {
      sensitivity: patch.sensitivity ?? this.settings.sensitivity,
      liveStream: patch.liveStream ?? this.settings.liveStream,
    };
    this.log.info({ from: this.settings, to: next }, 'Dashboard settings updated');
    this.settings = next;
    return next;
  }

  getSettings(): DashboardSettings {
    return this.settings;
  }

  state(): SessionState {
    return {
      current: this.current,
      fetchedAt: this.fetchedAt,
      history: this.history.snapshot(),
      backend: this.backend,
      lastError: this.lastError,
      settings: this.settings,
    };
  }
}
