/* ------------------------------------------------------------------ */
/*  Dashboard read model                                               */
/*                                                                     */
/*  Pure function from settled session state to everything the SPA     */
/*  renders. The SPA does no arithmetic or formatting of its own.       */
/* ------------------------------------------------------------------ */

import {
  formatDateTime,
  summarizeIncidents,
  toPercent,
  type DashboardSettings,
  type HistoryRecord,
  type IncidentLog,
  type MetricsSnapshot,
} from '../domain/index.js';
import type { FetchErrorKind } from '../infrastructure/errors.js';
import type { BackendStatus, SessionState } from './dashboard-session.js';

export const UNREACHABLE_NOTICE = 'Backend unreachable. Ensure the metrics backend is running.';

export type KpiKey = 'throughput' | 'errorRate' | 'p95Latency' | 'estimatedCost';

export interface KpiCard {
  readonly key: KpiKey;
  readonly label: string;
  readonly value: number;
  readonly display: string;
}

export interface LatencyBar {
  readonly level: 'P50' | 'P95' | 'P99';
  readonly ms: number;
}

export interface UserBar {
  readonly userId: string;
  readonly requests: number;
}

export interface BackendPanel {
  readonly status: BackendStatus;
  readonly notice: string | null;
  readonly error: string | null;
  readonly errorKind: FetchErrorKind | null;
}

export interface DashboardView {
  readonly backend: BackendPanel;
  readonly lastUpdated: string | null;
  /** Null until the first successful fetch; likewise `latency`, `users`, `incidents`. */
  readonly kpis: readonly KpiCard[] | null;
  readonly trends: readonly HistoryRecord[];
  readonly latency: readonly LatencyBar[] | null;
  readonly users: readonly UserBar[] | null;
  readonly incidents: IncidentLog | null;
  readonly settings: DashboardSettings;
}

export function buildKpis(s: MetricsSnapshot): KpiCard[] {
  return [
    {
      key: 'throughput',
      label: 'Throughput',
      value: s.requestsPerMinute,
      display: `${s.requestsPerMinute} RPM`,
    },
    {
      key: 'errorRate',
      label: 'Error Rate',
      value: toPercent(s.errorRate),
      display: `${(s.errorRate * 100).toFixed(1)}%`,
    },
    {
      key: 'p95Latency',
      label: 'P95 Latency',
      value: s.p95Latency,
      display: `${s.p95Latency.toFixed(0)} ms`,
    },
    {
      key: 'estimatedCost',
      label: 'Est. Cost',
      value: s.estimatedCostUsd,
      display: `$${s.estimatedCostUsd.toFixed(4)}`,
    },
  ];
}

export function buildLatencyBars(s: MetricsSnapshot): LatencyBar[] {
  return [
    { level: 'P50', ms: s.p50Latency },
    { level: 'P95', ms: s.p95Latency },
    { level: 'P99', ms: s.p99Latency },
  ];
}

/** Ascending by request count, ties by user id. */
export function buildUserBars(s: MetricsSnapshot): UserBar[] {
  return Object.entries(s.perUserRequests)
    .map(([userId, requests]) => ({ userId, requests }))
    .sort((a, b) => a.requests - b.requests || (a.userId < b.userId ? -1 : a.userId > b.userId ? 1 : 0));
}

export function buildDashboardView(state: SessionState): DashboardView {
  const snapshot = state.current;

  return {
    backend: {
      status: state.backend,
      notice: state.backend === 'unreachable' ? UNREACHABLE_NOTICE : null,
      error: state.lastError?.message ?? null,
      errorKind: state.lastError?.kind ?? null,
    },
    lastUpdated: state.fetchedAt ? formatDateTime(state.fetchedAt) : null,
    kpis: snapshot ? buildKpis(snapshot) : null,
    trends: state.history,
    latency: snapshot ? buildLatencyBars(snapshot) : null,
    users: snapshot ? buildUserBars(snapshot) : null,
    incidents: snapshot ? summarizeIncidents(snapshot.anomalies) : null,
    settings: state.settings,
  };
}
