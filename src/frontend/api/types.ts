/* ------------------------------------------------------------------ */
/*  Shared API response types mirroring backend contracts              */
/* ------------------------------------------------------------------ */

export type BackendStatus = 'pending' | 'reachable' | 'unreachable';

export type Severity = 'critical' | 'warning';

/** Trend point from the server's rolling window (oldest first). */
export interface HistoryRecord {
  time: string;
  label: string;
  throughput: number;
  errorRatePercent: number;
}

export interface KpiCard {
  key: 'throughput' | 'errorRate' | 'p95Latency' | 'estimatedCost';
  label: string;
  value: number;
  display: string;
}

export interface LatencyBar {
  level: 'P50' | 'P95' | 'P99';
  ms: number;
}

export interface UserBar {
  userId: string;
  requests: number;
}

export interface ClassifiedAnomaly {
  message: string;
  severity: Severity;
}

export type IncidentLog =
  | { state: 'nominal' }
  | { state: 'alerts'; items: ClassifiedAnomaly[]; criticalCount: number; warningCount: number };

export interface Settings {
  sensitivity: number;
  liveStream: boolean;
}

/** Full read model from GET /api/v1/dashboard */
export interface DashboardResponse {
  backend: {
    status: BackendStatus;
    notice: string | null;
    error: string | null;
    errorKind: 'transport' | 'timeout' | 'http' | 'parse' | null;
  };
  lastUpdated: string | null;
  kpis: KpiCard[] | null;
  trends: HistoryRecord[];
  latency: LatencyBar[] | null;
  users: UserBar[] | null;
  incidents: IncidentLog | null;
  settings: Settings;
}

/** Response from POST /api/v1/burst */
export interface BurstResponse {
  status: 'sent';
  attempted: number;
}
