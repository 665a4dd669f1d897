export type { Result } from './result.js';
export { ok, err } from './result.js';
export type { MetricsSnapshot, HistoryRecord } from './snapshot.js';
export {
  createSnapshot,
  deriveHistoryRecord,
  formatClock,
  formatDateTime,
  toPercent,
} from './snapshot.js';
export type { AnomalySeverity, ClassifiedAnomaly, IncidentLog } from './anomaly.js';
export { classifySeverity, classifyAnomalies, summarizeIncidents } from './anomaly.js';
export type { LogRecord } from './log-record.js';
export type { DashboardSettings } from './settings.js';
export { SENSITIVITY_MIN, SENSITIVITY_MAX, DEFAULT_SENSITIVITY } from './settings.js';
