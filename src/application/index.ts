export { HistoryBuffer, HISTORY_CAPACITY } from './history-buffer.js';
export { DashboardSession } from './dashboard-session.js';
export type { BackendStatus, SessionState } from './dashboard-session.js';
export { RefreshScheduler, DEFAULT_REFRESH_INTERVAL_MS } from './refresh-scheduler.js';
export type { CycleOutcome, CyclePhase, RefreshSchedulerOptions } from './refresh-scheduler.js';
export { generateLogRecord, sendBurst, BURST_SIZE, BURST_USERS } from './burst-generator.js';
export type { BurstOptions, BurstReceipt, RandomSource } from './burst-generator.js';
export { buildDashboardView, UNREACHABLE_NOTICE } from './dashboard-view.js';
export type { DashboardView, KpiCard, LatencyBar, UserBar, BackendPanel } from './dashboard-view.js';
export { metricsPayloadSchema, toSnapshot } from './metrics-schema.js';
export type { MetricsPayload } from './metrics-schema.js';
export { settingsPatchSchema } from './settings-schema.js';
export type { SettingsPatch } from './settings-schema.js';
export { DashboardService } from './dashboard-service.js';
export type { DashboardServiceOptions } from './dashboard-service.js';
