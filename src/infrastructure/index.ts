export { MetricsClient, DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_INGEST_TIMEOUT_MS } from './metrics-client.js';
export type { MetricsSource, EventSink, MetricsClientOptions } from './metrics-client.js';
export { FetchError, IngestError, ConfigError } from './errors.js';
export type { FetchErrorKind } from './errors.js';
export { loadDashboardConfig } from './config.js';
export type { DashboardConfig } from './config.js';
export { default as dashboardPlugin } from './dashboard-plugin.js';
export type { DashboardPluginOptions } from './dashboard-plugin.js';
