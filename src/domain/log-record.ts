/**
 * Synthetic log record accepted by the backend's `POST /ingest`.
 * Field names follow the backend's wire contract.
 */
export interface LogRecord {
  readonly timestamp: string; // ISO-8601 UTC
  readonly user_id: string;
  readonly latency_ms: number;
  readonly tokens_used: number;
  readonly is_error: boolean;
}
