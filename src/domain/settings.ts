/** Bounds of the user-tunable anomaly sensitivity (k). */
export const SENSITIVITY_MIN = 0.5;
export const SENSITIVITY_MAX = 3.0;
export const DEFAULT_SENSITIVITY = 1.5;

/**
 * Per-session UI settings.
 *
 * `sensitivity` is retained and surfaced only; the detector that would
 * consume it lives in the backend, whose `/metrics` contract takes no
 * parameter for it.
 */
export interface DashboardSettings {
  readonly sensitivity: number;
  readonly liveStream: boolean;
}
