/** Lexical severity of a backend-flagged anomaly. */
export type AnomalySeverity = 'critical' | 'warning';

export interface ClassifiedAnomaly {
  readonly message: string;
  readonly severity: AnomalySeverity;
}

/**
 * What the incident log shows. `nominal` is reserved for an empty
 * anomaly list; it is never produced for a non-empty one.
 */
export type IncidentLog =
  | { readonly state: 'nominal' }
  | {
      readonly state: 'alerts';
      readonly items: readonly ClassifiedAnomaly[];
      readonly criticalCount: number;
      readonly warningCount: number;
    };

const CRITICAL_TOKEN = 'CRITICAL';

export function classifySeverity(text: string): AnomalySeverity {
  return text.toUpperCase().includes(CRITICAL_TOKEN) ? 'critical' : 'warning';
}

/** Order-preserving. */
export function classifyAnomalies(anomalies: readonly string[]): ClassifiedAnomaly[] {
  return anomalies.map((message) => ({ message, severity: classifySeverity(message) }));
}

export function summarizeIncidents(anomalies: readonly string[]): IncidentLog {
  if (anomalies.length === 0) return { state: 'nominal' };

  const items = classifyAnomalies(anomalies);
  const criticalCount = items.filter((a) => a.severity === 'critical').length;

  return {
    state: 'alerts',
    items,
    criticalCount,
    warningCount: items.length - criticalCount,
  };
}
