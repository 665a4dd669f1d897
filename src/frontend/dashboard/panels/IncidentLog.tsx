/* ------------------------------------------------------------------ */
/*  Incident log — backend anomalies by lexical severity               */
/*  Empty list → "all nominal"; otherwise 🔴 critical / 🟡 warning.    */
/* ------------------------------------------------------------------ */

import { useDashboard } from '../../store/index.js';

const SEV_ICONS: Record<string, string> = {
  critical: '🔴',
  warning: '🟡',
};

export function IncidentLog() {
  const { state } = useDashboard();
  const incidents = state.view?.incidents;

  return (
    <div className="panel incident-log">
      <h3>Incident Log</h3>

      {!incidents ? (
        <p className="muted">Waiting for the first snapshot…</p>
      ) : incidents.state === 'nominal' ? (
        <div className="success-banner">✅ All systems nominal. No anomalies detected.</div>
      ) : (
        <ul className="incident-list">
          {incidents.items.map((a, i) => (
            <li key={`${i}-${a.message}`} className={`incident incident-${a.severity}`}>
              {SEV_ICONS[a.severity] ?? ''} {a.message}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}
