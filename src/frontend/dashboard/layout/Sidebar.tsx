/* ------------------------------------------------------------------ */
/*  Sidebar: live-stream toggle, sensitivity (k), burst generator      */
/* ------------------------------------------------------------------ */

import { useEffect, useState } from 'react';
import { useDashboard } from '../../store/index.js';

const K_MIN = 0.5;
const K_MAX = 3.0;
const K_STEP = 0.1;

export function Sidebar() {
  const { state, setLiveStream, setSensitivity, generateBurst, refresh } = useDashboard();
  const settings = state.view?.settings;

  // Local slider value; committed on release so dragging does not flood PATCH.
  const serverK = settings?.sensitivity;
  const [k, setK] = useState(serverK ?? 1.5);
  useEffect(() => {
    if (serverK !== undefined) setK(serverK);
  }, [serverK]);

  return (
    <aside className="sidebar">
      <h2>Settings</h2>

      <label className="sidebar-row">
        <input
          type="checkbox"
          checked={settings?.liveStream ?? false}
          disabled={!settings}
          onChange={(e) => setLiveStream(e.target.checked)}
        />
        <span>Live Stream Simulation</span>
      </label>

      <label className="sidebar-label" htmlFor="sensitivity">
        Anomaly Sensitivity (k): <strong>{k.toFixed(1)}</strong>
      </label>
      <input
        id="sensitivity"
        type="range"
        min={K_MIN}
        max={K_MAX}
        step={K_STEP}
        value={k}
        disabled={!settings}
        onChange={(e) => setK(Number(e.target.value))}
        onPointerUp={() => setSensitivity(k)}
        onKeyUp={() => setSensitivity(k)}
      />

      <hr />

      <button className="btn-burst" onClick={generateBurst}>
        Generate Burst Logs
      </button>
      {state.burstNotice && <div className="success-banner">{state.burstNotice}</div>}

      <button className="btn-refresh" onClick={refresh} disabled={state.loading}>
        {state.loading ? '↻ Loading…' : '↻ Refresh now'}
      </button>
    </aside>
  );
}
