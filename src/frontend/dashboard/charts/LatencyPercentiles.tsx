/* ------------------------------------------------------------------ */
/*  Latency percentiles — P50 / P95 / P99 bars for the latest snapshot */
/* ------------------------------------------------------------------ */

import { useDashboard } from '../../store/index.js';
import {
  ResponsiveContainer,
  BarChart,
  Bar,
  XAxis,
  YAxis,
  Tooltip,
  CartesianGrid,
} from 'recharts';
import { AXIS_TICK, TOOLTIP_STYLE } from './ThroughputChart.js';

export function LatencyPercentiles() {
  const { state } = useDashboard();
  const latency = state.view?.latency;

  return (
    <div className="panel">
      <h3>Latency Percentiles</h3>
      {!latency ? (
        <p className="muted">No data available</p>
      ) : (
        <ResponsiveContainer width="100%" height={240}>
          <BarChart data={latency} margin={{ top: 8, right: 16, bottom: 4, left: 0 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#334155" />
            <XAxis dataKey="level" tick={AXIS_TICK} />
            <YAxis tick={AXIS_TICK} unit=" ms" />
            <Tooltip {...TOOLTIP_STYLE} />
            <Bar dataKey="ms" name="ms" fill="#7f00ff" radius={[4, 4, 0, 0]} isAnimationActive={false} />
          </BarChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
