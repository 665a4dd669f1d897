/* ------------------------------------------------------------------ */
/*  Error rate trend — percent over the rolling window                 */
/* ------------------------------------------------------------------ */

import { useDashboard } from '../../store/index.js';
import {
  ResponsiveContainer,
  LineChart,
  Line,
  XAxis,
  YAxis,
  Tooltip,
  CartesianGrid,
} from 'recharts';
import { AXIS_TICK, TOOLTIP_STYLE } from './ThroughputChart.js';

export function ErrorRateChart() {
  const { state } = useDashboard();
  const trends = state.view?.trends ?? [];

  return (
    <div className="panel">
      <h3>Error Rate (%)</h3>
      {trends.length === 0 ? (
        <p className="muted">No data available</p>
      ) : (
        <ResponsiveContainer width="100%" height={240}>
          <LineChart data={trends} margin={{ top: 8, right: 16, bottom: 4, left: 0 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#334155" />
            <XAxis dataKey="label" tick={AXIS_TICK} />
            <YAxis tick={AXIS_TICK} unit="%" />
            <Tooltip {...TOOLTIP_STYLE} />
            <Line
              type="monotone"
              dataKey="errorRatePercent"
              name="error %"
              stroke="#ff4b4b"
              dot={false}
              isAnimationActive={false}
            />
          </LineChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
