/* ------------------------------------------------------------------ */
/*  Throughput trend — requests/min over the rolling window            */
/* ------------------------------------------------------------------ */

import { useDashboard } from '../../store/index.js';
import {
  ResponsiveContainer,
  AreaChart,
  Area,
  XAxis,
  YAxis,
  Tooltip,
  CartesianGrid,
} from 'recharts';

export const AXIS_TICK = { fill: '#94a3b8', fontSize: 12 };
export const TOOLTIP_STYLE = {
  contentStyle: { background: '#1e293b', border: '1px solid #334155', borderRadius: 6 },
  labelStyle: { color: '#e2e8f0' },
  itemStyle: { color: '#e2e8f0' },
};

export function ThroughputChart() {
  const { state } = useDashboard();
  const trends = state.view?.trends ?? [];

  return (
    <div className="panel">
      <h3>Throughput (Requests/Min)</h3>
      {trends.length === 0 ? (
        <p className="muted">No data available</p>
      ) : (
        <ResponsiveContainer width="100%" height={240}>
          <AreaChart data={trends} margin={{ top: 8, right: 16, bottom: 4, left: 0 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#334155" />
            <XAxis dataKey="label" tick={AXIS_TICK} />
            <YAxis tick={AXIS_TICK} />
            <Tooltip {...TOOLTIP_STYLE} />
            <Area
              type="monotone"
              dataKey="throughput"
              name="RPM"
              stroke="#29b5e8"
              fill="#29b5e8"
              fillOpacity={0.3}
              isAnimationActive={false}
            />
          </AreaChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
