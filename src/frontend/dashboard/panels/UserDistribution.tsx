/* ------------------------------------------------------------------ */
/*  User distribution — horizontal bars, requests per user             */
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
import { AXIS_TICK, TOOLTIP_STYLE } from '../charts/ThroughputChart.js';

export function UserDistribution() {
  const { state } = useDashboard();
  const users = state.view?.users;

  return (
    <div className="panel">
      <h3>User Distribution</h3>
      {!users ? (
        <p className="muted">No data available</p>
      ) : users.length === 0 ? (
        <p className="muted">No active user data in window.</p>
      ) : (
        <ResponsiveContainer width="100%" height={240}>
          <BarChart data={users} layout="vertical" margin={{ top: 8, right: 16, bottom: 4, left: 16 }}>
            <CartesianGrid strokeDasharray="3 3" stroke="#334155" />
            <XAxis type="number" tick={AXIS_TICK} allowDecimals={false} />
            <YAxis type="category" dataKey="userId" tick={AXIS_TICK} width={110} />
            <Tooltip {...TOOLTIP_STYLE} />
            <Bar dataKey="requests" name="Requests" fill="#29b5e8" radius={[0, 4, 4, 0]} isAnimationActive={false} />
          </BarChart>
        </ResponsiveContainer>
      )}
    </div>
  );
}
