/* ------------------------------------------------------------------ */
/*  Main dashboard layout — sidebar + responsive grid                  */
/* ------------------------------------------------------------------ */

import { useDashboard } from '../../store/index.js';
import { Sidebar } from './Sidebar.js';
import { KpiCards } from '../panels/KpiCards.js';
import { ThroughputChart } from '../charts/ThroughputChart.js';
import { ErrorRateChart } from '../charts/ErrorRateChart.js';
import { LatencyPercentiles } from '../charts/LatencyPercentiles.js';
import { UserDistribution } from '../panels/UserDistribution.js';
import { IncidentLog } from '../panels/IncidentLog.js';

export function DashboardLayout() {
  const { state } = useDashboard();
  const view = state.view;

  return (
    <div className="dashboard">
      <Sidebar />

      <main className="dashboard-main">
        <header className="dashboard-header">
          <h1>AI API Real-Time Monitor</h1>
          {state.error && <div className="error-banner">Error: {state.error}</div>}
          {view?.backend.notice && (
            <div className="error-banner" role="alert" title={view.backend.error ?? undefined}>
              {view.backend.notice}
            </div>
          )}
        </header>

        {/* Row 1: KPI cards */}
        <KpiCards />

        {/* Row 2: performance trends */}
        <h2 className="section-title">Performance Trends</h2>
        <div className="grid-two">
          <ThroughputChart />
          <ErrorRateChart />
        </div>

        {/* Row 3: distribution */}
        <div className="grid-two">
          <LatencyPercentiles />
          <UserDistribution />
        </div>

        {/* Footer: alerts */}
        <IncidentLog />

        <p className="muted caption">
          Last updated: {view?.lastUpdated ?? 'never'}
        </p>
      </main>
    </div>
  );
}
