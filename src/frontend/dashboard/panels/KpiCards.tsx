/* ------------------------------------------------------------------ */
/*  KPI cards: throughput, error rate, P95 latency, estimated cost     */
/* ------------------------------------------------------------------ */

import { useDashboard } from '../../store/index.js';
import type { KpiCard } from '../../api/types.js';

const PLACEHOLDERS: KpiCard[] = [
  { key: 'throughput', label: 'Throughput', value: 0, display: '—' },
  { key: 'errorRate', label: 'Error Rate', value: 0, display: '—' },
  { key: 'p95Latency', label: 'P95 Latency', value: 0, display: '—' },
  { key: 'estimatedCost', label: 'Est. Cost', value: 0, display: '—' },
];

export function KpiCards() {
  const { state } = useDashboard();
  const cards = state.view?.kpis ?? PLACEHOLDERS;

  return (
    <div className="kpi-row">
      {cards.map((card) => (
        <div key={card.key} className={`kpi-card kpi-${card.key}`}>
          <div className="kpi-label">{card.label}</div>
          <div className="kpi-value">{card.display}</div>
        </div>
      ))}
    </div>
  );
}
