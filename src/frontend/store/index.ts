export { DashboardProvider, useDashboard, reducer, initialState, POLL_INTERVAL_MS } from './DashboardContext.js';
export type { DashboardState, Action } from './DashboardContext.js';
