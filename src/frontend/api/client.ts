/* ------------------------------------------------------------------ */
/*  API client — thin fetch wrapper for the dashboard REST endpoints   */
/*                                                                     */
/*  All fetch calls are centralized here. Components never call fetch   */
/*  directly.                                                          */
/* ------------------------------------------------------------------ */

import type {
  BurstResponse,
  DashboardResponse,
  Settings,
} from './types.js';

const BASE = '/api/v1';

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${BASE}${path}`, init);
  if (!res.ok) {
    throw new Error(`API ${res.status}: ${res.statusText}`);
  }
  return res.json() as Promise<T>;
}

function post<T>(path: string): Promise<T> {
  return request<T>(path, { method: 'POST' });
}

/* ── Dashboard ─────────────────────────────────────────────────── */

export function fetchDashboard(): Promise<DashboardResponse> {
  return request<DashboardResponse>('/dashboard');
}

export function refreshDashboard(): Promise<DashboardResponse> {
  return post<DashboardResponse>('/dashboard/refresh');
}

/* ── Settings ──────────────────────────────────────────────────── */

export function updateSettings(patch: Partial<Settings>): Promise<Settings> {
  return request<Settings>('/settings', {
    method: 'PATCH',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(patch),
  });
}

/* ── Burst ─────────────────────────────────────────────────────── */

export function sendBurst(): Promise<BurstResponse> {
  return post<BurstResponse>('/burst');
}
