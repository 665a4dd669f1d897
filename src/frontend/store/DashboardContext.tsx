/* ------------------------------------------------------------------ */
/*  Client-side dashboard store (React Context)                        */
/*                                                                     */
/*  Holds the latest read model polled from the server plus the        */
/*  sidebar's transient state. Components consume via useDashboard().  */
/* ------------------------------------------------------------------ */

import {
  createContext,
  useContext,
  useReducer,
  useCallback,
  useEffect,
  useRef,
  type Dispatch,
  type ReactNode,
} from 'react';

import type { DashboardResponse, Settings } from '../api/types.js';

import {
  fetchDashboard,
  refreshDashboard,
  updateSettings,
  sendBurst,
} from '../api/client.js';

/** Matches the server's default refresh interval. */
export const POLL_INTERVAL_MS = 5_000;

/* ── Types ─────────────────────────────────────────────────────── */

export interface DashboardState {
  view: DashboardResponse | null;
  loading: boolean;
  /** Failure talking to this dashboard's own server (not the metrics backend). */
  error: string | null;
  burstNotice: string | null;
}

export type Action =
  | { type: 'SET_VIEW'; payload: DashboardResponse }
  | { type: 'SET_SETTINGS'; payload: Settings }
  | { type: 'SET_LOADING'; payload: boolean }
  | { type: 'SET_ERROR'; payload: string | null }
  | { type: 'SET_BURST_NOTICE'; payload: string | null };

export const initialState: DashboardState = {
  view: null,
  loading: false,
  error: null,
  burstNotice: null,
};

export function reducer(state: DashboardState, action: Action): DashboardState {
  switch (action.type) {
    case 'SET_VIEW':
      return { ...state, view: action.payload };
    case 'SET_SETTINGS':
      return state.view
        ? { ...state, view: { ...state.view, settings: action.payload } }
        : state;
    case 'SET_LOADING':
      return { ...state, loading: action.payload };
    case 'SET_ERROR':
      return { ...state, error: action.payload };
    case 'SET_BURST_NOTICE':
      return { ...state, burstNotice: action.payload };
    default:
      return state;
  }
}

export const BURST_NOTICE = 'Burst sent to API!';

/** How long the burst confirmation stays on screen. */
export const BURST_NOTICE_MS = 3_000;

/**
 * Shows the burst confirmation and schedules its removal.
 * Returns a cancel function for the pending removal.
 */
export function announceBurst(dispatch: Dispatch<Action>): () => void {
  dispatch({ type: 'SET_BURST_NOTICE', payload: BURST_NOTICE });
  const id = setTimeout(() => dispatch({ type: 'SET_BURST_NOTICE', payload: null }), BURST_NOTICE_MS);
  return () => clearTimeout(id);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

/* ── Context ───────────────────────────────────────────────────── */

interface DashboardContextValue {
  state: DashboardState;
  refresh: () => void;
  setLiveStream: (enabled: boolean) => void;
  setSensitivity: (k: number) => void;
  generateBurst: () => void;
}

const DashboardContext = createContext<DashboardContextValue | null>(null);

export function DashboardProvider({ children }: { children: ReactNode }) {
  const [state, dispatch] = useReducer(reducer, initialState);

  const load = useCallback(async () => {
    try {
      const view = await fetchDashboard();
      dispatch({ type: 'SET_VIEW', payload: view });
      dispatch({ type: 'SET_ERROR', payload: null });
    } catch (err: unknown) {
      dispatch({ type: 'SET_ERROR', payload: messageOf(err) });
    }
  }, []);

  const refresh = useCallback(() => {
    dispatch({ type: 'SET_LOADING', payload: true });
    refreshDashboard()
      .then((view) => {
        dispatch({ type: 'SET_VIEW', payload: view });
        dispatch({ type: 'SET_ERROR', payload: null });
      })
      .catch((err: unknown) => dispatch({ type: 'SET_ERROR', payload: messageOf(err) }))
      .finally(() => dispatch({ type: 'SET_LOADING', payload: false }));
  }, []);

  const applySettings = useCallback((patch: Partial<Settings>) => {
    updateSettings(patch)
      .then((settings) => dispatch({ type: 'SET_SETTINGS', payload: settings }))
      .catch((err: unknown) => dispatch({ type: 'SET_ERROR', payload: messageOf(err) }));
  }, []);

  const setLiveStream = useCallback(
    (enabled: boolean) => applySettings({ liveStream: enabled }),
    [applySettings],
  );

  const setSensitivity = useCallback(
    (k: number) => applySettings({ sensitivity: k }),
    [applySettings],
  );

  const cancelNotice = useRef<(() => void) | null>(null);

  const generateBurst = useCallback(() => {
    sendBurst()
      .then(() => {
        cancelNotice.current?.();
        cancelNotice.current = announceBurst(dispatch);
      })
      .catch((err: unknown) => dispatch({ type: 'SET_ERROR', payload: messageOf(err) }));
  }, []);

  useEffect(() => () => cancelNotice.current?.(), []);

  // Initial load + poll the server's settled view
  useEffect(() => {
    void load();
    const id = setInterval(() => void load(), POLL_INTERVAL_MS);
    return () => clearInterval(id);
  }, [load]);

  return (
    <DashboardContext.Provider value={{ state, refresh, setLiveStream, setSensitivity, generateBurst }}>
      {children}
    </DashboardContext.Provider>
  );
}

export function useDashboard(): DashboardContextValue {
  const ctx = useContext(DashboardContext);
  if (!ctx) throw new Error('useDashboard must be used inside DashboardProvider');
  return ctx;
}
