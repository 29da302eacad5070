import { useCallback, useEffect, useReducer, useRef } from 'react';
import type { ApiResponse } from '@bmad-dashboard/shared';
import type { ApiClient } from '../api/client';
import { EventStream } from '../lib/eventStream';
import {
  dashboardReducer,
  initialDashboardState,
  POLL_INTERVAL_MS,
  type DashboardAction,
  type DashboardState,
  type PolledSnapshot,
} from '../state/dashboardState';

export interface Dashboard {
  state: DashboardState;
  dispatch: (action: DashboardAction) => void;
  /** Run an API call; failures become an error notice and resolve to null */
  run: <T>(call: Promise<ApiResponse<T>>, success?: string) => Promise<T | null>;
  retryConnection: () => void;
}

async function pollAll(api: ApiClient): Promise<PolledSnapshot[]> {
  const [claude, workflow, sprint] = await Promise.all([api.claudeStatus(), api.workflowStatus(), api.sprintStatus()]);
  const snapshots: PolledSnapshot[] = [];
  if (claude.success) snapshots.push({ kind: 'claude', data: claude.data });
  if (workflow.success) snapshots.push({ kind: 'workflow', data: workflow.data });
  if (sprint.success) snapshots.push({ kind: 'sprint', data: sprint.data });
  return snapshots;
}

export function useDashboard(api: ApiClient, eventsUrl: string, live: boolean): Dashboard {
  const [state, dispatch] = useReducer(dashboardReducer, initialDashboardState);
  const streamRef = useRef<EventStream | null>(null);

  useEffect(() => {
    const stream = new EventStream({
      url: eventsUrl,
      onEvent: (event) => dispatch({ type: 'event', event, at: Date.now() }),
      onStatus: (status) => dispatch({ type: 'connection', status }),
    });
    streamRef.current = stream;
    return () => {
      stream.close();
      streamRef.current = null;
    };
  }, [eventsUrl]);

  useEffect(() => {
    streamRef.current?.setLive(live);
  }, [live, eventsUrl]);

  // Poll fallback: keeps views current when pushes stop arriving
  useEffect(() => {
    if (!live || state.projectRoot === null) return;
    let cancelled = false;
    const timer = setInterval(() => {
      pollAll(api)
        .then((snapshots) => {
          if (cancelled) return;
          const at = Date.now();
          for (const snapshot of snapshots) dispatch({ type: 'poll', snapshot, at });
        })
        .catch((err: unknown) => {
          console.warn('[poll] Status poll failed:', err instanceof Error ? err.message : String(err));
        });
    }, POLL_INTERVAL_MS);
    return () => {
      cancelled = true;
      clearInterval(timer);
    };
  }, [api, live, state.projectRoot]);

  const run = useCallback(async <T>(call: Promise<ApiResponse<T>>, success?: string): Promise<T | null> => {
    const res = await call;
    if (!res.success) {
      dispatch({ type: 'notice', level: 'error', message: res.message });
      return null;
    }
    if (success) dispatch({ type: 'notice', level: 'info', message: success });
    return res.data;
  }, []);

  const retryConnection = useCallback(() => {
    streamRef.current?.retry();
  }, []);

  return { state, dispatch, run, retryConnection };
}
