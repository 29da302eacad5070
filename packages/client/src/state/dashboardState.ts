import type { ClaudeStatusEvent, DashboardEvent, SprintStatus, WorkflowStatus } from '@bmad-dashboard/shared';
import type { ConnectionStatus } from '../lib/eventStream';

export type SnapshotKind = 'workflow' | 'sprint' | 'claude';

export const POLL_INTERVAL_MS = 30_000;
/** A polled snapshot only replaces state when no push of its kind arrived this recently */
export const PUSH_SILENCE_MS = 45_000;
const MAX_NOTICES = 5;

export interface Notice {
  id: number;
  level: 'error' | 'info';
  message: string;
}

export type PolledSnapshot =
  | { kind: 'workflow'; data: WorkflowStatus }
  | { kind: 'sprint'; data: SprintStatus }
  | { kind: 'claude'; data: ClaudeStatusEvent };

export interface DashboardState {
  connection: ConnectionStatus;
  sessionId: string | null;
  projectRoot: string | null;
  workflow: WorkflowStatus | null;
  sprint: SprintStatus | null;
  claude: ClaudeStatusEvent | null;
  lastPushAt: Record<SnapshotKind, number | null>;
  notices: Notice[];
  nextNoticeId: number;
}

export type DashboardAction =
  | { type: 'event'; event: DashboardEvent; at: number }
  | { type: 'poll'; snapshot: PolledSnapshot; at: number }
  | { type: 'snapshot'; snapshot: PolledSnapshot }
  | { type: 'connection'; status: ConnectionStatus }
  | { type: 'project_opened'; root: string }
  | { type: 'notice'; level: Notice['level']; message: string }
  | { type: 'dismiss'; id: number };

const NO_PUSHES: Record<SnapshotKind, number | null> = { workflow: null, sprint: null, claude: null };

export const initialDashboardState: DashboardState = {
  connection: 'idle',
  sessionId: null,
  projectRoot: null,
  workflow: null,
  sprint: null,
  claude: null,
  lastPushAt: NO_PUSHES,
  notices: [],
  nextNoticeId: 1,
};

function switchProject(state: DashboardState, root: string | null): DashboardState {
  if (root === state.projectRoot) return state;
  return { ...state, projectRoot: root, workflow: null, sprint: null, claude: null, lastPushAt: NO_PUSHES };
}

function applySnapshot(state: DashboardState, snapshot: PolledSnapshot): DashboardState {
  switch (snapshot.kind) {
    case 'workflow':
      return { ...state, workflow: snapshot.data };
    case 'sprint':
      return { ...state, sprint: snapshot.data };
    case 'claude':
      return { ...state, claude: snapshot.data };
  }
}

function pushed(state: DashboardState, snapshot: PolledSnapshot, at: number): DashboardState {
  const next = applySnapshot(state, snapshot);
  return { ...next, lastPushAt: { ...state.lastPushAt, [snapshot.kind]: at } };
}

function applyEvent(state: DashboardState, event: DashboardEvent, at: number): DashboardState {
  switch (event.type) {
    case 'connected':
      return { ...switchProject(state, event.data.projectRoot), sessionId: event.data.sessionId };
    case 'workflow_update':
      return pushed(state, { kind: 'workflow', data: event.data }, at);
    case 'sprint_update':
      return pushed(state, { kind: 'sprint', data: event.data }, at);
    case 'claude_status':
      return pushed(state, { kind: 'claude', data: event.data }, at);
    case 'heartbeat':
      return state;
  }
}

export function dashboardReducer(state: DashboardState, action: DashboardAction): DashboardState {
  switch (action.type) {
    case 'event':
      return applyEvent(state, action.event, action.at);
    case 'poll': {
      const lastPush = state.lastPushAt[action.snapshot.kind];
      if (lastPush !== null && action.at - lastPush < PUSH_SILENCE_MS) return state;
      return applySnapshot(state, action.snapshot);
    }
    case 'snapshot':
      return applySnapshot(state, action.snapshot);
    case 'connection':
      return action.status === state.connection ? state : { ...state, connection: action.status };
    case 'project_opened':
      return switchProject(state, action.root);
    case 'notice': {
      const notice: Notice = { id: state.nextNoticeId, level: action.level, message: action.message };
      return {
        ...state,
        notices: [...state.notices, notice].slice(-MAX_NOTICES),
        nextNoticeId: state.nextNoticeId + 1,
      };
    }
    case 'dismiss':
      return { ...state, notices: state.notices.filter((n) => n.id !== action.id) };
  }
}
