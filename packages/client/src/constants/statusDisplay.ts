import type { ClaudeRunState, StoryStatus, WorkflowItemStatus } from '@bmad-dashboard/shared';
import type { ConnectionStatus } from '../lib/eventStream';

export interface StatusDisplay {
  label: string;
  color: string;
}

export const WORKFLOW_STATUS_DISPLAY: Record<WorkflowItemStatus, StatusDisplay> = {
  pending: { label: 'Pending', color: '#8a8f98' },
  in_progress: { label: 'In progress', color: '#42A5F5' },
  completed: { label: 'Completed', color: '#4CAF50' },
  blocked: { label: 'Blocked', color: '#DC3545' },
  optional: { label: 'Optional', color: '#AB47BC' },
  recommended: { label: 'Recommended', color: '#26C6DA' },
  conditional: { label: 'Conditional', color: '#FFCA28' },
  skipped: { label: 'Skipped', color: '#5f646b' },
};

export const STORY_STATUS_DISPLAY: Record<StoryStatus, StatusDisplay> = {
  backlog: { label: 'Backlog', color: '#8a8f98' },
  drafted: { label: 'Drafted', color: '#AB47BC' },
  'ready-for-dev': { label: 'Ready for dev', color: '#26C6DA' },
  'in-progress': { label: 'In progress', color: '#42A5F5' },
  review: { label: 'Review', color: '#FFCA28' },
  done: { label: 'Done', color: '#4CAF50' },
};

export const CLAUDE_STATUS_DISPLAY: Record<ClaudeRunState, StatusDisplay> = {
  stopped: { label: 'Not running', color: '#8a8f98' },
  starting: { label: 'Starting', color: '#FFCA28' },
  running: { label: 'Running', color: '#4CAF50' },
  error: { label: 'Unknown', color: '#DC3545' },
};

export const CONNECTION_DISPLAY: Record<ConnectionStatus, StatusDisplay> = {
  idle: { label: 'Paused', color: '#8a8f98' },
  connecting: { label: 'Connecting', color: '#FFCA28' },
  connected: { label: 'Live', color: '#4CAF50' },
  reconnecting: { label: 'Reconnecting', color: '#FF7043' },
  failed: { label: 'Disconnected', color: '#DC3545' },
};

/** Completed share of a phase as a whole percentage */
export function progressPercent(completed: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((completed / total) * 100);
}
