import type { ClaudeStatus, ClaudeStatusEvent } from '@bmad-dashboard/shared';
import type { ProbeOutcome } from '../probe/types';

/** Process the status has been following, and since when */
export interface ObservedProcess {
  pid: number | null;
  since: number;
}

export interface ClaudeTracking {
  /** Epoch ms of the last launch from the dashboard */
  launchedAt: number | null;
  observed: ObservedProcess | null;
}

export interface DeriveOptions {
  now: number;
  launchGraceMs: number;
}

export function emptyTracking(): ClaudeTracking {
  return { launchedAt: null, observed: null };
}

function stopped(now: number, status: ClaudeStatus['status'] = 'stopped', errorMessage: string | null = null): ClaudeStatus {
  return {
    status,
    pid: null,
    cwd: null,
    windowTitle: null,
    matchType: 'none',
    startedAt: null,
    errorMessage,
    detectedBy: null,
    checkedAt: new Date(now).toISOString(),
  };
}

/**
 * Map a probe outcome onto the published status. Returns the status and
 * the tracking to carry into the next derivation; the input tracking is
 * not modified.
 */
export function deriveClaudeStatus(
  outcome: ProbeOutcome,
  tracking: ClaudeTracking,
  options: DeriveOptions
): { status: ClaudeStatus; tracking: ClaudeTracking } {
  const { now, launchGraceMs } = options;

  if (outcome.state === 'running') {
    const previous = tracking.observed;
    const samePid = previous !== null && previous.pid === outcome.pid;
    const since = samePid ? previous.since : tracking.launchedAt ?? now;
    return {
      status: {
        status: 'running',
        pid: outcome.pid,
        cwd: outcome.cwd,
        windowTitle: outcome.windowTitle,
        matchType: outcome.match,
        startedAt: new Date(since).toISOString(),
        errorMessage: null,
        detectedBy: outcome.detector,
        checkedAt: new Date(now).toISOString(),
      },
      tracking: { launchedAt: null, observed: { pid: outcome.pid, since } },
    };
  }

  if (outcome.state === 'indeterminate') {
    return { status: stopped(now, 'error', outcome.reason), tracking };
  }

  if (tracking.launchedAt !== null && now - tracking.launchedAt < launchGraceMs) {
    const status = stopped(now, 'starting');
    status.startedAt = new Date(tracking.launchedAt).toISOString();
    return { status, tracking: { launchedAt: tracking.launchedAt, observed: null } };
  }
  return { status: stopped(now), tracking: emptyTracking() };
}

export function toClaudeEvent(status: ClaudeStatus): ClaudeStatusEvent {
  const { checkedAt: _checkedAt, ...event } = status;
  return event;
}
