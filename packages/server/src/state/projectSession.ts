import { randomUUID } from 'crypto';
import type { ClaudeStatus, DashboardEvent, SprintStatus, StoryStatus, WorkflowStatus } from '@bmad-dashboard/shared';
import type { Broadcaster } from '../events/broadcaster';
import { startProjectWatcher } from '../watcher';
import type { ProjectWatcher, WatchFactory } from '../watcher/types';
import { AgentCatalog } from './agentCatalog';
import type { FileStateReader } from './fileStateReader';
import { toClaudeEvent } from './claudeStatus';
import { ALL_KINDS, StatusReconciler, type ClaudeProbe, type ReconcileResult, type SnapshotKind, type Snapshots } from './reconciler';
import { errorMessage } from '../utils';

export interface ProjectSessionDeps {
  reader: FileStateReader;
  probe: ClaudeProbe;
  broadcaster: Broadcaster;
  launchGraceMs: number;
  debounceMs: number;
  pollIntervalMs: number;
  watchFactory?: WatchFactory;
  now?: () => number;
}

function snapshotEvent(kind: SnapshotKind, snapshots: Snapshots): DashboardEvent | null {
  switch (kind) {
    case 'workflow':
      return snapshots.workflow ? { type: 'workflow_update', data: snapshots.workflow } : null;
    case 'sprint':
      return snapshots.sprint ? { type: 'sprint_update', data: snapshots.sprint } : null;
    case 'claude':
      return snapshots.claude ? { type: 'claude_status', data: toClaudeEvent(snapshots.claude) } : null;
  }
}

/**
 * One open project: its published snapshots, agent catalog and watcher.
 * Every refresh, pulled or pushed, runs through `refresh()`, so whatever a
 * request observes has also been sent to the subscribers.
 */
export class ProjectSession {
  readonly id = randomUUID();
  readonly openedAt = new Date();
  readonly agents: AgentCatalog;
  private readonly reconciler: StatusReconciler;
  private watcher: ProjectWatcher | null = null;
  private closed = false;

  constructor(
    readonly root: string,
    readonly name: string,
    readonly config: Record<string, unknown>,
    private readonly deps: ProjectSessionDeps
  ) {
    this.agents = new AgentCatalog(root);
    this.reconciler = new StatusReconciler({
      projectRoot: root,
      projectName: name,
      reader: deps.reader,
      probe: deps.probe,
      launchGraceMs: deps.launchGraceMs,
      now: deps.now,
    });
  }

  get snapshots(): Snapshots {
    return this.reconciler.current;
  }

  async refresh(kinds: readonly SnapshotKind[] = ALL_KINDS): Promise<ReconcileResult> {
    const result = await this.reconciler.reconcile(kinds);
    if (result.stale) return result;

    this.publish(result);
    const pending = this.reconciler.takePending();
    if (pending.length > 0 && !this.closed) {
      this.refresh(pending).catch((err: unknown) => {
        console.warn(`[reconciler] Trailing refresh failed for ${this.root}:`, errorMessage(err));
      });
    }
    return result;
  }

  /** Latest workflow snapshot, reconciling first; waits out a refresh already in flight */
  async workflow(): Promise<WorkflowStatus | null> {
    return (await this.fresh('workflow')).workflow;
  }

  async sprint(): Promise<SprintStatus | null> {
    return (await this.fresh('sprint')).sprint;
  }

  async claude(): Promise<ClaudeStatus | null> {
    return (await this.fresh('claude')).claude;
  }

  private async fresh(kind: SnapshotKind): Promise<Snapshots> {
    const result = await this.refresh([kind]);
    if (!result.stale || result.snapshots[kind] !== null) return result.snapshots;
    await this.reconciler.settled();
    return this.reconciler.current;
  }

  noteOverride(storyId: string, status: StoryStatus): void {
    this.reconciler.noteOverride(storyId, status);
  }

  recordLaunch(): void {
    this.reconciler.recordLaunch();
  }

  /** Current snapshots as events, for a subscriber that just connected */
  snapshotEvents(): DashboardEvent[] {
    const snapshots = this.reconciler.current;
    return ALL_KINDS.map((kind) => snapshotEvent(kind, snapshots)).filter((event): event is DashboardEvent => event !== null);
  }

  startWatching(): void {
    if (this.watcher || this.closed) return;
    this.watcher = startProjectWatcher(this, {
      debounceMs: this.deps.debounceMs,
      pollIntervalMs: this.deps.pollIntervalMs,
      watchFactory: this.deps.watchFactory,
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) await watcher.close();
  }

  private publish(result: ReconcileResult): void {
    if (this.closed) return;
    for (const kind of ALL_KINDS) {
      if (!result.changes[kind]) continue;
      const event = snapshotEvent(kind, result.snapshots);
      if (event) this.deps.broadcaster.publish(this.root, event);
    }
  }
}
