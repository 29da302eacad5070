import type { ClaudeStatus, StoryStatus, SprintStatus, WorkflowStatus } from '@bmad-dashboard/shared';
import type { ProbeOutcome, ProjectHint } from '../probe/types';
import type { ReadFailure } from '../parsers/yamlFile';
import { emptySprintStatus, emptyWorkflowStatus, type FileStateReader, type ReadOutcome } from './fileStateReader';
import { applyStoryFlow } from './storyFlowGuard';
import { deriveClaudeStatus, emptyTracking, type ClaudeTracking } from './claudeStatus';
import { snapshotsEqual } from './equality';
import { errorMessage } from '../utils';

export type SnapshotKind = 'workflow' | 'sprint' | 'claude';
export const ALL_KINDS: readonly SnapshotKind[] = ['workflow', 'sprint', 'claude'];

export interface Snapshots {
  workflow: WorkflowStatus | null;
  sprint: SprintStatus | null;
  claude: ClaudeStatus | null;
}

export interface ReconcileResult {
  snapshots: Snapshots;
  changed: boolean;
  changes: Record<SnapshotKind, boolean>;
  /** Per-kind failure messages; the kind keeps or degrades its previous snapshot */
  errors: Partial<Record<SnapshotKind, string>>;
  /** True when another reconcile was in flight and these are the last published snapshots */
  stale: boolean;
}

/** Anything that can answer "is the assistant running, and where" */
export interface ClaudeProbe {
  probe(hint: ProjectHint | null): Promise<ProbeOutcome>;
}

export interface StatusReconcilerOptions {
  projectRoot: string;
  projectName: string;
  reader: FileStateReader;
  probe: ClaudeProbe;
  launchGraceMs: number;
  now?: () => number;
}

function noChanges(): Record<SnapshotKind, boolean> {
  return { workflow: false, sprint: false, claude: false };
}

/**
 * Owns the published snapshots of one project session.
 *
 * One reconcile runs at a time. A call made while one is in flight gets
 * the current snapshots back with `stale: true`, and its kinds are queued
 * for `takePending()` so the owner can run a single trailing pass.
 */
export class StatusReconciler {
  private snapshots: Snapshots = { workflow: null, sprint: null, claude: null };
  private inFlight: Promise<ReconcileResult> | null = null;
  private pending = new Set<SnapshotKind>();
  private overrides = new Map<string, StoryStatus>();
  private tracking: ClaudeTracking = emptyTracking();
  private readonly now: () => number;

  constructor(private readonly options: StatusReconcilerOptions) {
    this.now = options.now ?? Date.now;
  }

  get current(): Snapshots {
    return this.snapshots;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /** Resolves once the reconcile in flight, if any, has finished */
  async settled(): Promise<void> {
    if (this.inFlight) await this.inFlight.then(
      () => undefined,
      () => undefined
    );
  }

  takePending(): SnapshotKind[] {
    const kinds = ALL_KINDS.filter((kind) => this.pending.has(kind));
    this.pending.clear();
    return kinds;
  }

  /** A manual status change; published as is until a read returns the same status */
  noteOverride(storyId: string, status: StoryStatus): void {
    this.overrides.set(storyId, status);
  }

  recordLaunch(at: number = this.now()): void {
    this.tracking = { ...this.tracking, launchedAt: at };
  }

  async reconcile(kinds: readonly SnapshotKind[] = ALL_KINDS): Promise<ReconcileResult> {
    if (this.inFlight) {
      for (const kind of kinds) this.pending.add(kind);
      return { snapshots: this.snapshots, changed: false, changes: noChanges(), errors: {}, stale: true };
    }

    const run = this.run(kinds);
    this.inFlight = run;
    try {
      return await run;
    } finally {
      this.inFlight = null;
    }
  }

  private async run(kinds: readonly SnapshotKind[]): Promise<ReconcileResult> {
    const wanted = new Set(kinds);
    const errors: Partial<Record<SnapshotKind, string>> = {};
    const previous = this.snapshots;

    const [workflowRead, sprintRead, claude] = await Promise.all([
      wanted.has('workflow') ? this.options.reader.readWorkflow(this.options.projectRoot) : null,
      wanted.has('sprint') ? this.options.reader.readSprint(this.options.projectRoot) : null,
      wanted.has('claude') ? this.probeClaude() : null,
    ]);

    const next: Snapshots = { ...previous };

    if (workflowRead) {
      next.workflow = this.settle('workflow', workflowRead, previous.workflow, errors, () =>
        emptyWorkflowStatus(this.options.projectName, true)
      );
    }

    if (sprintRead) {
      const sprint = this.settle('sprint', sprintRead, previous.sprint, errors, () =>
        emptySprintStatus(this.options.projectName, true)
      );
      next.sprint = sprintRead.ok && sprint ? this.clampStories(previous.sprint, sprint) : sprint;
    }

    if (claude) {
      next.claude = claude;
      if (claude.status === 'error' && claude.errorMessage) errors.claude = claude.errorMessage;
    }

    const changes = noChanges();
    for (const kind of kinds) changes[kind] = !snapshotsEqual(previous[kind], next[kind]);
    const changed = kinds.some((kind) => changes[kind]);

    // volatile-only differences still refresh timestamps on later pulls
    this.snapshots = next;
    return { snapshots: next, changed, changes, errors, stale: false };
  }

  private settle<T extends WorkflowStatus | SprintStatus>(
    kind: SnapshotKind,
    read: ReadOutcome<T>,
    previous: T | null,
    errors: Partial<Record<SnapshotKind, string>>,
    empty: () => T
  ): T | null {
    if (read.ok) return read.value;

    const failure: ReadFailure = read.failure;
    errors[kind] = `${failure.file}: ${failure.message}`;
    if (failure.kind === 'transient') {
      console.warn(`[reconciler] Keeping previous ${kind} snapshot, read failed: ${errors[kind]}`);
      return previous;
    }

    console.warn(`[reconciler] ${kind} manifest could not be parsed: ${errors[kind]}`);
    return {
      ...(previous ?? empty()),
      parseError: { file: failure.file, message: failure.message },
      generatedAt: new Date(this.now()).toISOString(),
    };
  }

  private clampStories(previous: SprintStatus | null, next: SprintStatus): SprintStatus {
    const result = applyStoryFlow(previous, next, this.overrides);
    for (const id of result.settledOverrides) this.overrides.delete(id);
    if (result.held.length > 0) {
      console.log(`[reconciler] Held stories against a backward move: ${result.held.join(', ')}`);
    }
    return result.sprint;
  }

  private async probeClaude(): Promise<ClaudeStatus> {
    const hint: ProjectHint = { root: this.options.projectRoot, name: this.options.projectName };
    let outcome: ProbeOutcome;
    try {
      outcome = await this.options.probe.probe(hint);
    } catch (err) {
      outcome = { state: 'indeterminate', reason: errorMessage(err), signals: [] };
    }
    const derived = deriveClaudeStatus(outcome, this.tracking, {
      now: this.now(),
      launchGraceMs: this.options.launchGraceMs,
    });
    this.tracking = derived.tracking;
    return derived.status;
  }
}
