import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFile, readFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import type { SprintStatus, WorkflowStatus } from '@bmad-dashboard/shared';
import { FileStateReader, type ReadOutcome } from '../state/fileStateReader';
import { StatusReconciler, type ClaudeProbe } from '../state/reconciler';
import { StoryOverrideWriter } from '../state/storyOverride';
import { snapshotsEqual } from '../state/equality';
import type { ProbeOutcome } from '../probe/types';

const GRACE_MS = 10_000;

let root: string;
let clock: number;

function fixedProbe(outcome: ProbeOutcome): ClaudeProbe {
  return { probe: () => Promise.resolve(outcome) };
}

const NOT_RUNNING: ProbeOutcome = { state: 'not-running', signals: [] };

function reconciler(probe: ClaudeProbe = fixedProbe(NOT_RUNNING), reader = new FileStateReader()) {
  return new StatusReconciler({
    projectRoot: root,
    projectName: 'shop',
    reader,
    probe,
    launchGraceMs: GRACE_MS,
    now: () => clock,
  });
}

async function writeWorkflow(status: string) {
  await writeFile(
    join(root, 'md', 'bmm-workflow-status.yaml'),
    `workflow_status:\n  - id: prd\n    phase: 1\n    status: ${status}\n`
  );
}

async function writeSprint(storyStatus: string) {
  await writeFile(
    join(root, 'md', 'sprint-status.yaml'),
    `development_status:\n  epic-1: contexted\n  1-1-login: ${storyStatus}\n`
  );
}

function storyStatus(sprint: SprintStatus | null): string | undefined {
  return sprint?.epics[0]?.stories[0]?.status;
}

beforeEach(async () => {
  root = join(tmpdir(), `bmad-reconciler-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await mkdir(join(root, '.bmad', 'bmm'), { recursive: true });
  await mkdir(join(root, 'md'), { recursive: true });
  clock = 1_700_000_000_000;
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(root, { recursive: true, force: true });
});

describe('snapshotsEqual', () => {
  it('ignores volatile timestamps', () => {
    expect(snapshotsEqual({ a: 1, generatedAt: 'x' }, { a: 1, generatedAt: 'y' })).toBe(true);
    expect(snapshotsEqual({ a: 1, checkedAt: 'x' }, { a: 2, checkedAt: 'x' })).toBe(false);
    expect(snapshotsEqual(null, { a: 1 })).toBe(false);
    expect(snapshotsEqual(null, null)).toBe(true);
  });
});

describe('StatusReconciler change detection', () => {
  it('reports every kind changed on the first pass and nothing on an identical second pass', async () => {
    await writeWorkflow('required');
    await writeSprint('drafted');
    const r = reconciler();

    const first = await r.reconcile();
    expect(first.changes).toEqual({ workflow: true, sprint: true, claude: true });
    expect(first.stale).toBe(false);

    clock += 5_000;
    const second = await r.reconcile();
    expect(second.changed).toBe(false);
    expect(second.changes).toEqual({ workflow: false, sprint: false, claude: false });
  });

  it('flags only the kind whose file changed', async () => {
    await writeWorkflow('required');
    await writeSprint('drafted');
    const r = reconciler();
    await r.reconcile();

    await writeWorkflow('in_progress');
    const result = await r.reconcile(['workflow', 'sprint']);
    expect(result.changes).toEqual({ workflow: true, sprint: false, claude: false });
    expect(result.snapshots.workflow?.phases[0].status).toBe('in_progress');
  });

  it('publishes a missing manifest as not created', async () => {
    const result = await reconciler().reconcile(['sprint']);
    expect(result.snapshots.sprint).toMatchObject({ fileCreated: false, epics: [] });
    expect(result.snapshots.workflow).toBeNull();
  });
});

describe('StatusReconciler failures', () => {
  it('keeps the previous content with a parse error, then clears it once fixed', async () => {
    await writeWorkflow('required');
    const r = reconciler();
    const good = await r.reconcile(['workflow']);

    await writeFile(join(root, 'md', 'bmm-workflow-status.yaml'), 'workflow_status: [\n');
    const broken = await r.reconcile(['workflow']);
    expect(broken.changes.workflow).toBe(true);
    expect(broken.errors.workflow).toMatch(/^md\/bmm-workflow-status\.yaml: /);
    expect(broken.snapshots.workflow?.phases).toEqual(good.snapshots.workflow?.phases);
    expect(broken.snapshots.workflow?.parseError?.file).toBe('md/bmm-workflow-status.yaml');

    await writeWorkflow('in_progress');
    const fixed = await r.reconcile(['workflow']);
    expect(fixed.snapshots.workflow?.parseError).toBeUndefined();
    expect(fixed.errors).toEqual({});
  });

  it('degrades a first read that fails to parse into an empty snapshot', async () => {
    await writeFile(join(root, 'md', 'sprint-status.yaml'), 'development_status: {\n');
    const result = await reconciler().reconcile(['sprint']);
    expect(result.snapshots.sprint).toMatchObject({ fileCreated: true, epics: [], project: 'shop' });
    expect(result.snapshots.sprint?.parseError?.file).toBe('md/sprint-status.yaml');
  });

  it('keeps the previous snapshot untouched on a transient failure', async () => {
    await writeWorkflow('required');
    let failing = false;
    class FlakyReader extends FileStateReader {
      async readWorkflow(projectRoot: string): Promise<ReadOutcome<WorkflowStatus>> {
        if (failing) {
          return { ok: false, failure: { kind: 'transient', file: 'md/bmm-workflow-status.yaml', message: 'EBUSY' } };
        }
        return super.readWorkflow(projectRoot);
      }
    }
    const r = reconciler(fixedProbe(NOT_RUNNING), new FlakyReader());
    const before = await r.reconcile(['workflow']);

    failing = true;
    const after = await r.reconcile(['workflow']);
    expect(after.snapshots.workflow).toBe(before.snapshots.workflow);
    expect(after.changed).toBe(false);
    expect(after.errors).toEqual({ workflow: 'md/bmm-workflow-status.yaml: EBUSY' });
  });
});

describe('StatusReconciler single flight', () => {
  it('returns stale snapshots to a concurrent caller and queues its kinds', async () => {
    let release: (outcome: ProbeOutcome) => void = () => undefined;
    const probe: ClaudeProbe = {
      probe: () =>
        new Promise<ProbeOutcome>((resolve) => {
          release = resolve;
        }),
    };
    const r = reconciler(probe);

    const first = r.reconcile(['claude']);
    expect(r.busy).toBe(true);

    const concurrent = await r.reconcile(['sprint', 'workflow']);
    expect(concurrent.stale).toBe(true);
    expect(concurrent.snapshots).toEqual({ workflow: null, sprint: null, claude: null });

    release(NOT_RUNNING);
    const done = await first;
    expect(done.stale).toBe(false);
    expect(done.snapshots.claude?.status).toBe('stopped');
    expect(r.busy).toBe(false);
    expect(r.takePending()).toEqual(['workflow', 'sprint']);
    expect(r.takePending()).toEqual([]);
  });
});

describe('StatusReconciler story flow', () => {
  it('holds a story against a backward read', async () => {
    await writeSprint('done');
    const r = reconciler();
    await r.reconcile(['sprint']);

    await writeSprint('drafted');
    const result = await r.reconcile(['sprint']);
    expect(storyStatus(result.snapshots.sprint)).toBe('done');
    expect(result.changed).toBe(false);
  });

  it('uses a manual override as the baseline until the files catch up', async () => {
    await writeSprint('ready-for-dev');
    const r = reconciler();
    await r.reconcile(['sprint']);

    r.noteOverride('1-1', 'review');
    const pendingWrite = await r.reconcile(['sprint']);
    expect(storyStatus(pendingWrite.snapshots.sprint)).toBe('review');

    await writeSprint('review');
    const caughtUp = await r.reconcile(['sprint']);
    expect(storyStatus(caughtUp.snapshots.sprint)).toBe('review');

    await writeSprint('in-progress');
    const onward = await r.reconcile(['sprint']);
    expect(storyStatus(onward.snapshots.sprint)).toBe('in-progress');
  });

  it('keeps publishing an override until a read returns exactly that status', async () => {
    await writeSprint('review');
    const r = reconciler();
    await r.reconcile(['sprint']);

    r.noteOverride('1-1', 'drafted');
    const pendingWrite = await r.reconcile(['sprint']);
    expect(storyStatus(pendingWrite.snapshots.sprint)).toBe('drafted');

    await writeSprint('drafted');
    await r.reconcile(['sprint']);
    await writeSprint('ready-for-dev');
    const onward = await r.reconcile(['sprint']);
    expect(storyStatus(onward.snapshots.sprint)).toBe('ready-for-dev');
  });

  it('publishes an override to drafted when the story file said review', async () => {
    await writeSprint('review');
    await mkdir(join(root, 'md', 'sprint-artifacts'), { recursive: true });
    const storyFile = join(root, 'md', 'sprint-artifacts', '1-1-login.md');
    await writeFile(storyFile, '# Login\n\nStatus: review\n');
    const reader = new FileStateReader();
    const r = reconciler(fixedProbe(NOT_RUNNING), reader);
    const before = await r.reconcile(['sprint']);
    expect(storyStatus(before.snapshots.sprint)).toBe('review');

    const outcome = await new StoryOverrideWriter(reader).apply(root, '1-1', 'drafted');
    expect(outcome).toMatchObject({ ok: true, result: { status: 'drafted', storyFile: 'updated' } });
    r.noteOverride('1-1', 'drafted');

    const after = await r.reconcile(['sprint']);
    expect(storyStatus(after.snapshots.sprint)).toBe('drafted');
    expect(await readFile(storyFile, 'utf-8')).toBe('# Login\n\nStatus: drafted\n');
  });

  it('lets an override move a story back', async () => {
    await writeSprint('in-progress');
    const r = reconciler();
    await r.reconcile(['sprint']);

    r.noteOverride('1-1', 'backlog');
    await writeSprint('backlog');
    const result = await r.reconcile(['sprint']);
    expect(storyStatus(result.snapshots.sprint)).toBe('backlog');
  });
});

describe('StatusReconciler assistant status', () => {
  it('reports a running assistant with its start time kept across probes', async () => {
    const r = reconciler(
      fixedProbe({
        state: 'running',
        match: 'project',
        pid: 42,
        cwd: root,
        windowTitle: null,
        detector: 'process',
        signals: [],
      })
    );
    const first = await r.reconcile(['claude']);
    expect(first.snapshots.claude).toMatchObject({
      status: 'running',
      pid: 42,
      matchType: 'project',
      detectedBy: 'process',
      startedAt: new Date(clock).toISOString(),
    });

    const startedAt = first.snapshots.claude?.startedAt;
    clock += 60_000;
    const second = await r.reconcile(['claude']);
    expect(second.snapshots.claude?.startedAt).toBe(startedAt);
    expect(second.changed).toBe(false);
  });

  it('is starting within the launch grace window and stopped after it', async () => {
    const r = reconciler();
    r.recordLaunch();

    clock += GRACE_MS - 1;
    expect((await r.reconcile(['claude'])).snapshots.claude?.status).toBe('starting');

    clock += 2;
    expect((await r.reconcile(['claude'])).snapshots.claude?.status).toBe('stopped');
  });

  it('reports an indeterminate probe as an error', async () => {
    const r = reconciler(fixedProbe({ state: 'indeterminate', reason: 'process: denied', signals: [] }));
    const result = await r.reconcile(['claude']);
    expect(result.snapshots.claude).toMatchObject({ status: 'error', errorMessage: 'process: denied', pid: null });
    expect(result.errors.claude).toBe('process: denied');
  });

  it('turns a throwing probe into an error status', async () => {
    const r = reconciler({ probe: () => Promise.reject(new Error('ps exploded')) });
    const result = await r.reconcile(['claude']);
    expect(result.snapshots.claude?.status).toBe('error');
    expect(result.snapshots.claude?.errorMessage).toBe('ps exploded');
  });
});
