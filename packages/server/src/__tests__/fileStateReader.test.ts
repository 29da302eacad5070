import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { FileStateReader } from '../state/fileStateReader';

let root: string;
let reader: FileStateReader;

async function write(relative: string, content: string) {
  const file = join(root, relative);
  await mkdir(join(file, '..'), { recursive: true });
  await writeFile(file, content);
}

beforeEach(async () => {
  root = join(tmpdir(), `bmad-reader-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await mkdir(join(root, '.bmad', 'bmm'), { recursive: true });
  reader = new FileStateReader();
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe('FileStateReader.readWorkflow', () => {
  it('reports a missing manifest as not created', async () => {
    const outcome = await reader.readWorkflow(root);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value).toMatchObject({ fileCreated: false, phases: [], warnings: [] });
  });

  it('finds the manifest in the configured output folder', async () => {
    await write('.bmad/bmm/config.yaml', 'project_name: Shop\noutput_folder: "{project-root}/docs"\n');
    await write(
      'docs/bmm-workflow-status.yaml',
      'project: Shop\nselected_track: bmad-method\nworkflow_status:\n  - id: prd\n    phase: 1\n    status: required\n'
    );
    await write('docs/prd.md', '# PRD\n');

    const outcome = await reader.readWorkflow(root);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.fileCreated).toBe(true);
    expect(outcome.value.phases[0].workflows[0]).toMatchObject({ id: 'prd', status: 'completed', outputPath: 'docs/prd.md' });
  });

  it('turns malformed YAML into a parse failure naming the file', async () => {
    await write('md/bmm-workflow-status.yaml', 'workflow_status: [\n');
    const outcome = await reader.readWorkflow(root);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe('parse');
    expect(outcome.failure.file).toBe('md/bmm-workflow-status.yaml');
  });

  it('rejects a manifest that is not a mapping', async () => {
    await write('md/bmm-workflow-status.yaml', '- just\n- a list\n');
    const outcome = await reader.readWorkflow(root);
    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'parse', file: 'md/bmm-workflow-status.yaml', message: 'expected a mapping at the top level' },
    });
  });
});

describe('FileStateReader.readSprint', () => {
  it('reports a missing manifest with empty epics', async () => {
    const outcome = await reader.readSprint(root);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.fileCreated).toBe(false);
    expect(outcome.value.epics).toEqual([]);
  });

  it('reads the manifest from sprint-artifacts with story file statuses', async () => {
    await write(
      'md/sprint-artifacts/sprint-status.yaml',
      'project: Shop\nstory_location: md/sprint-artifacts\ndevelopment_status:\n  epic-1: contexted\n  1-1-login: ready-for-dev\n'
    );
    await write('md/sprint-artifacts/1-1-login.md', '# Login\n\nStatus: in-progress\n');

    const outcome = await reader.readSprint(root);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.project).toBe('Shop');
    expect(outcome.value.epics[0].stories[0]).toEqual({
      id: '1-1',
      key: '1-1-login',
      name: 'Login',
      status: 'in-progress',
    });
    expect(await reader.locateStoryFile(root, '1-1')).toBe('md/sprint-artifacts/1-1-login.md');
  });

  it('keeps the manifest status when the story file has no status line', async () => {
    await write('md/sprint-status.yaml', 'development_status:\n  epic-1: contexted\n  1-1-login: done\n');
    await write('md/sprint-artifacts/1-1-login.md', '# Login\n\n- Status bar shows the user name\n');

    const outcome = await reader.readSprint(root);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.epics[0].stories[0].status).toBe('done');
  });

  it('carries the empty-status message', async () => {
    await write('md/sprint-status.yaml', 'project: Shop\n');
    const outcome = await reader.readSprint(root);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value).toMatchObject({
      fileCreated: true,
      epics: [],
      message: 'Sprint file exists but has no development_status yet',
    });
  });
});

describe('FileStateReader.readImplementationFlow', () => {
  it('completes sprint planning only when the manifest has stories', async () => {
    await write('md/tech-spec.md', '# Spec\n');
    await write('md/sprint-status.yaml', 'project: Shop\n');

    let flow = await reader.readImplementationFlow(root, 'quick');
    expect(flow.steps.map((s) => s.status)).toEqual(['completed', 'pending', 'pending']);
    expect(flow.nextStep).toEqual({
      id: 'create-epics-and-stories',
      name: 'Epics and stories',
      command: '/bmad:bmm:workflows:create-epics-and-stories',
    });

    await write('md/epics.md', '# Epics\n');
    await write('md/sprint-status.yaml', 'development_status:\n  epic-1: backlog\n  1-1-a-story: backlog\n');
    flow = await reader.readImplementationFlow(root, 'quick');
    expect(flow.allCompleted).toBe(true);
    expect(flow.nextStep).toBeNull();
  });
});
