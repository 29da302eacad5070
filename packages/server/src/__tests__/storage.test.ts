import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFile, readFile, mkdir, rm, access } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import * as yaml from 'js-yaml';
import { RecentProjectsStore, RECENT_PROJECTS_FILE } from '../state/recentProjects';
import { StoryOverrideWriter, findStoryKey, rewriteManifestEntry } from '../state/storyOverride';
import { FileStateReader } from '../state/fileStateReader';

let dir: string;

beforeEach(async () => {
  dir = join(tmpdir(), `bmad-storage-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await mkdir(dir, { recursive: true });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

describe('RecentProjectsStore', () => {
  it('keeps the most recent first without duplicates', async () => {
    const store = new RecentProjectsStore(join(dir, 'data'), 2);
    await store.touch('/work/a', 'a', new Date('2024-01-01T00:00:00Z'));
    await store.touch('/work/b', 'b', new Date('2024-01-02T00:00:00Z'));
    await store.touch('/work/a', 'a', new Date('2024-01-03T00:00:00Z'));

    expect(await store.list()).toEqual([
      { path: '/work/a', name: 'a', lastOpened: '2024-01-03T00:00:00.000Z' },
      { path: '/work/b', name: 'b', lastOpened: '2024-01-02T00:00:00.000Z' },
    ]);

    await store.touch('/work/c', 'c', new Date('2024-01-04T00:00:00Z'));
    expect((await store.list()).map((p) => p.path)).toEqual(['/work/c', '/work/a']);
  });

  it('persists across instances', async () => {
    await new RecentProjectsStore(dir).touch('/work/a', 'a');
    expect((await new RecentProjectsStore(dir).list()).map((p) => p.name)).toEqual(['a']);
  });

  it('removes idempotently', async () => {
    const store = new RecentProjectsStore(dir);
    await store.touch('/work/a', 'a');
    expect(await store.remove('/work/a')).toBe(true);
    expect(await store.remove('/work/a')).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  it('serialises concurrent writes', async () => {
    const store = new RecentProjectsStore(dir);
    await Promise.all(['/work/a', '/work/b', '/work/c'].map((p) => store.touch(p, p.slice(6))));
    expect((await store.list()).map((p) => p.path).sort()).toEqual(['/work/a', '/work/b', '/work/c']);
  });

  it('treats a corrupt file as empty', async () => {
    await writeFile(join(dir, RECENT_PROJECTS_FILE), '{not json');
    expect(await new RecentProjectsStore(dir).list()).toEqual([]);
  });

  it('accepts the wrapped format and fills in missing names', async () => {
    await writeFile(
      join(dir, RECENT_PROJECTS_FILE),
      JSON.stringify({ projects: [{ path: '/work/shop', lastOpened: '2024-01-01T00:00:00.000Z' }, { name: 'no path' }] })
    );
    expect(await new RecentProjectsStore(dir).list()).toEqual([
      { path: '/work/shop', name: 'shop', lastOpened: '2024-01-01T00:00:00.000Z' },
    ]);
  });
});

describe('manifest helpers', () => {
  it('finds a story key by id prefix', () => {
    expect(findStoryKey({ 'epic-1': 'contexted', '1-1-login': 'done' }, '1-1')).toBe('1-1-login');
    expect(findStoryKey({ '1-1': 'done' }, '1-1')).toBe('1-1');
    expect(findStoryKey({ '1-10-x': 'done' }, '1-1')).toBeNull();
  });

  it('rewrites a value and keeps the trailing comment', () => {
    const text = 'development_status:\n  1-1-login: drafted  # first story\n  1-2-cart: backlog\n';
    expect(rewriteManifestEntry(text, '1-1-login', 'in-progress')).toBe(
      'development_status:\n  1-1-login: in-progress  # first story\n  1-2-cart: backlog\n'
    );
    expect(rewriteManifestEntry('development_status: {1-1-login: drafted}\n', '1-1-login', 'done')).toBeNull();
  });
});

describe('StoryOverrideWriter', () => {
  const manifest = [
    '# sprint tracking',
    'story_location: md/stories',
    'development_status:',
    '  epic-1: contexted',
    '  1-1-login: drafted  # first story',
    '  1-2-cart: backlog',
    '',
  ].join('\n');

  let writer: StoryOverrideWriter;

  beforeEach(async () => {
    await mkdir(join(dir, '.bmad', 'bmm'), { recursive: true });
    await mkdir(join(dir, 'md', 'stories'), { recursive: true });
    await writeFile(join(dir, 'md', 'sprint-status.yaml'), manifest);
    await writeFile(join(dir, 'md', 'stories', '1-1-login.md'), '# Login\n\nStatus: drafted\n');
    writer = new StoryOverrideWriter(new FileStateReader());
  });

  it('updates the manifest line and the story file', async () => {
    const outcome = await writer.apply(dir, '1-1', 'in-progress');
    expect(outcome).toEqual({
      ok: true,
      result: {
        storyId: '1-1',
        status: 'in-progress',
        storyFile: 'updated',
        message: 'Story 1-1 set to in-progress; story file updated',
      },
    });
    expect(await readFile(join(dir, 'md', 'sprint-status.yaml'), 'utf-8')).toBe(
      manifest.replace('1-1-login: drafted', '1-1-login: in-progress')
    );
    expect(await readFile(join(dir, 'md', 'stories', '1-1-login.md'), 'utf-8')).toBe('# Login\n\nStatus: in-progress\n');
  });

  it('deletes the story file when moved back to backlog', async () => {
    const outcome = await writer.apply(dir, '1-1', 'backlog');
    expect(outcome.ok && outcome.result.storyFile).toBe('deleted');
    expect(await exists(join(dir, 'md', 'stories', '1-1-login.md'))).toBe(false);
  });

  it('rewrites the story file when moved back to drafted', async () => {
    await writeFile(join(dir, 'md', 'stories', '1-1-login.md'), '# Login\n\n**Status:** review\n');
    expect(await writer.apply(dir, '1-1', 'drafted')).toMatchObject({ ok: true, result: { storyFile: 'updated' } });
    expect(await readFile(join(dir, 'md', 'stories', '1-1-login.md'), 'utf-8')).toBe('# Login\n\n**Status:** drafted\n');
  });

  it('reports an unchanged story file and a missing one', async () => {
    expect(await writer.apply(dir, '1-1', 'drafted')).toMatchObject({ ok: true, result: { storyFile: 'unchanged' } });
    expect(await writer.apply(dir, '1-2', 'done')).toMatchObject({ ok: true, result: { storyFile: 'missing' } });
  });

  it('rejects unknown stories and projects without a manifest', async () => {
    expect(await writer.apply(dir, '9-9', 'done')).toEqual({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Story 9-9 not found in sprint manifest',
    });

    const empty = join(dir, 'empty');
    await mkdir(empty);
    expect(await writer.apply(empty, '1-1', 'done')).toMatchObject({ ok: false, error: 'FILE_NOT_FOUND' });
  });

  it('reports a malformed manifest as a parse error', async () => {
    await writeFile(join(dir, 'md', 'sprint-status.yaml'), 'development_status: [\n');
    expect(await writer.apply(dir, '1-1', 'done')).toMatchObject({ ok: false, error: 'PARSE_ERROR' });
  });

  it('rewrites a flow-style manifest through the YAML dumper', async () => {
    await writeFile(join(dir, 'md', 'sprint-status.yaml'), 'development_status: {epic-1: contexted, 1-1-login: drafted}\n');
    await writer.apply(dir, '1-1', 'review');
    const data = yaml.load(await readFile(join(dir, 'md', 'sprint-status.yaml'), 'utf-8'));
    expect(data).toEqual({ development_status: { 'epic-1': 'contexted', '1-1-login': 'review' } });
  });
});
