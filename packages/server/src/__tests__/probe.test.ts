import { describe, it, expect } from 'vitest';
import { containsPath, mentionsName } from '../probe/pathMatch';
import { isAssistantProcess } from '../probe/context';
import { createDetectors } from '../probe/detectors';
import { ProbeResolver, resolveSignals } from '../probe/resolver';
import {
  createSystemSource,
  parsePsOutput,
  parseTabbedWindows,
  parseWindowsProcessJson,
  parseWmctrlOutput,
} from '../probe/systemSource';
import type { ProcessInfo, ProcessSource, ProjectHint, WindowInfo } from '../probe/types';

const SELF_PID = 999;
const HINT: ProjectHint = { root: '/work/shop', name: 'shop' };

function fakeSource(options: {
  processes?: ProcessInfo[] | (() => Promise<ProcessInfo[]>);
  windows?: WindowInfo[];
  cwds?: Record<number, string>;
}): ProcessSource {
  return {
    listProcesses: () =>
      typeof options.processes === 'function' ? options.processes() : Promise.resolve(options.processes ?? []),
    listWindows: () => Promise.resolve(options.windows ?? []),
    getCwd: (pid) => Promise.resolve(options.cwds?.[pid] ?? null),
  };
}

function resolver(source: ProcessSource, nameMatch = true): ProbeResolver {
  return new ProbeResolver(source, createDetectors({ nameMatch }), {
    order: ['process', 'parent-shell', 'window-title'],
    timeoutMs: 20,
    selfPid: SELF_PID,
  });
}

const claude = (pid: number, ppid = 1): ProcessInfo => ({ pid, ppid, name: 'claude', command: 'claude' });

describe('containsPath', () => {
  it('matches the directory and anything below it', () => {
    expect(containsPath('/work/shop', '/work/shop')).toBe(true);
    expect(containsPath('/work/shop/src', '/work/shop/')).toBe(true);
    expect(containsPath('node cli.js --cwd /work/shop', '/work/shop')).toBe(true);
  });

  it('does not match a sibling sharing a prefix', () => {
    expect(containsPath('/work/shop-old', '/work/shop')).toBe(false);
    expect(containsPath('/work/shopping', '/work/shop')).toBe(false);
  });

  it('ignores case and separator style', () => {
    expect(containsPath('C:\\Work\\Shop\\src', 'c:/work/shop')).toBe(true);
  });

  it('falls back to an ASCII skeleton for mangled non-ASCII paths', () => {
    expect(containsPath('cd /home/u/cafÃ©', '/home/u/café')).toBe(true);
    expect(containsPath('cd /home/u/caf', '/home/u/é')).toBe(false);
  });
});

describe('mentionsName', () => {
  it('needs a whole word of three characters or more', () => {
    expect(mentionsName('Claude - shop', 'shop')).toBe(true);
    expect(mentionsName('Claude - shopping', 'shop')).toBe(false);
    expect(mentionsName('Claude - ab', 'ab')).toBe(false);
  });
});

describe('isAssistantProcess', () => {
  it('recognises the executable and the node package', () => {
    expect(isAssistantProcess(claude(1))).toBe(true);
    expect(
      isAssistantProcess({
        pid: 2,
        ppid: 1,
        name: 'node',
        command: 'node /usr/lib/node_modules/@anthropic-ai/claude-code/cli.js',
      })
    ).toBe(true);
    expect(isAssistantProcess({ pid: 3, ppid: 1, name: 'claude.exe', command: '"C:\\Tools\\claude.exe"' })).toBe(true);
  });

  it('does not count shells that mention it', () => {
    expect(isAssistantProcess({ pid: 4, ppid: 1, name: 'bash', command: 'bash -c claude' })).toBe(false);
    expect(isAssistantProcess({ pid: 5, ppid: 1, name: 'cmd.exe', command: 'cmd /k claude' })).toBe(false);
  });
});

describe('ProbeResolver', () => {
  it('reports a project match from the working directory', async () => {
    const outcome = await resolver(fakeSource({ processes: [claude(100)], cwds: { 100: '/work/shop' } })).probe(HINT);
    expect(outcome).toMatchObject({ state: 'running', match: 'project', pid: 100, cwd: '/work/shop', detector: 'process' });
  });

  it('reports a global match when the assistant runs elsewhere', async () => {
    const outcome = await resolver(fakeSource({ processes: [claude(100)], cwds: { 100: '/work/other' } })).probe(HINT);
    expect(outcome).toMatchObject({ state: 'running', match: 'global', cwd: '/work/other' });
  });

  it('prefers a project match from a later detector over an unknown one', async () => {
    const shell: ProcessInfo = { pid: 50, ppid: 1, name: 'bash', command: 'bash -c cd /work/shop && claude' };
    const outcome = await resolver(fakeSource({ processes: [shell, claude(100, 50)] })).probe(HINT);
    expect(outcome).toMatchObject({ state: 'running', match: 'project', pid: 100, detector: 'parent-shell' });
  });

  it('never counts its own process', async () => {
    const self: ProcessInfo = {
      pid: SELF_PID,
      ppid: 1,
      name: 'node',
      command: 'node /opt/@anthropic-ai/claude-code/cli.js /work/shop',
    };
    const outcome = await resolver(fakeSource({ processes: [self] })).probe(HINT);
    expect(outcome.state).toBe('not-running');
  });

  it('is indeterminate when the process table times out', async () => {
    const source = fakeSource({ processes: () => new Promise<ProcessInfo[]>(() => undefined) });
    const outcome = await resolver(source).probe(HINT);
    expect(outcome.state).toBe('indeterminate');
    if (outcome.state !== 'indeterminate') return;
    expect(outcome.reason).toContain('process list timed out after 20ms');
  });

  it('is not running when the process table is empty, whatever a window title says', async () => {
    const bash: ProcessInfo = { pid: 5, ppid: 1, name: 'bash', command: 'bash' };
    const windows = [{ pid: 7, title: 'Claude - Google Chrome' }];
    const outcome = await resolver(fakeSource({ processes: [bash], windows })).probe(HINT);
    expect(outcome.state).toBe('not-running');
  });

  it('ignores an assistant window with no project open when no assistant process runs', async () => {
    const windows = [{ pid: 7, title: 'Claude - Google Chrome' }];
    const outcome = await resolver(fakeSource({ windows })).probe(null);
    expect(outcome.state).toBe('not-running');
  });

  it('is indeterminate when an unattributed window names the assistant and the process table is unreadable', async () => {
    const source = fakeSource({
      processes: () => new Promise<ProcessInfo[]>(() => undefined),
      windows: [{ pid: 7, title: 'Claude - billing' }],
    });
    const outcome = await resolver(source).probe(HINT);
    expect(outcome.state).toBe('indeterminate');
  });

  it('matches a window title by project name only when enabled', async () => {
    const windows = [{ pid: 7, title: 'Claude - shop' }];
    expect(await resolver(fakeSource({ windows })).probe(HINT)).toMatchObject({
      state: 'running',
      match: 'project',
      windowTitle: 'Claude - shop',
      detector: 'window-title',
    });
    expect((await resolver(fakeSource({ windows }), false).probe(HINT)).state).toBe('not-running');
  });

  it('lists what the detectors saw when inspecting', async () => {
    const inspection = await resolver(
      fakeSource({ processes: [claude(100), { pid: 5, ppid: 1, name: 'vim', command: 'vim' }], cwds: { 100: '/work/shop' } })
    ).inspect(HINT);
    expect(inspection.candidates.map((p) => p.pid)).toEqual([100]);
    expect(inspection.order).toEqual(['process', 'parent-shell', 'window-title']);
    expect(inspection.outcome.state).toBe('running');
  });
});

describe('resolveSignals', () => {
  it('is indeterminate with no detectors', () => {
    expect(resolveSignals([])).toEqual({ state: 'indeterminate', reason: 'no detectors configured', signals: [] });
  });
});

describe('system source parsers', () => {
  it('parses ps rows', () => {
    expect(parsePsOutput('  10     1 /usr/bin/claude --resume\n  11 10 bash\n\n')).toEqual([
      { pid: 10, ppid: 1, name: 'claude', command: '/usr/bin/claude --resume' },
      { pid: 11, ppid: 10, name: 'bash', command: 'bash' },
    ]);
  });

  it('parses a single PowerShell object', () => {
    expect(
      parseWindowsProcessJson('{"ProcessId":5,"ParentProcessId":4,"Name":"claude.exe","CommandLine":null}')
    ).toEqual([{ pid: 5, ppid: 4, name: 'claude.exe', command: 'claude.exe' }]);
  });

  it('parses wmctrl and tabbed window lists', () => {
    expect(parseWmctrlOutput('0x0400000a  0 4242 host Claude - shop\n0x0400000b -1 0 host Desktop\n')).toEqual([
      { pid: 4242, title: 'Claude - shop' },
      { pid: null, title: 'Desktop' },
    ]);
    expect(parseTabbedWindows('12\tTerminal - shop\n\n')).toEqual([{ pid: 12, title: 'Terminal - shop' }]);
  });

  it('reads the cwd through lsof on macOS', async () => {
    const calls: string[][] = [];
    const source = createSystemSource({
      timeoutMs: 100,
      platform: 'darwin',
      exec: async (file, args) => {
        calls.push([file, ...args]);
        return { stdout: 'p10\nfcwd\nn/work/shop\n' };
      },
    });
    expect(await source.getCwd(10)).toBe('/work/shop');
    expect(calls).toEqual([['lsof', '-a', '-p', '10', '-d', 'cwd', '-Fn']]);
  });
});
