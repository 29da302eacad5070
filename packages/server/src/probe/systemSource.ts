import { readlink } from 'fs/promises';
import path from 'path';
import type { ProcessInfo, ProcessSource, WindowInfo } from './types';
import { isRecord } from '../parsers/yamlFile';
import { execFileAsync, type ExecFileAsync } from '../utils';

const WINDOWS_PROCESS_QUERY =
  'Get-CimInstance Win32_Process | Select-Object ProcessId,ParentProcessId,Name,CommandLine | ConvertTo-Json -Compress';
const WINDOWS_WINDOW_QUERY =
  'Get-Process | Where-Object { $_.MainWindowTitle } | Select-Object Id,MainWindowTitle | ConvertTo-Json -Compress';
const MACOS_WINDOW_SCRIPT = `
set out to ""
tell application "System Events"
  repeat with p in (every process whose background only is false)
    set pidValue to unix id of p
    repeat with w in (every window of p)
      set out to out & pidValue & tab & (name of w) & linefeed
    end repeat
  end repeat
end tell
return out`;

export function parsePsOutput(stdout: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\s*(\d+)\s+(\d+)\s+(.*)$/.exec(line);
    if (!match) continue;
    const command = match[3].trim();
    const exe = command.split(/\s+/)[0] ?? '';
    processes.push({
      pid: Number(match[1]),
      ppid: Number(match[2]),
      name: path.basename(exe),
      command,
    });
  }
  return processes;
}

function jsonRows(stdout: string): Record<string, unknown>[] {
  const trimmed = stdout.trim();
  if (!trimmed) return [];
  const parsed: unknown = JSON.parse(trimmed);
  const rows = Array.isArray(parsed) ? parsed : [parsed];
  return rows.filter(isRecord);
}

export function parseWindowsProcessJson(stdout: string): ProcessInfo[] {
  return jsonRows(stdout).flatMap((row) => {
    const pid = row.ProcessId;
    const ppid = row.ParentProcessId;
    if (typeof pid !== 'number' || typeof ppid !== 'number') return [];
    const name = typeof row.Name === 'string' ? row.Name : '';
    const command = typeof row.CommandLine === 'string' ? row.CommandLine : name;
    return [{ pid, ppid, name, command }];
  });
}

export function parseWindowsWindowJson(stdout: string): WindowInfo[] {
  return jsonRows(stdout).flatMap((row) =>
    typeof row.MainWindowTitle === 'string'
      ? [{ pid: typeof row.Id === 'number' ? row.Id : null, title: row.MainWindowTitle }]
      : []
  );
}

/** `wmctrl -lp` rows: window id, desktop, pid, host, title */
export function parseWmctrlOutput(stdout: string): WindowInfo[] {
  const windows: WindowInfo[] = [];
  for (const line of stdout.split('\n')) {
    const match = /^\S+\s+-?\d+\s+(\d+)\s+\S+\s+(.*)$/.exec(line);
    if (!match) continue;
    const pid = Number(match[1]);
    windows.push({ pid: pid > 0 ? pid : null, title: match[2].trim() });
  }
  return windows;
}

/** "pid<TAB>title" lines from the System Events script */
export function parseTabbedWindows(stdout: string): WindowInfo[] {
  return stdout
    .split('\n')
    .map((line) => line.split('\t'))
    .filter((parts) => parts.length >= 2 && parts[1].trim() !== '')
    .map(([pid, ...title]) => ({ pid: Number(pid) || null, title: title.join('\t').trim() }));
}

export interface SystemSourceOptions {
  timeoutMs: number;
  platform?: NodeJS.Platform;
  exec?: ExecFileAsync;
}

/**
 * Process and window enumeration through the platform's own tools:
 * ps/lsof/wmctrl/osascript on Unix-likes, PowerShell on Windows.
 * Every call runs as a child process with a timeout, off the event loop.
 */
export function createSystemSource(options: SystemSourceOptions): ProcessSource {
  const platform = options.platform ?? process.platform;
  const exec = options.exec ?? execFileAsync;
  const run = (file: string, args: string[]) =>
    exec(file, args, { timeout: options.timeoutMs, maxBuffer: 8 * 1024 * 1024, windowsHide: true });

  async function listProcesses(): Promise<ProcessInfo[]> {
    if (platform === 'win32') {
      const { stdout } = await run('powershell', ['-NoProfile', '-NonInteractive', '-Command', WINDOWS_PROCESS_QUERY]);
      return parseWindowsProcessJson(stdout);
    }
    const { stdout } = await run('ps', ['-axo', 'pid=,ppid=,args=']);
    return parsePsOutput(stdout);
  }

  async function listWindows(): Promise<WindowInfo[]> {
    if (platform === 'win32') {
      const { stdout } = await run('powershell', ['-NoProfile', '-NonInteractive', '-Command', WINDOWS_WINDOW_QUERY]);
      return parseWindowsWindowJson(stdout);
    }
    if (platform === 'darwin') {
      const { stdout } = await run('osascript', ['-e', MACOS_WINDOW_SCRIPT]);
      return parseTabbedWindows(stdout);
    }
    const { stdout } = await run('wmctrl', ['-lp']);
    return parseWmctrlOutput(stdout);
  }

  async function getCwd(pid: number): Promise<string | null> {
    if (platform === 'linux') {
      return readlink(`/proc/${pid}/cwd`);
    }
    if (platform === 'darwin') {
      const { stdout } = await run('lsof', ['-a', '-p', String(pid), '-d', 'cwd', '-Fn']);
      const line = stdout.split('\n').find((l) => l.startsWith('n'));
      return line ? line.slice(1) : null;
    }
    return null;
  }

  return { listProcesses, listWindows, getCwd };
}
