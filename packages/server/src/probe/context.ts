import path from 'path';
import type { ProcessInfo, ProcessSource, WindowInfo } from './types';
import { withTimeout } from '../utils';

/** Executables the probe itself runs to enumerate processes and windows */
export const PROBE_TOOLS: ReadonlySet<string> = new Set([
  'ps',
  'lsof',
  'wmctrl',
  'osascript',
  'powershell',
  'powershell.exe',
  'pwsh',
  'pwsh.exe',
]);

const SHELLS: ReadonlySet<string> = new Set([
  'sh',
  'bash',
  'zsh',
  'fish',
  'dash',
  'cmd',
  'cmd.exe',
  'powershell',
  'powershell.exe',
  'pwsh',
  'pwsh.exe',
]);

const RUNTIMES: ReadonlySet<string> = new Set(['node', 'node.exe', 'bun', 'bun.exe']);
const ASSISTANT_PACKAGE = /@anthropic-ai[\\/]claude-code|native-binary[\\/]claude/i;

function baseName(value: string): string {
  return path.basename(value.replace(/\\/g, '/')).toLowerCase();
}

function firstToken(command: string): string {
  const trimmed = command.trim();
  if (trimmed.startsWith('"')) {
    const end = trimmed.indexOf('"', 1);
    return end === -1 ? trimmed.slice(1) : trimmed.slice(1, end);
  }
  return trimmed.split(/\s+/)[0] ?? '';
}

export function isShell(proc: ProcessInfo): boolean {
  return SHELLS.has(baseName(proc.name));
}

/**
 * Whether a process is the assistant itself: a `claude` executable, or a
 * JavaScript runtime running the assistant's package. Shells that merely
 * mention `claude` in their command line do not count; they outlive the
 * assistant (`cmd /k`) and would keep reporting it as running.
 */
export function isAssistantProcess(proc: ProcessInfo): boolean {
  if (isShell(proc)) return false;
  const exe = baseName(firstToken(proc.command) || proc.name).replace(/\.(exe|cmd)$/, '');
  if (exe === 'claude' || baseName(proc.name).replace(/\.(exe|cmd)$/, '') === 'claude') return true;
  if (RUNTIMES.has(baseName(proc.name)) || RUNTIMES.has(exe)) return ASSISTANT_PACKAGE.test(proc.command);
  return ASSISTANT_PACKAGE.test(firstToken(proc.command));
}

export interface ProbeContextOptions {
  timeoutMs: number;
  /** Pid of this server; it and the enumeration tools it spawns are never evidence */
  selfPid?: number;
}

/**
 * Per-probe view of the OS. Each source is read at most once per probe and
 * every read is bounded by `timeoutMs`; a timed-out read rejects, which the
 * detectors report as no evidence.
 */
export class ProbeContext {
  private processList: Promise<ProcessInfo[]> | null = null;
  private windowList: Promise<WindowInfo[]> | null = null;
  private cwds = new Map<number, Promise<string | null>>();
  private readonly selfPid: number;

  constructor(
    private readonly source: ProcessSource,
    private readonly options: ProbeContextOptions
  ) {
    this.selfPid = options.selfPid ?? process.pid;
  }

  get timeoutMs(): number {
    return this.options.timeoutMs;
  }

  isOwnProcess(proc: ProcessInfo): boolean {
    if (proc.pid === this.selfPid) return true;
    return proc.ppid === this.selfPid && PROBE_TOOLS.has(baseName(proc.name));
  }

  processes(): Promise<ProcessInfo[]> {
    if (!this.processList) {
      this.processList = withTimeout(this.source.listProcesses(), this.options.timeoutMs, 'process list').then((list) =>
        list.filter((proc) => !this.isOwnProcess(proc))
      );
    }
    return this.processList;
  }

  async assistantProcesses(): Promise<ProcessInfo[]> {
    return (await this.processes()).filter(isAssistantProcess);
  }

  windows(): Promise<WindowInfo[]> {
    if (!this.windowList) {
      this.windowList = withTimeout(this.source.listWindows(), this.options.timeoutMs, 'window list');
    }
    return this.windowList;
  }

  /** Never rejects; an unreadable cwd is null */
  cwd(pid: number): Promise<string | null> {
    let pending = this.cwds.get(pid);
    if (!pending) {
      pending = withTimeout(this.source.getCwd(pid), this.options.timeoutMs, `cwd of ${pid}`).catch(() => null);
      this.cwds.set(pid, pending);
    }
    return pending;
  }
}
