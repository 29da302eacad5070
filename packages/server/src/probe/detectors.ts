import type { DetectorName } from '@bmad-dashboard/shared';
import type { ProbeContext } from './context';
import { isShell } from './context';
import { containsPath, mentionsName } from './pathMatch';
import type { DetectionResult, Detector, ProcessInfo, ProjectHint, WindowInfo } from './types';
import { errorMessage } from '../utils';

/** Ancestors inspected above an assistant process before giving up */
const MAX_ANCESTOR_DEPTH = 8;
const ASSISTANT_TITLE = /claude/i;

function noEvidence(detector: DetectorName, reason: string): DetectionResult {
  return { kind: 'no-evidence', detector, reason };
}

/** Signal 1: the process table, matched to the project by working directory or command line */
export class ProcessTableDetector implements Detector {
  readonly name = 'process' as const;

  async detect(hint: ProjectHint | null, context: ProbeContext): Promise<DetectionResult> {
    let candidates: ProcessInfo[];
    try {
      candidates = await context.assistantProcesses();
    } catch (err) {
      return noEvidence(this.name, `process table unavailable: ${errorMessage(err)}`);
    }

    if (candidates.length === 0) {
      return { kind: 'not-running', detector: this.name, evidence: 'no assistant process in the process table' };
    }

    let firstOther: { proc: ProcessInfo; cwd: string } | null = null;
    for (const proc of candidates) {
      const cwd = await context.cwd(proc.pid);
      if (hint && (containsPath(proc.command, hint.root) || (cwd !== null && containsPath(cwd, hint.root)))) {
        return {
          kind: 'running',
          detector: this.name,
          match: 'project',
          pid: proc.pid,
          cwd: cwd ?? hint.root,
          windowTitle: null,
          evidence: `pid ${proc.pid} runs in the project directory`,
        };
      }
      if (cwd !== null && !firstOther) firstOther = { proc, cwd };
    }

    if (!hint || firstOther) {
      const proc = firstOther?.proc ?? candidates[0];
      return {
        kind: 'running',
        detector: this.name,
        match: 'global',
        pid: proc.pid,
        cwd: firstOther?.cwd ?? null,
        windowTitle: null,
        evidence: firstOther ? `pid ${proc.pid} runs in ${firstOther.cwd}` : `pid ${proc.pid} found with no project open`,
      };
    }

    return {
      kind: 'running',
      detector: this.name,
      match: 'unknown',
      pid: candidates[0].pid,
      cwd: null,
      windowTitle: null,
      evidence: `pid ${candidates[0].pid} found but its working directory is unreadable`,
    };
  }
}

/** Signal 2: a shell or terminal above the assistant that was started in the project */
export class ParentShellDetector implements Detector {
  readonly name = 'parent-shell' as const;

  async detect(hint: ProjectHint | null, context: ProbeContext): Promise<DetectionResult> {
    if (!hint) return noEvidence(this.name, 'no project to match');

    let processes: ProcessInfo[];
    let candidates: ProcessInfo[];
    try {
      processes = await context.processes();
      candidates = await context.assistantProcesses();
    } catch (err) {
      return noEvidence(this.name, `process table unavailable: ${errorMessage(err)}`);
    }
    if (candidates.length === 0) {
      return { kind: 'not-running', detector: this.name, evidence: 'no assistant process to trace' };
    }

    const byPid = new Map(processes.map((proc) => [proc.pid, proc] as const));
    for (const candidate of candidates) {
      let current = byPid.get(candidate.ppid);
      for (let depth = 0; current && depth < MAX_ANCESTOR_DEPTH; depth++) {
        if (isShell(current) && containsPath(current.command, hint.root)) {
          return {
            kind: 'running',
            detector: this.name,
            match: 'project',
            pid: candidate.pid,
            cwd: hint.root,
            windowTitle: null,
            evidence: `pid ${candidate.pid} was started by shell ${current.pid} in the project directory`,
          };
        }
        if (current.ppid === current.pid) break;
        current = byPid.get(current.ppid);
      }
    }
    return noEvidence(this.name, 'no ancestor shell refers to the project');
  }
}

/** Signal 3: window titles, for when the process table says too little */
export class WindowTitleDetector implements Detector {
  readonly name = 'window-title' as const;

  constructor(private readonly options: { nameMatch: boolean } = { nameMatch: true }) {}

  private refersToProject(title: string, hint: ProjectHint): boolean {
    return containsPath(title, hint.root) || (this.options.nameMatch && mentionsName(title, hint.name));
  }

  /** Assistant processes, or null when the process table cannot be read */
  private assistants(context: ProbeContext): Promise<ProcessInfo[] | null> {
    return context.assistantProcesses().catch(() => null);
  }

  async detect(hint: ProjectHint | null, context: ProbeContext): Promise<DetectionResult> {
    let windows: WindowInfo[];
    try {
      windows = await context.windows();
    } catch (err) {
      return noEvidence(this.name, `window list unavailable: ${errorMessage(err)}`);
    }

    const assistantWindows = windows.filter((w) => ASSISTANT_TITLE.test(w.title));
    if (hint) {
      const own = assistantWindows.find((w) => this.refersToProject(w.title, hint));
      if (own) {
        return {
          kind: 'running',
          detector: this.name,
          match: 'project',
          pid: own.pid,
          cwd: hint.root,
          windowTitle: own.title,
          evidence: `window "${own.title}" names the assistant and the project`,
        };
      }

      // a terminal titled after the project while an assistant process exists
      const assistants = (await this.assistants(context)) ?? [];
      const terminal = assistants.length > 0 ? windows.find((w) => this.refersToProject(w.title, hint)) : undefined;
      if (terminal) {
        return {
          kind: 'running',
          detector: this.name,
          match: 'project',
          pid: assistants[0].pid,
          cwd: hint.root,
          windowTitle: terminal.title,
          evidence: `window "${terminal.title}" names the project while pid ${assistants[0].pid} runs`,
        };
      }
    }

    // a browser tab or editor titled after the assistant is no sighting when the process table shows none
    if (assistantWindows.length > 0 && (await this.assistants(context))?.length !== 0) {
      const other = assistantWindows[0];
      return {
        kind: 'running',
        detector: this.name,
        match: hint ? 'unknown' : 'global',
        pid: other.pid,
        cwd: null,
        windowTitle: other.title,
        evidence: `window "${other.title}" names the assistant but not the project`,
      };
    }
    return noEvidence(this.name, 'no window title mentions the assistant');
  }
}

export function createDetectors(options: { nameMatch: boolean }): Detector[] {
  return [new ProcessTableDetector(), new ParentShellDetector(), new WindowTitleDetector(options)];
}
