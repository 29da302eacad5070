import type { DetectorName } from '@bmad-dashboard/shared';
import type { ProbeContext } from './context';

export interface ProcessInfo {
  pid: number;
  ppid: number;
  /** Executable base name, e.g. "node" or "claude" */
  name: string;
  /** Full command line */
  command: string;
}

export interface WindowInfo {
  /** Owning process, when the platform reports it */
  pid: number | null;
  title: string;
}

/** OS enumeration behind the detectors; swapped for a fake process table in tests */
export interface ProcessSource {
  listProcesses(): Promise<ProcessInfo[]>;
  listWindows(): Promise<WindowInfo[]>;
  /** Working directory of a process, null when the platform cannot tell */
  getCwd(pid: number): Promise<string | null>;
}

export interface ProjectHint {
  root: string;
  name: string;
}

/**
 * What one detector concluded.
 * - running/project: the assistant is attached to the hinted project
 * - running/global: the assistant is attached to some other directory
 * - running/unknown: a process exists but its project cannot be determined
 * - no-evidence: this signal could not be read (timeout, unsupported, denied)
 */
export type DetectionResult =
  | {
      kind: 'running';
      detector: DetectorName;
      match: 'project' | 'global' | 'unknown';
      pid: number | null;
      cwd: string | null;
      windowTitle: string | null;
      evidence: string;
    }
  | { kind: 'not-running'; detector: DetectorName; evidence: string }
  | { kind: 'no-evidence'; detector: DetectorName; reason: string };

export interface Detector {
  readonly name: DetectorName;
  detect(hint: ProjectHint | null, context: ProbeContext): Promise<DetectionResult>;
}

export type ProbeOutcome =
  | { state: 'not-running'; signals: DetectionResult[] }
  | {
      state: 'running';
      match: 'project' | 'global';
      pid: number | null;
      cwd: string | null;
      windowTitle: string | null;
      detector: DetectorName;
      signals: DetectionResult[];
    }
  | { state: 'indeterminate'; reason: string; signals: DetectionResult[] };
