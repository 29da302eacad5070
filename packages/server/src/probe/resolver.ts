import type { DetectorName } from '@bmad-dashboard/shared';
import { ProbeContext } from './context';
import type { DetectionResult, Detector, ProbeOutcome, ProcessInfo, ProcessSource, ProjectHint, WindowInfo } from './types';
import { errorMessage, withTimeout } from '../utils';

type RunningResult = Extract<DetectionResult, { kind: 'running' }>;

function toRunning(result: RunningResult, match: 'project' | 'global', signals: DetectionResult[]): ProbeOutcome {
  return {
    state: 'running',
    match,
    pid: result.pid,
    cwd: result.cwd,
    windowTitle: result.windowTitle,
    detector: result.detector,
    signals,
  };
}

/**
 * Combine detector results, already in precedence order, into one outcome.
 * A project match from any detector wins, then a match elsewhere. A
 * conclusive negative outranks a sighting of unknown attribution, since a
 * window title alone cannot contradict an empty process table. Anything
 * else is indeterminate.
 */
export function resolveSignals(signals: DetectionResult[]): ProbeOutcome {
  const running = signals.filter((s): s is RunningResult => s.kind === 'running');

  const project = running.find((s) => s.match === 'project');
  if (project) return toRunning(project, 'project', signals);

  const global = running.find((s) => s.match === 'global');
  if (global) return toRunning(global, 'global', signals);

  if (signals.some((s) => s.kind === 'not-running')) return { state: 'not-running', signals };

  const unknown = running.find((s) => s.match === 'unknown');
  if (unknown) {
    return { state: 'indeterminate', reason: `${unknown.detector}: ${unknown.evidence}`, signals };
  }

  const reasons = signals.map((s) => (s.kind === 'no-evidence' ? `${s.detector}: ${s.reason}` : s.detector));
  return { state: 'indeterminate', reason: reasons.join('; ') || 'no detectors configured', signals };
}

/** Everything a probe saw, for troubleshooting detection */
export interface ProbeInspection {
  hint: ProjectHint | null;
  outcome: ProbeOutcome;
  candidates: ProcessInfo[];
  windows: WindowInfo[];
  order: DetectorName[];
}

export interface ProbeResolverOptions {
  order: DetectorName[];
  timeoutMs: number;
  selfPid?: number;
}

/** Runs the detectors against one shared, per-probe view of the OS */
export class ProbeResolver {
  private readonly detectors: Detector[];

  constructor(
    private readonly source: ProcessSource,
    detectors: Detector[],
    private readonly options: ProbeResolverOptions
  ) {
    this.detectors = options.order.flatMap((name) => detectors.filter((d) => d.name === name));
  }

  private async run(detector: Detector, hint: ProjectHint | null, context: ProbeContext): Promise<DetectionResult> {
    try {
      // sources time out on their own; this bounds the detector as a whole
      return await withTimeout(detector.detect(hint, context), this.options.timeoutMs * 2, detector.name);
    } catch (err) {
      return { kind: 'no-evidence', detector: detector.name, reason: errorMessage(err) };
    }
  }

  private createContext(): ProbeContext {
    return new ProbeContext(this.source, { timeoutMs: this.options.timeoutMs, selfPid: this.options.selfPid });
  }

  private async resolve(hint: ProjectHint | null, context: ProbeContext): Promise<ProbeOutcome> {
    const signals = await Promise.all(this.detectors.map((detector) => this.run(detector, hint, context)));
    return resolveSignals(signals);
  }

  probe(hint: ProjectHint | null): Promise<ProbeOutcome> {
    return this.resolve(hint, this.createContext());
  }

  /** Same as `probe`, plus the raw process and window lists the detectors worked from */
  async inspect(hint: ProjectHint | null): Promise<ProbeInspection> {
    const context = this.createContext();
    const outcome = await this.resolve(hint, context);
    const [candidates, windows] = await Promise.all([
      context.assistantProcesses().catch(() => []),
      context.windows().catch(() => []),
    ]);
    return { hint, outcome, candidates, windows, order: this.detectors.map((detector) => detector.name) };
  }
}
