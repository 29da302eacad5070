import type { DispatchResult, InputAction } from '@bmad-dashboard/shared';
import type { ProjectHint } from '../probe/types';
import type { ClaudeProbe } from '../state/reconciler';
import type { KeySender, KeyStroke, KeyTarget } from './keySenders';
import { TimeoutError, errorMessage, withTimeout } from '../utils';

export const INPUT_ACTIONS: readonly InputAction[] = ['send', 'enter', 'escape', 'interrupt'];
const ACTION_ALIASES: Readonly<Record<string, InputAction>> = { ctrl_c: 'interrupt' };
export const MAX_INPUT_LENGTH = 100_000;

export function parseInputAction(raw: unknown): InputAction | null {
  if (typeof raw !== 'string') return null;
  const action = ACTION_ALIASES[raw] ?? raw;
  return INPUT_ACTIONS.find((known) => known === action) ?? null;
}

export function strokesFor(action: InputAction, text: string): KeyStroke[] {
  switch (action) {
    case 'send':
      return [
        { kind: 'text', text },
        { kind: 'key', key: 'enter' },
      ];
    case 'enter':
      return [{ kind: 'key', key: 'enter' }];
    case 'escape':
      return [{ kind: 'key', key: 'escape' }];
    case 'interrupt':
      return [{ kind: 'key', key: 'interrupt' }];
  }
}

/**
 * Types into the assistant that the probe attributes to the project.
 * Every outcome, including timeouts and missing tools, is a structured
 * result; `dispatch` never rejects.
 */
export class InputDispatcher {
  constructor(
    private readonly probe: ClaudeProbe,
    private readonly senders: KeySender[],
    private readonly options: { timeoutMs: number }
  ) {}

  async dispatch(hint: ProjectHint | null, action: InputAction, text = ''): Promise<DispatchResult> {
    try {
      return await withTimeout(this.deliver(hint, action, text), this.options.timeoutMs, `input ${action}`);
    } catch (err) {
      const detail = err instanceof TimeoutError ? err.message : `Input delivery failed: ${errorMessage(err)}`;
      console.warn(`[dispatch] ${detail}`);
      return { success: false, detail };
    }
  }

  private async resolveTarget(hint: ProjectHint | null): Promise<KeyTarget | string> {
    const outcome = await this.probe.probe(hint);
    if (outcome.state === 'not-running') return 'Claude is not running';
    if (outcome.state === 'indeterminate') return `Cannot tell which Claude to type into: ${outcome.reason}`;
    if (hint && outcome.match !== 'project') {
      return `Claude is running in ${outcome.cwd ?? 'another directory'}, not in ${hint.root}`;
    }
    return { pid: outcome.pid, windowTitle: outcome.windowTitle };
  }

  private async deliver(hint: ProjectHint | null, action: InputAction, text: string): Promise<DispatchResult> {
    const target = await this.resolveTarget(hint);
    if (typeof target === 'string') return { success: false, detail: target };

    const strokes = strokesFor(action, text);
    const failures: string[] = [];
    for (const sender of this.senders) {
      if (!(await sender.canReach(target))) continue;
      try {
        await sender.send(target, strokes);
      } catch (err) {
        failures.push(`${sender.name}: ${errorMessage(err)}`);
        continue;
      }
      console.log(`[dispatch] ${action} delivered to pid ${target.pid ?? '?'} via ${sender.name}`);
      return {
        success: true,
        detail: `${action} delivered via ${sender.name}`,
        target: {
          pid: target.pid,
          ...(target.windowTitle ? { windowTitle: target.windowTitle } : {}),
          via: sender.name,
        },
      };
    }

    const detail = failures.length > 0 ? failures.join('; ') : 'no key sender can reach the Claude terminal';
    console.warn(`[dispatch] ${action} not delivered: ${detail}`);
    return { success: false, detail };
  }
}
