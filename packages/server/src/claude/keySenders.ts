import type { ProcessSource } from '../probe/types';
import type { ExecFileAsync } from '../utils';

/** One step of keyboard input */
export type KeyStroke = { kind: 'text'; text: string } | { kind: 'key'; key: 'enter' | 'escape' | 'interrupt' };

export interface KeyTarget {
  pid: number | null;
  windowTitle: string | null;
}

/**
 * A way of typing into the assistant's terminal. `canReach` is cheap and
 * never throws; `send` rejects when delivery failed.
 */
export interface KeySender {
  readonly name: string;
  canReach(target: KeyTarget): Promise<boolean>;
  send(target: KeyTarget, strokes: KeyStroke[]): Promise<void>;
}

/** Environment variable the GUI scripts read the text from, so it is never spliced into a script */
const INPUT_ENV = 'BMAD_DASHBOARD_INPUT';

const TMUX_KEYS = { enter: 'C-m', escape: 'Escape', interrupt: 'C-c' } as const;
const XDOTOOL_KEYS = { enter: 'Return', escape: 'Escape', interrupt: 'ctrl+c' } as const;
const APPLESCRIPT_KEYS = {
  enter: 'key code 36',
  escape: 'key code 53',
  interrupt: 'keystroke "c" using control down',
} as const;
const SENDKEYS_KEYS = { enter: '{ENTER}', escape: '{ESC}', interrupt: '^c' } as const;

/** Pause between strokes; terminals drop keys sent while a paste is still landing */
const STROKE_GAP_MS = 100;

const pause = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ================================================================
// tmux
// ================================================================

/** Types into the tmux pane whose shell is an ancestor of the target */
export class TmuxSender implements KeySender {
  readonly name = 'tmux';

  constructor(
    private readonly exec: ExecFileAsync,
    private readonly processes: ProcessSource,
    private readonly timeoutMs: number
  ) {}

  async findPane(pid: number): Promise<string | null> {
    let panes: Map<number, string>;
    try {
      const { stdout } = await this.exec('tmux', ['list-panes', '-a', '-F', '#{pane_pid} #{pane_id}'], {
        timeout: this.timeoutMs,
      });
      panes = new Map(
        stdout
          .split('\n')
          .map((line) => line.trim().split(' '))
          .filter((parts) => parts.length === 2 && /^\d+$/.test(parts[0]))
          .map(([panePid, paneId]) => [Number(panePid), paneId] as const)
      );
    } catch {
      return null; // no tmux server
    }
    if (panes.size === 0) return null;

    const parents = new Map((await this.processes.listProcesses()).map((proc) => [proc.pid, proc.ppid] as const));
    let current: number | undefined = pid;
    for (let depth = 0; current !== undefined && depth < 16; depth++) {
      const pane = panes.get(current);
      if (pane) return pane;
      const parent = parents.get(current);
      if (parent === undefined || parent === current) break;
      current = parent;
    }
    return null;
  }

  async canReach(target: KeyTarget): Promise<boolean> {
    if (target.pid === null) return false;
    try {
      return (await this.findPane(target.pid)) !== null;
    } catch {
      return false;
    }
  }

  async send(target: KeyTarget, strokes: KeyStroke[]): Promise<void> {
    const pane = target.pid === null ? null : await this.findPane(target.pid);
    if (!pane) throw new Error('no tmux pane hosts the target process');
    for (const stroke of strokes) {
      const args =
        stroke.kind === 'text'
          ? ['send-keys', '-t', pane, '-l', stroke.text]
          : ['send-keys', '-t', pane, TMUX_KEYS[stroke.key]];
      await this.exec('tmux', args, { timeout: this.timeoutMs });
    }
  }
}

// ================================================================
// Platform GUI senders
// ================================================================

/** Linux/X11: focus the window, then type */
export class XdotoolSender implements KeySender {
  readonly name = 'xdotool';

  constructor(
    private readonly exec: ExecFileAsync,
    private readonly timeoutMs: number
  ) {}

  private async findWindow(target: KeyTarget): Promise<string | null> {
    const searches: string[][] = [];
    if (target.pid !== null) searches.push(['search', '--pid', String(target.pid)]);
    if (target.windowTitle) searches.push(['search', '--name', target.windowTitle.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')]);
    for (const args of searches) {
      try {
        const { stdout } = await this.exec('xdotool', args, { timeout: this.timeoutMs });
        const id = stdout.split('\n').find((line) => /^\d+$/.test(line.trim()));
        if (id) return id.trim();
      } catch {
        continue; // xdotool exits 1 when nothing matches
      }
    }
    return null;
  }

  async canReach(target: KeyTarget): Promise<boolean> {
    return (await this.findWindow(target)) !== null;
  }

  async send(target: KeyTarget, strokes: KeyStroke[]): Promise<void> {
    const windowId = await this.findWindow(target);
    if (!windowId) throw new Error('no X11 window found for the target');
    await this.exec('xdotool', ['windowactivate', '--sync', windowId], { timeout: this.timeoutMs });
    for (const stroke of strokes) {
      const args =
        stroke.kind === 'text'
          ? ['type', '--clearmodifiers', '--delay', '0', '--', stroke.text]
          : ['key', '--clearmodifiers', XDOTOOL_KEYS[stroke.key]];
      await this.exec('xdotool', args, { timeout: this.timeoutMs });
      await pause(STROKE_GAP_MS);
    }
  }
}

/** macOS: bring the process forward and paste through the clipboard */
export class AppleScriptSender implements KeySender {
  readonly name = 'osascript';

  constructor(
    private readonly exec: ExecFileAsync,
    private readonly timeoutMs: number
  ) {}

  async canReach(target: KeyTarget): Promise<boolean> {
    return target.pid !== null || target.windowTitle !== null;
  }

  async send(target: KeyTarget, strokes: KeyStroke[]): Promise<void> {
    const activate =
      target.pid !== null
        ? `tell application "System Events" to set frontmost of (first process whose unix id is ${target.pid}) to true`
        : 'tell application "Terminal" to activate';
    await this.exec('osascript', ['-e', activate], { timeout: this.timeoutMs });

    for (const stroke of strokes) {
      if (stroke.kind === 'text') {
        await this.exec('osascript', ['-e', `set the clipboard to (system attribute "${INPUT_ENV}")`], {
          timeout: this.timeoutMs,
          env: { ...process.env, [INPUT_ENV]: stroke.text },
        });
        await this.exec('osascript', ['-e', 'tell application "System Events" to keystroke "v" using command down'], {
          timeout: this.timeoutMs,
        });
      } else {
        await this.exec('osascript', ['-e', `tell application "System Events" to ${APPLESCRIPT_KEYS[stroke.key]}`], {
          timeout: this.timeoutMs,
        });
      }
      await pause(STROKE_GAP_MS);
    }
  }
}

/** Windows: AppActivate the process, paste with SendKeys */
export class SendKeysSender implements KeySender {
  readonly name = 'sendkeys';

  constructor(
    private readonly exec: ExecFileAsync,
    private readonly timeoutMs: number
  ) {}

  async canReach(target: KeyTarget): Promise<boolean> {
    return target.pid !== null || target.windowTitle !== null;
  }

  async send(target: KeyTarget, strokes: KeyStroke[]): Promise<void> {
    const activate = target.pid !== null ? String(target.pid) : `$env:BMAD_DASHBOARD_TITLE`;
    const lines = [
      '$shell = New-Object -ComObject WScript.Shell',
      `if (-not $shell.AppActivate(${activate})) { throw 'window could not be activated' }`,
      'Start-Sleep -Milliseconds 150',
    ];
    for (const stroke of strokes) {
      if (stroke.kind === 'text') {
        lines.push(`Set-Clipboard -Value $env:${INPUT_ENV}`, "$shell.SendKeys('^v')");
      } else {
        lines.push(`$shell.SendKeys('${SENDKEYS_KEYS[stroke.key]}')`);
      }
      lines.push(`Start-Sleep -Milliseconds ${STROKE_GAP_MS}`);
    }

    const text = strokes.find((stroke) => stroke.kind === 'text');
    await this.exec('powershell', ['-NoProfile', '-NonInteractive', '-Command', lines.join('; ')], {
      timeout: this.timeoutMs,
      windowsHide: true,
      env: {
        ...process.env,
        [INPUT_ENV]: text?.kind === 'text' ? text.text : '',
        BMAD_DASHBOARD_TITLE: target.windowTitle ?? '',
      },
    });
  }
}

export function createKeySenders(options: {
  exec: ExecFileAsync;
  processes: ProcessSource;
  timeoutMs: number;
  platform?: NodeJS.Platform;
}): KeySender[] {
  const platform = options.platform ?? process.platform;
  const senders: KeySender[] = [new TmuxSender(options.exec, options.processes, options.timeoutMs)];
  if (platform === 'darwin') senders.push(new AppleScriptSender(options.exec, options.timeoutMs));
  else if (platform === 'win32') senders.push(new SendKeysSender(options.exec, options.timeoutMs));
  else senders.push(new XdotoolSender(options.exec, options.timeoutMs));
  return senders;
}
