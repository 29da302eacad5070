import { spawn } from 'child_process';

export const CLAUDE_COMMAND = 'claude';
export const DANGEROUS_FLAG = '--dangerously-skip-permissions';

/** Starts a detached process; resolves once it has spawned */
export type SpawnDetached = (command: string, args: string[], cwd: string) => Promise<void>;

export const spawnDetached: SpawnDetached = (command, args, cwd) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { cwd, detached: true, stdio: 'ignore', windowsHide: false });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });

const LINUX_TERMINALS: ReadonlyArray<{ command: string; args: (script: string) => string[] }> = [
  { command: 'gnome-terminal', args: (script) => ['--', 'bash', '-c', script] },
  { command: 'konsole', args: (script) => ['-e', 'bash', '-c', script] },
  { command: 'xterm', args: (script) => ['-e', 'bash', '-c', script] },
];

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function claudeCommandLine(dangerousMode: boolean): string {
  return dangerousMode ? `${CLAUDE_COMMAND} ${DANGEROUS_FLAG}` : CLAUDE_COMMAND;
}

/**
 * Opens a new terminal in the project directory running the assistant.
 * Rejects when no terminal could be started.
 */
export async function launchClaude(
  projectPath: string,
  dangerousMode: boolean,
  options: { spawn?: SpawnDetached; platform?: NodeJS.Platform } = {}
): Promise<string> {
  const run = options.spawn ?? spawnDetached;
  const platform = options.platform ?? process.platform;
  const command = claudeCommandLine(dangerousMode);

  if (platform === 'darwin') {
    const script = `cd ${shellQuote(projectPath)} && ${command}`;
    await run(
      'osascript',
      ['-e', `tell application "Terminal" to do script ${appleScriptString(script)}`, '-e', 'tell application "Terminal" to activate'],
      projectPath
    );
    return 'Terminal';
  }

  if (platform === 'win32') {
    await run('cmd', ['/c', 'start', '""', 'cmd', '/k', command], projectPath);
    return 'cmd';
  }

  const script = `cd ${shellQuote(projectPath)} && ${command}; exec bash`;
  const failures: string[] = [];
  for (const terminal of LINUX_TERMINALS) {
    try {
      await run(terminal.command, terminal.args(script), projectPath);
      return terminal.command;
    } catch (err) {
      failures.push(`${terminal.command}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  throw new Error(`No terminal emulator could be started (${failures.join('; ')})`);
}
