import { useState, type FormEvent } from 'react';
import type { ClaudeStatusEvent, InputAction } from '@bmad-dashboard/shared';
import type { ApiClient } from '../api/client';
import type { Dashboard } from '../hooks/useDashboard';
import { CLAUDE_STATUS_DISPLAY } from '../constants/statusDisplay';
import { RelativeTime } from './RelativeTime';
import { StatusBadge } from './StatusBadge';

interface ClaudePanelProps {
  claude: ClaudeStatusEvent | null;
  api: ApiClient;
  run: Dashboard['run'];
}

const KEY_ACTIONS: { action: Exclude<InputAction, 'send'>; label: string }[] = [
  { action: 'enter', label: 'Enter' },
  { action: 'escape', label: 'Esc' },
  { action: 'interrupt', label: 'Ctrl+C' },
];

export function ClaudePanel({ claude, api, run }: ClaudePanelProps) {
  const [text, setText] = useState('');
  const [dangerous, setDangerous] = useState(false);
  const [busy, setBusy] = useState(false);

  const perform = async <T,>(call: () => Promise<T>): Promise<T> => {
    setBusy(true);
    try {
      return await call();
    } finally {
      setBusy(false);
    }
  };

  const launch = () => {
    perform(() => run(api.launchClaude(dangerous))).then((result) => {
      if (result) console.log(`[claude] ${result.message}`);
    }).catch((err: unknown) => console.warn('[claude] Launch failed:', err));
  };

  const onSubmit = (e: FormEvent) => {
    e.preventDefault();
    const message = text;
    perform(() => run(api.sendInput('send', message))).then((result) => {
      if (result) setText('');
    }).catch((err: unknown) => console.warn('[claude] Send failed:', err));
  };

  const press = (action: Exclude<InputAction, 'send'>) => {
    perform(() => run(api.sendInput(action))).catch((err: unknown) => console.warn('[claude] Key failed:', err));
  };

  if (!claude) return <section className="view"><p className="empty">Checking for Claude…</p></section>;

  const running = claude.status === 'running';

  return (
    <section className="view claude-panel">
      <div className="view-header">
        <h2>Claude</h2>
        <StatusBadge display={CLAUDE_STATUS_DISPLAY[claude.status]} />
      </div>

      <dl className="claude-facts">
        {claude.pid !== null && (
          <>
            <dt>PID</dt>
            <dd>{claude.pid}</dd>
          </>
        )}
        {claude.cwd && (
          <>
            <dt>Directory</dt>
            <dd>{claude.cwd}</dd>
          </>
        )}
        {claude.windowTitle && (
          <>
            <dt>Window</dt>
            <dd>{claude.windowTitle}</dd>
          </>
        )}
        {claude.matchType !== 'none' && (
          <>
            <dt>Match</dt>
            <dd>{claude.matchType === 'project' ? 'this project' : 'another directory'}</dd>
          </>
        )}
        {claude.detectedBy && (
          <>
            <dt>Seen by</dt>
            <dd>{claude.detectedBy}</dd>
          </>
        )}
        {claude.startedAt && (
          <>
            <dt>Started</dt>
            <dd>
              <RelativeTime iso={claude.startedAt} />
            </dd>
          </>
        )}
      </dl>
      {claude.errorMessage && <div className="warning">{claude.errorMessage}</div>}

      {!running && claude.status !== 'starting' && (
        <div className="launch">
          <label className="checkbox">
            <input type="checkbox" checked={dangerous} onChange={(e) => setDangerous(e.target.checked)} />
            Skip permission prompts
          </label>
          <button className="btn" disabled={busy} onClick={launch}>
            Launch Claude
          </button>
        </div>
      )}

      <form className="send-form" onSubmit={onSubmit}>
        <textarea
          className="input"
          rows={3}
          placeholder={running ? 'Type a message for Claude' : 'Claude is not running'}
          value={text}
          onChange={(e) => setText(e.target.value)}
          disabled={!running}
          aria-label="Message"
        />
        <div className="send-actions">
          <button className="btn" type="submit" disabled={!running || busy || text.trim() === ''}>
            Send
          </button>
          {KEY_ACTIONS.map(({ action, label }) => (
            <button key={action} className="btn btn-small" type="button" disabled={!running || busy} onClick={() => press(action)}>
              {label}
            </button>
          ))}
        </div>
      </form>
    </section>
  );
}
