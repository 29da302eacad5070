import { useEffect, useState } from 'react';
import type { Agent, AgentCommand } from '@bmad-dashboard/shared';
import type { ApiClient } from '../api/client';
import type { Dashboard } from '../hooks/useDashboard';

interface AgentsViewProps {
  api: ApiClient;
  run: Dashboard['run'];
  projectRoot: string | null;
}

export function AgentsView({ api, run, projectRoot }: AgentsViewProps) {
  const [agents, setAgents] = useState<Agent[] | null>(null);

  useEffect(() => {
    if (!projectRoot) return;
    let cancelled = false;
    run(api.agents())
      .then((list) => {
        if (!cancelled) setAgents(list ?? []);
      })
      .catch((err: unknown) => console.warn('[agents] Failed to load agents:', err));
    return () => {
      cancelled = true;
    };
  }, [api, run, projectRoot]);

  const invoke = (command: AgentCommand) => {
    run(api.sendInput('send', `*${command.name}`), `Sent *${command.name}`).catch((err: unknown) =>
      console.warn('[agents] Send failed:', err)
    );
  };

  if (!projectRoot) return <section className="view"><p className="empty">Open a project to see its agents.</p></section>;
  if (!agents) return <section className="view"><p className="empty">Loading agents…</p></section>;
  if (agents.length === 0) return <section className="view"><p className="empty">No agents installed.</p></section>;

  return (
    <section className="view agents-view">
      <h2>Agents</h2>
      <div className="agent-grid">
        {agents.map((agent) => (
          <div key={agent.id} className="agent-card">
            <div className="agent-header">
              <span className="agent-icon">{agent.icon}</span>
              <div>
                <div className="agent-name">{agent.name}</div>
                <div className="agent-title">{agent.title}</div>
              </div>
            </div>
            {agent.description && <p className="agent-description">{agent.description}</p>}
            <ul className="command-list">
              {agent.commands.map((command) => (
                <li key={command.name}>
                  <button className="command" title={command.description} onClick={() => invoke(command)}>
                    <span className="command-icon">{command.icon}</span>
                    <span className="command-label">{command.label}</span>
                    <code>*{command.name}</code>
                  </button>
                </li>
              ))}
            </ul>
          </div>
        ))}
      </div>
    </section>
  );
}
