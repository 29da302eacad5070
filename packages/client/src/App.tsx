import { useCallback, useEffect, useMemo, type ReactNode } from 'react';
import type { ProjectSummary } from '@bmad-dashboard/shared';
import { ApiClient, eventStreamUrl } from './api/client';
import { AgentsView } from './components/AgentsView';
import { ClaudePanel } from './components/ClaudePanel';
import { ConnectionBanner } from './components/ConnectionBanner';
import { NoticeList } from './components/NoticeList';
import { ProjectPicker } from './components/ProjectPicker';
import { SprintBoard } from './components/SprintBoard';
import { WorkflowView } from './components/WorkflowView';
import { CONNECTION_DISPLAY } from './constants/statusDisplay';
import { useDashboard } from './hooks/useDashboard';
import { ROUTES, needsLiveUpdates, routeHref, useHashRoute, type Route } from './hooks/useHashRoute';
import type { ConnectionStatus } from './lib/eventStream';

const ROUTE_LABELS: Record<Route, string> = {
  projects: 'Projects',
  workflow: 'Workflow',
  sprint: 'Sprint',
  agents: 'Agents',
  claude: 'Claude',
};

function ConnectionDot({ status }: { status: ConnectionStatus }) {
  const { label } = CONNECTION_DISPLAY[status];
  return (
    <span className={`connection-dot ${status}`} title={label}>
      <span className="connection-dot-circle" />
      <span className="connection-dot-label">{label}</span>
    </span>
  );
}

function projectName(root: string | null): string {
  if (!root) return 'No project';
  return root.split(/[\\/]/).filter(Boolean).pop() ?? root;
}

interface AppProps {
  token?: string;
}

export default function App({ token }: AppProps) {
  const api = useMemo(() => new ApiClient({ token }), [token]);
  const eventsUrl = useMemo(() => eventStreamUrl(window.location, token), [token]);
  const [route, navigate] = useHashRoute();
  const live = needsLiveUpdates(route);
  const { state, dispatch, run, retryConnection } = useDashboard(api, eventsUrl, live);

  useEffect(() => {
    run(api.currentProject())
      .then((project) => {
        if (project) dispatch({ type: 'project_opened', root: project.path });
        else navigate('projects');
      })
      .catch((err: unknown) => console.warn('[app] Failed to load the current project:', err));
  }, [api, run, dispatch, navigate]);

  const onOpened = useCallback(
    (project: ProjectSummary) => {
      dispatch({ type: 'project_opened', root: project.path });
      navigate('workflow');
    },
    [dispatch, navigate]
  );

  const dismiss = useCallback((id: number) => dispatch({ type: 'dismiss', id }), [dispatch]);

  let view: ReactNode;
  switch (route) {
    case 'projects':
      view = <ProjectPicker api={api} run={run} currentPath={state.projectRoot} onOpened={onOpened} />;
      break;
    case 'workflow':
      view = <WorkflowView workflow={state.workflow} api={api} run={run} />;
      break;
    case 'sprint':
      view = <SprintBoard sprint={state.sprint} api={api} run={run} />;
      break;
    case 'agents':
      view = <AgentsView api={api} run={run} projectRoot={state.projectRoot} />;
      break;
    case 'claude':
      view = <ClaudePanel claude={state.claude} api={api} run={run} />;
      break;
  }

  return (
    <div className="app-wrapper">
      {live && <ConnectionBanner status={state.connection} onRetry={retryConnection} />}
      <header className="app-header">
        <div className="header-left">
          {live && <ConnectionDot status={state.connection} />}
          <span className="header-project-name" title={state.projectRoot ?? undefined}>
            {projectName(state.projectRoot)}
          </span>
        </div>
        <nav className="header-nav">
          {ROUTES.map((r) => (
            <a key={r} href={routeHref(r)} className={r === route ? 'nav-link active' : 'nav-link'}>
              {ROUTE_LABELS[r]}
            </a>
          ))}
        </nav>
      </header>
      <main className="app-main">
        {state.projectRoot === null && route !== 'projects' ? (
          <section className="view">
            <p className="empty">
              No project is open. <a href={routeHref('projects')}>Pick one</a>.
            </p>
          </section>
        ) : (
          view
        )}
      </main>
      <NoticeList notices={state.notices} onDismiss={dismiss} />
    </div>
  );
}
