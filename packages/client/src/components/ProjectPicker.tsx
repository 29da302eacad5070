import { useCallback, useEffect, useState, type FormEvent } from 'react';
import type { ProjectSummary, RecentProject } from '@bmad-dashboard/shared';
import type { ApiClient } from '../api/client';
import type { Dashboard } from '../hooks/useDashboard';
import { RelativeTime } from './RelativeTime';

interface ProjectPickerProps {
  api: ApiClient;
  run: Dashboard['run'];
  currentPath: string | null;
  onOpened: (project: ProjectSummary) => void;
}

export function ProjectPicker({ api, run, currentPath, onOpened }: ProjectPickerProps) {
  const [recent, setRecent] = useState<RecentProject[]>([]);
  const [path, setPath] = useState('');
  const [creating, setCreating] = useState(false);
  const [userName, setUserName] = useState('');
  const [outputFolder, setOutputFolder] = useState('docs');
  const [busy, setBusy] = useState(false);

  const loadRecent = useCallback(async () => {
    const projects = await run(api.recentProjects());
    if (projects) setRecent(projects);
  }, [api, run]);

  useEffect(() => {
    loadRecent().catch((err: unknown) => console.warn('[projects] Failed to load recent projects:', err));
  }, [loadRecent]);

  const open = async (target: string) => {
    setBusy(true);
    try {
      const project = await run(api.openProject(target.trim()));
      if (project) onOpened(project);
    } finally {
      setBusy(false);
    }
  };

  const create = async () => {
    setBusy(true);
    try {
      const project = await run(
        api.createProject({ path: path.trim(), config: { user_name: userName.trim(), output_folder: outputFolder.trim() || 'docs' } }),
        'Project created'
      );
      if (project) onOpened(project);
    } finally {
      setBusy(false);
    }
  };

  const remove = async (target: string) => {
    const result = await run(api.removeRecentProject(target));
    if (result) setRecent((prev) => prev.filter((p) => p.path !== target));
  };

  const onSubmit = (e: FormEvent) => {
    e.preventDefault();
    (creating ? create() : open(path)).catch((err: unknown) => console.warn('[projects] Request failed:', err));
  };

  return (
    <section className="view project-picker">
      <h2>Projects</h2>
      <form className="project-form" onSubmit={onSubmit}>
        <input
          className="input"
          placeholder="/absolute/path/to/project"
          value={path}
          onChange={(e) => setPath(e.target.value)}
          aria-label="Project path"
        />
        {creating && (
          <>
            <input
              className="input"
              placeholder="Your name"
              value={userName}
              onChange={(e) => setUserName(e.target.value)}
              aria-label="User name"
            />
            <input
              className="input"
              placeholder="Output folder"
              value={outputFolder}
              onChange={(e) => setOutputFolder(e.target.value)}
              aria-label="Output folder"
            />
          </>
        )}
        <button className="btn" type="submit" disabled={busy || path.trim() === ''}>
          {creating ? 'Create project' : 'Open'}
        </button>
        <button className="btn btn-link" type="button" onClick={() => setCreating((c) => !c)}>
          {creating ? 'Open an existing project instead' : 'New project…'}
        </button>
      </form>

      <h3>Recent</h3>
      {recent.length === 0 ? (
        <p className="empty">No recent projects</p>
      ) : (
        <ul className="recent-list">
          {recent.map((project) => (
            <li key={project.path} className={project.path === currentPath ? 'recent-item current' : 'recent-item'}>
              <button className="recent-open" disabled={busy} onClick={() => open(project.path).catch((err: unknown) => console.warn('[projects] Open failed:', err))}>
                <span className="recent-name">{project.name}</span>
                <span className="recent-path">{project.path}</span>
              </button>
              <RelativeTime iso={project.lastOpened} className="recent-time" />
              <button className="btn btn-small btn-link" aria-label={`Forget ${project.name}`} onClick={() => remove(project.path).catch((err: unknown) => console.warn('[projects] Remove failed:', err))}>
                Forget
              </button>
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
