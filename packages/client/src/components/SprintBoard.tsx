import {
  STORY_ACTIONS,
  STORY_STATUSES,
  buildWorkflowCommand,
  getNextActiveStory,
  isStoryStatus,
  type SprintStatus,
  type Story,
  type StoryStatus,
} from '@bmad-dashboard/shared';
import type { ApiClient } from '../api/client';
import type { Dashboard } from '../hooks/useDashboard';
import { STORY_STATUS_DISPLAY } from '../constants/statusDisplay';
import { StatusBadge } from './StatusBadge';

interface SprintBoardProps {
  sprint: SprintStatus | null;
  api: ApiClient;
  run: Dashboard['run'];
}

interface StoryRowProps {
  story: Story;
  active: boolean;
  onStatus: (story: Story, status: StoryStatus) => void;
  onAction: (story: Story, workflowId: string) => void;
}

function StoryRow({ story, active, onStatus, onAction }: StoryRowProps) {
  return (
    <li className={active ? 'story-row active' : 'story-row'}>
      <span className="story-id">{story.id}</span>
      <span className="story-name">{story.name}</span>
      <StatusBadge display={STORY_STATUS_DISPLAY[story.status]} />
      <select
        className="story-status-select"
        aria-label={`Status of story ${story.id}`}
        value={story.status}
        onChange={(e) => {
          const next = e.target.value;
          if (isStoryStatus(next) && next !== story.status) onStatus(story, next);
        }}
      >
        {STORY_STATUSES.map((status) => (
          <option key={status} value={status}>
            {STORY_STATUS_DISPLAY[status].label}
          </option>
        ))}
      </select>
      {STORY_ACTIONS[story.status].map((action) => (
        <button key={action.id} className="btn btn-small" onClick={() => onAction(story, action.id)}>
          {action.label}
        </button>
      ))}
    </li>
  );
}

export function SprintBoard({ sprint, api, run }: SprintBoardProps) {
  if (!sprint) return <section className="view"><p className="empty">Waiting for sprint status…</p></section>;

  const setStatus = (story: Story, status: StoryStatus) => {
    // the manifest change comes back as a sprint_update push
    run(api.updateStoryStatus(story.id, status)).then((result) => {
      if (result) console.log(`[sprint] ${result.message}`);
    }).catch((err: unknown) => console.warn('[sprint] Status update failed:', err));
  };

  const startAction = (story: Story, workflowId: string) => {
    const command = `${buildWorkflowCommand(workflowId)} ${story.id}`;
    run(api.sendInput('send', command), `Sent ${command}`).catch((err: unknown) =>
      console.warn('[sprint] Send failed:', err)
    );
  };

  if (!sprint.fileCreated) {
    return (
      <section className="view">
        <h2>Sprint</h2>
        <p className="empty">No sprint plan yet. Run sprint planning once the epics are written.</p>
      </section>
    );
  }

  const next = getNextActiveStory(sprint);
  const activeId = next.kind === 'story' ? next.story.id : null;

  return (
    <section className="view sprint-board">
      <div className="view-header">
        <h2>Sprint</h2>
        {next.kind === 'story' ? (
          <span className="active-story">
            Up next: {next.story.id} {next.story.name}
          </span>
        ) : (
          next.reason === 'all_done' && <span className="active-story">All stories done</span>
        )}
      </div>
      {sprint.parseError && (
        <div className="parse-error" role="alert">
          {sprint.parseError.file}: {sprint.parseError.message}. Showing the last good read.
        </div>
      )}
      {sprint.message && <p className="empty">{sprint.message}</p>}
      {sprint.epics.map((epic) => (
        <div key={epic.id} className="epic">
          <div className="epic-header">
            <h3>
              Epic {epic.number}: {epic.name}
            </h3>
            <span className="epic-status">{epic.status}</span>
            {epic.retrospective && <span className="epic-retro">Retro: {epic.retrospective}</span>}
          </div>
          <ul className="story-list">
            {epic.stories.map((story) => (
              <StoryRow
                key={story.key}
                story={story}
                active={story.id === activeId}
                onStatus={setStatus}
                onAction={startAction}
              />
            ))}
          </ul>
        </div>
      ))}
    </section>
  );
}
