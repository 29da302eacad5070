import type { StoryStatus } from './types';

const WORKFLOW_COMMAND_PREFIX = '/bmad:bmm:workflows:';

/** Slash command the assistant understands for a workflow id */
export function buildWorkflowCommand(workflowId: string): string {
  const id = workflowId.replace(/^\/+/, '').replace(/^bmad:bmm:workflows:/, '');
  return `${WORKFLOW_COMMAND_PREFIX}${id}`;
}

export interface StoryAction {
  id: string;
  label: string;
}

/** Workflows that move a story forward from its current status */
export const STORY_ACTIONS: Record<StoryStatus, StoryAction[]> = {
  backlog: [{ id: 'create-story', label: 'Create story' }],
  drafted: [
    { id: 'story-context', label: 'Build story context' },
    { id: 'dev-story', label: 'Implement' },
  ],
  'ready-for-dev': [
    { id: 'dev-story', label: 'Implement' },
    { id: 'code-review', label: 'Review' },
  ],
  'in-progress': [
    { id: 'story-done', label: 'Mark done' },
    { id: 'code-review', label: 'Review' },
  ],
  review: [{ id: 'story-done', label: 'Mark done' }],
  done: [],
};
