import type { ActiveStoryResult, SprintStatus } from './types';

/**
 * The story to work on next: the first story that is not done,
 * in epic order and then story order.
 */
export function getNextActiveStory(sprint: SprintStatus | null): ActiveStoryResult {
  if (!sprint || !sprint.fileCreated) return { kind: 'empty', reason: 'no_sprint' };
  if (sprint.epics.length === 0) {
    return { kind: 'empty', reason: sprint.message ? 'file_created' : 'no_epics' };
  }
  if (sprint.epics.every((epic) => epic.stories.length === 0)) {
    return { kind: 'empty', reason: 'no_stories' };
  }

  for (const epic of sprint.epics) {
    const story = epic.stories.find((s) => s.status !== 'done');
    if (story) {
      return { kind: 'story', story, epic: { id: epic.id, number: epic.number, name: epic.name } };
    }
  }
  return { kind: 'empty', reason: 'all_done' };
}
