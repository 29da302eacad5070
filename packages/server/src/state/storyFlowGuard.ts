import { storyRank } from '@bmad-dashboard/shared';
import type { SprintStatus, StoryStatus } from '@bmad-dashboard/shared';

export interface StoryFlowResult {
  sprint: SprintStatus;
  /** Stories whose recorded override the files now match */
  settledOverrides: string[];
  /** Stories held at their previous status, as "id: read → kept" */
  held: string[];
}

/**
 * Keep stories from moving backwards between reads.
 *
 * A recorded manual override is published as is until a read returns
 * exactly that status, at which point it is settled. Without an override
 * a fresh read ranked below the previously published status keeps the
 * published one.
 */
export function applyStoryFlow(
  previous: SprintStatus | null,
  next: SprintStatus,
  overrides: ReadonlyMap<string, StoryStatus>
): StoryFlowResult {
  const published = new Map<string, StoryStatus>();
  for (const epic of previous?.epics ?? []) {
    for (const story of epic.stories) published.set(story.id, story.status);
  }

  const settledOverrides: string[] = [];
  const held: string[] = [];
  const epics = next.epics.map((epic) => ({
    ...epic,
    stories: epic.stories.map((story) => {
      const override = overrides.get(story.id);
      if (override !== undefined) {
        if (story.status === override) {
          settledOverrides.push(story.id);
          return story;
        }
        held.push(`${story.id}: ${story.status} → ${override} (override)`);
        return { ...story, status: override };
      }

      const baseline = published.get(story.id);
      if (baseline === undefined || storyRank(story.status) >= storyRank(baseline)) return story;
      held.push(`${story.id}: ${story.status} → ${baseline}`);
      return { ...story, status: baseline };
    }),
  }));

  return { sprint: { ...next, epics }, settledOverrides, held };
}
