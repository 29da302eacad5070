import { normalizeStoryStatus } from '@bmad-dashboard/shared';
import type { Epic, Story, StoryStatus } from '@bmad-dashboard/shared';
import { asString, isRecord } from './yamlFile';

export const DEFAULT_STORY_LOCATION = 'md/sprint-artifacts';

const EPIC_KEY = /^epic-(\d+)$/;
const RETROSPECTIVE_KEY = /^epic-(\d+)-retrospective$/;
const STORY_KEY = /^(\d+)-(\d+)(?:-(.+))?$/;

export interface SprintManifest {
  project: string;
  epics: Epic[];
  /** Directory holding story files, relative to the project root */
  storyLocation: string;
  message?: string;
}

function titleCase(slug: string): string {
  return slug
    .split(/[-\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function storyLocationOf(data: Record<string, unknown> | null): string {
  return asString(data?.story_location) || DEFAULT_STORY_LOCATION;
}

export function hasDevelopmentStatus(data: Record<string, unknown> | null): boolean {
  const status = data?.development_status;
  return isRecord(status) && Object.keys(status).length > 0;
}

/**
 * Convert a parsed `sprint-status.yaml` document into epics and stories.
 *
 * `storyFileStatuses` holds the recognized `Status:` value of each story
 * file keyed by story id ("6-1"); a story file is more current than the
 * manifest, so its status wins.
 */
export function parseSprintManifest(
  data: Record<string, unknown> | null,
  storyFileStatuses: ReadonlyMap<string, StoryStatus> = new Map()
): SprintManifest {
  const project = asString(data?.project, 'Unknown Project');
  const storyLocation = storyLocationOf(data);
  const devStatus = data?.development_status;

  if (!isRecord(devStatus) || Object.keys(devStatus).length === 0) {
    return {
      project,
      epics: [],
      storyLocation,
      message: 'Sprint file exists but has no development_status yet',
    };
  }

  const epics = new Map<number, Epic>();
  for (const [key, value] of Object.entries(devStatus)) {
    const match = EPIC_KEY.exec(key);
    if (!match) continue;
    const number = Number(match[1]);
    epics.set(number, {
      id: key,
      number,
      name: `Epic ${number}`,
      status: asString(value, 'backlog'),
      retrospective: null,
      stories: [],
    });
  }

  for (const [key, value] of Object.entries(devStatus)) {
    const retro = RETROSPECTIVE_KEY.exec(key);
    if (retro) {
      const epic = epics.get(Number(retro[1]));
      if (epic) epic.retrospective = asString(value) || null;
      continue;
    }

    const match = STORY_KEY.exec(key);
    if (!match) continue;
    const epic = epics.get(Number(match[1]));
    if (!epic) continue;

    const id = `${match[1]}-${match[2]}`;
    const story: Story = {
      id,
      key,
      name: match[3] ? titleCase(match[3]) : key,
      status: normalizeStoryStatus(storyFileStatuses.get(id) ?? value),
    };
    epic.stories.push(story);
  }

  return {
    project,
    epics: [...epics.values()].sort((a, b) => a.number - b.number),
    storyLocation,
  };
}
