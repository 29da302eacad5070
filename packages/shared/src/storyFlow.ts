import type { StoryStatus } from './types';

export const STORY_STATUSES: readonly StoryStatus[] = [
  'backlog',
  'drafted',
  'ready-for-dev',
  'in-progress',
  'review',
  'done',
];

/** Position in the forward flow; in-progress and review share a rank */
const STORY_RANK: Record<StoryStatus, number> = {
  backlog: 0,
  drafted: 1,
  'ready-for-dev': 2,
  'in-progress': 3,
  review: 3,
  done: 4,
};

const STORY_ALIASES: Record<string, StoryStatus> = {
  todo: 'backlog',
  draft: 'drafted',
  ready: 'ready-for-dev',
  'in-development': 'in-progress',
  'in-review': 'review',
  completed: 'done',
  complete: 'done',
};

export function isStoryStatus(value: unknown): value is StoryStatus {
  return STORY_STATUSES.some((status) => status === value);
}

export function storyRank(status: StoryStatus): number {
  return STORY_RANK[status];
}

/** True when moving from `from` to `to` goes backward in the flow */
export function isBackwardTransition(from: StoryStatus, to: StoryStatus): boolean {
  return STORY_RANK[to] < STORY_RANK[from];
}

/** A raw manifest or story-file status on the story flow; null when it names no known status */
export function parseStoryStatus(raw: unknown): StoryStatus | null {
  if (typeof raw !== 'string') return null;
  const value = raw.trim().toLowerCase().replace(/[_\s]+/g, '-').replace(/^[*:]+|[*:.]+$/g, '');
  if (isStoryStatus(value)) return value;
  return STORY_ALIASES[value] ?? null;
}

/**
 * Map a raw manifest or story-file status onto the story flow.
 * Unknown values fall back to backlog.
 */
export function normalizeStoryStatus(raw: unknown): StoryStatus {
  return parseStoryStatus(raw) ?? 'backlog';
}
