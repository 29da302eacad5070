import { describe, it, expect } from 'vitest';
import { getNextActiveStory } from '../activeStory';
import type { Epic, SprintStatus, Story } from '../types';

function makeStory(id: string, status: Story['status']): Story {
  return { id, key: `${id}-some-story`, name: 'Some Story', status };
}

function makeEpic(number: number, stories: Story[], overrides?: Partial<Epic>): Epic {
  return {
    id: `epic-${number}`,
    number,
    name: `Epic ${number}`,
    status: 'in-progress',
    retrospective: null,
    stories,
    ...overrides,
  };
}

function makeSprint(epics: Epic[], overrides?: Partial<SprintStatus>): SprintStatus {
  return {
    fileCreated: true,
    project: 'demo',
    epics,
    generatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('getNextActiveStory', () => {
  it('returns the first story that is not done', () => {
    const sprint = makeSprint([makeEpic(1, [makeStory('1-1', 'done'), makeStory('1-2', 'in-progress')])]);

    const result = getNextActiveStory(sprint);

    expect(result).toEqual({
      kind: 'story',
      story: makeStory('1-2', 'in-progress'),
      epic: { id: 'epic-1', number: 1, name: 'Epic 1' },
    });
  });

  it('moves on to the next epic when one is finished', () => {
    const sprint = makeSprint([
      makeEpic(1, [makeStory('1-1', 'done')]),
      makeEpic(2, [makeStory('2-1', 'backlog')]),
    ]);

    const result = getNextActiveStory(sprint);

    expect(result.kind).toBe('story');
    if (result.kind === 'story') expect(result.story.id).toBe('2-1');
  });

  it('reports all_done when every story is done', () => {
    const sprint = makeSprint([makeEpic(1, [makeStory('1-1', 'done')])]);
    expect(getNextActiveStory(sprint)).toEqual({ kind: 'empty', reason: 'all_done' });
  });

  it('reports no_sprint without a manifest', () => {
    expect(getNextActiveStory(null)).toEqual({ kind: 'empty', reason: 'no_sprint' });
    expect(getNextActiveStory(makeSprint([], { fileCreated: false }))).toEqual({ kind: 'empty', reason: 'no_sprint' });
  });

  it('distinguishes an empty manifest from one without epics', () => {
    const empty = makeSprint([], { message: 'Sprint file exists but has no development_status yet' });
    expect(getNextActiveStory(empty)).toEqual({ kind: 'empty', reason: 'file_created' });
    expect(getNextActiveStory(makeSprint([]))).toEqual({ kind: 'empty', reason: 'no_epics' });
  });

  it('reports no_stories when epics have none', () => {
    expect(getNextActiveStory(makeSprint([makeEpic(1, [])]))).toEqual({ kind: 'empty', reason: 'no_stories' });
  });
});
