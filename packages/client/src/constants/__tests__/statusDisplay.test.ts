import { describe, it, expect } from 'vitest';
import { STORY_STATUSES } from '@bmad-dashboard/shared';
import { CONNECTION_DISPLAY, STORY_STATUS_DISPLAY, progressPercent } from '../statusDisplay';

describe('STORY_STATUS_DISPLAY', () => {
  it('has a distinct label for every story status', () => {
    const labels = STORY_STATUSES.map((status) => STORY_STATUS_DISPLAY[status].label);
    expect(new Set(labels).size).toBe(STORY_STATUSES.length);
  });

  it('uses hex colors', () => {
    for (const display of Object.values(STORY_STATUS_DISPLAY)) {
      expect(display.color).toMatch(/^#[0-9A-Fa-f]{6}$/);
    }
  });
});

describe('CONNECTION_DISPLAY', () => {
  it('labels the live and failed states', () => {
    expect(CONNECTION_DISPLAY.connected.label).toBe('Live');
    expect(CONNECTION_DISPLAY.failed.label).toBe('Disconnected');
  });
});

describe('progressPercent', () => {
  it('rounds to whole percent', () => {
    expect(progressPercent(1, 3)).toBe(33);
    expect(progressPercent(2, 3)).toBe(67);
    expect(progressPercent(4, 4)).toBe(100);
  });

  it('is zero for an empty phase', () => {
    expect(progressPercent(0, 0)).toBe(0);
  });
});
