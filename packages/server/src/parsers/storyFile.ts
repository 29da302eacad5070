import { readdir, readFile } from 'fs/promises';
import path from 'path';
import { parseStoryStatus } from '@bmad-dashboard/shared';
import type { StoryStatus } from '@bmad-dashboard/shared';
import { errorMessage, isNodeError } from '../utils';
import { isDirectory } from './projectConfig';

/** "Status: done", "**Status:** done" or "- **Status**: done" at the start of a line */
const STATUS_LINE = /^([ \t>#-]*\*{0,2}Status\*{0,2}:\*{0,2}[ \t]+\**)([^\s*]+)/gim;
const STORY_FILE = /^(\d+-\d+)-.+\.md$/;

interface StatusLine {
  status: StoryStatus;
  /** Offsets of the raw value within the content */
  start: number;
  end: number;
}

/** The first status line whose value names a known status */
function findStatusLine(content: string): StatusLine | null {
  const pattern = new RegExp(STATUS_LINE);
  for (let match = pattern.exec(content); match; match = pattern.exec(content)) {
    const status = parseStoryStatus(match[2]);
    if (status) {
      const start = match.index + match[1].length;
      return { status, start, end: start + match[2].length };
    }
  }
  return null;
}

export function extractStoryStatus(content: string): StoryStatus | null {
  return findStatusLine(content)?.status ?? null;
}

/** Replace the status value; null when the file has no recognizable status line */
export function rewriteStoryStatus(content: string, status: StoryStatus): string | null {
  const line = findStatusLine(content);
  if (!line) return null;
  return content.slice(0, line.start) + status + content.slice(line.end);
}

/**
 * Manifests spell the story directory both as sprint_artifacts and
 * sprint-artifacts; whichever exists is used.
 */
export async function resolveStoryDir(projectRoot: string, location: string): Promise<string | null> {
  const normalized = location.replace(/\\/g, '/');
  const alternate = normalized.includes('_') ? normalized.replace(/_/g, '-') : normalized.replace(/-/g, '_');
  for (const candidate of [normalized, alternate]) {
    const dir = path.resolve(projectRoot, candidate);
    if (await isDirectory(dir)) return dir;
  }
  return null;
}

async function listStoryFiles(dir: string): Promise<string[]> {
  try {
    const names = await readdir(dir);
    return names.filter((name) => STORY_FILE.test(name)).sort();
  } catch (err) {
    if (!isNodeError(err) || err.code !== 'ENOENT') {
      console.warn(`[parser] Failed to list story files in ${dir}:`, errorMessage(err));
    }
    return [];
  }
}

/** Status line of every story file in `dir`, keyed by story id */
export async function readStoryFileStatuses(dir: string): Promise<Map<string, StoryStatus>> {
  const statuses = new Map<string, StoryStatus>();
  for (const name of await listStoryFiles(dir)) {
    const match = STORY_FILE.exec(name);
    if (!match || statuses.has(match[1])) continue;
    try {
      const status = extractStoryStatus(await readFile(path.join(dir, name), 'utf-8'));
      if (status) statuses.set(match[1], status);
    } catch (err) {
      console.warn(`[parser] Failed to read story file ${name}:`, errorMessage(err));
    }
  }
  return statuses;
}

export async function findStoryFile(dir: string, storyId: string): Promise<string | null> {
  const name = (await listStoryFiles(dir)).find((file) => file.startsWith(`${storyId}-`));
  return name ? path.join(dir, name) : null;
}
