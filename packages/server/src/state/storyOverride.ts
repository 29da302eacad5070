import { readFile, unlink, writeFile } from 'fs/promises';
import path from 'path';
import * as yaml from 'js-yaml';
import type { ErrorCode, StoryFileSync, StoryOverrideResult, StoryStatus } from '@bmad-dashboard/shared';
import { isRecord } from '../parsers/yamlFile';
import { storyLocationOf } from '../parsers/sprintParser';
import { findStoryFile, rewriteStoryStatus, resolveStoryDir } from '../parsers/storyFile';
import type { FileStateReader } from './fileStateReader';
import { createSerialQueue, errorMessage, type SerialQueue } from '../utils';

export type OverrideOutcome =
  | { ok: true; result: StoryOverrideResult }
  | { ok: false; error: ErrorCode; message: string };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** The development_status key for a story id: the id itself or "<id>-<slug>" */
export function findStoryKey(devStatus: Record<string, unknown>, storyId: string): string | null {
  if (storyId in devStatus) return storyId;
  return Object.keys(devStatus).find((key) => key.startsWith(`${storyId}-`)) ?? null;
}

/**
 * Rewrite one `key: value` line in place, keeping comments and layout.
 * Null when the key has no line of its own.
 */
export function rewriteManifestEntry(text: string, key: string, status: StoryStatus): string | null {
  const line = new RegExp(`^(\\s+["']?${escapeRegExp(key)}["']?\\s*:[ \\t]*)([^#\\r\\n]*?)([ \\t]*(?:#.*)?)$`, 'm');
  if (!line.test(text)) return null;
  return text.replace(line, (_all, prefix: string, _value: string, rest: string) => `${prefix}${status}${rest}`);
}

async function syncStoryFile(storyFile: string | null, status: StoryStatus): Promise<StoryFileSync> {
  if (!storyFile) return 'missing';
  if (status === 'backlog') {
    await unlink(storyFile);
    return 'deleted';
  }

  const content = await readFile(storyFile, 'utf-8');
  const rewritten = rewriteStoryStatus(content, status);
  if (rewritten === null || rewritten === content) return 'unchanged';
  await writeFile(storyFile, rewritten, 'utf-8');
  return 'updated';
}

const SYNC_MESSAGES: Record<StoryFileSync, string> = {
  updated: 'story file updated',
  deleted: 'story file deleted',
  unchanged: 'story file left unchanged',
  missing: 'no story file',
};

/**
 * Manual story status changes. Writes to the sprint manifest of every
 * project go through one queue, so concurrent overrides never interleave
 * their read-modify-write.
 */
export class StoryOverrideWriter {
  constructor(
    private readonly reader: FileStateReader,
    private readonly queue: SerialQueue = createSerialQueue()
  ) {}

  apply(projectRoot: string, storyId: string, status: StoryStatus): Promise<OverrideOutcome> {
    return this.queue.run(() => this.write(projectRoot, storyId, status));
  }

  private async write(projectRoot: string, storyId: string, status: StoryStatus): Promise<OverrideOutcome> {
    const manifestPath = await this.reader.locateSprintManifest(projectRoot);
    if (!manifestPath) {
      return { ok: false, error: 'FILE_NOT_FOUND', message: 'No sprint-status.yaml in this project' };
    }

    let text: string;
    let data: unknown;
    try {
      text = await readFile(manifestPath, 'utf-8');
      data = yaml.load(text);
    } catch (err) {
      return { ok: false, error: 'PARSE_ERROR', message: `Could not read sprint manifest: ${errorMessage(err)}` };
    }

    const devStatus = isRecord(data) ? data.development_status : undefined;
    const key = isRecord(devStatus) ? findStoryKey(devStatus, storyId) : null;
    if (!isRecord(data) || !isRecord(devStatus) || !key) {
      return { ok: false, error: 'NOT_FOUND', message: `Story ${storyId} not found in sprint manifest` };
    }

    let storyFile: StoryFileSync;
    try {
      let updated = rewriteManifestEntry(text, key, status);
      if (updated === null) {
        devStatus[key] = status;
        updated = yaml.dump(data, { lineWidth: -1, noRefs: true });
      }
      await writeFile(manifestPath, updated, 'utf-8');

      const storyDir = await resolveStoryDir(projectRoot, storyLocationOf(data));
      storyFile = await syncStoryFile(storyDir ? await findStoryFile(storyDir, storyId) : null, status);
    } catch (err) {
      return { ok: false, error: 'SAVE_ERROR', message: `Failed to save story status: ${errorMessage(err)}` };
    }

    console.log(`[gateway] Story ${storyId} set to ${status} in ${path.basename(manifestPath)} (${SYNC_MESSAGES[storyFile]})`);
    return {
      ok: true,
      result: {
        storyId,
        status,
        storyFile,
        message: `Story ${storyId} set to ${status}; ${SYNC_MESSAGES[storyFile]}`,
      },
    };
  }
}
