import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import type { RecentProject } from '@bmad-dashboard/shared';
import { isRecord } from '../parsers/yamlFile';
import { createSerialQueue, errorMessage, isNodeError } from '../utils';

export const RECENT_PROJECTS_FILE = 'recent-projects.json';

function toRecentProject(value: unknown): RecentProject | null {
  if (!isRecord(value)) return null;
  const { path: projectPath, name, lastOpened } = value;
  if (typeof projectPath !== 'string' || !projectPath) return null;
  return {
    path: projectPath,
    name: typeof name === 'string' && name ? name : path.basename(projectPath),
    lastOpened: typeof lastOpened === 'string' ? lastOpened : new Date(0).toISOString(),
  };
}

/**
 * Most-recently-opened projects, persisted as JSON in the data directory.
 * Every read-modify-write goes through one serial queue.
 */
export class RecentProjectsStore {
  private readonly filePath: string;
  private readonly queue = createSerialQueue();

  constructor(
    private readonly dataDir: string,
    private readonly maxEntries = 10
  ) {
    this.filePath = path.join(dataDir, RECENT_PROJECTS_FILE);
  }

  list(): Promise<RecentProject[]> {
    return this.queue.run(() => this.load());
  }

  /** Put a project at the front, replacing any entry with the same path */
  touch(projectPath: string, name: string, at: Date = new Date()): Promise<RecentProject[]> {
    return this.queue.run(async () => {
      const entries = (await this.load()).filter((entry) => entry.path !== projectPath);
      entries.unshift({ path: projectPath, name, lastOpened: at.toISOString() });
      const kept = entries.slice(0, this.maxEntries);
      await this.save(kept);
      return kept;
    });
  }

  /** Idempotent; resolves false when there was nothing to remove */
  remove(projectPath: string): Promise<boolean> {
    return this.queue.run(async () => {
      const entries = await this.load();
      const kept = entries.filter((entry) => entry.path !== projectPath);
      if (kept.length === entries.length) return false;
      await this.save(kept);
      return true;
    });
  }

  private async load(): Promise<RecentProject[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw err;
    }
    try {
      const data: unknown = JSON.parse(raw);
      const list = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.projects) ? data.projects : [];
      return list.map(toRecentProject).filter((entry): entry is RecentProject => entry !== null);
    } catch (err) {
      console.warn(`[recent] Ignoring corrupt ${this.filePath}:`, errorMessage(err));
      return [];
    }
  }

  private async save(entries: RecentProject[]): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(entries, null, 2) + '\n', 'utf-8');
    await rename(tmp, this.filePath);
  }
}
