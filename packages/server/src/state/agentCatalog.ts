import { readdir, readFile, stat } from 'fs/promises';
import path from 'path';
import type { Agent } from '@bmad-dashboard/shared';
import { parseAgentFile } from '../parsers/agentParser';
import { errorMessage, isNodeError } from '../utils';

export const AGENTS_DIR = path.join('.bmad', 'bmm', 'agents');

interface CachedAgent {
  mtimeMs: number;
  agent: Agent;
}

/**
 * Agent definitions of one project. Entries are cached for the life of
 * the session and re-parsed only when a file's mtime changes.
 */
export class AgentCatalog {
  private cache = new Map<string, CachedAgent>();
  private readonly dir: string;

  constructor(projectRoot: string) {
    this.dir = path.join(projectRoot, AGENTS_DIR);
  }

  async list(): Promise<Agent[]> {
    let names: string[];
    try {
      names = (await readdir(this.dir)).filter((name) => name.endsWith('.md')).sort();
    } catch (err) {
      if (!isNodeError(err) || err.code !== 'ENOENT') {
        console.warn(`[parser] Failed to list agents in ${this.dir}:`, errorMessage(err));
      }
      return [];
    }

    const agents: Agent[] = [];
    for (const name of names) {
      const agent = await this.load(name.slice(0, -'.md'.length));
      if (agent) agents.push(agent);
    }
    return agents;
  }

  async get(id: string): Promise<Agent | null> {
    if (!/^[\w.-]+$/.test(id) || id.startsWith('.')) return null;
    return this.load(id);
  }

  private async load(id: string): Promise<Agent | null> {
    const filePath = path.join(this.dir, `${id}.md`);
    try {
      const { mtimeMs } = await stat(filePath);
      const cached = this.cache.get(id);
      if (cached && cached.mtimeMs === mtimeMs) return cached.agent;

      const agent = parseAgentFile(id, await readFile(filePath, 'utf-8'));
      this.cache.set(id, { mtimeMs, agent });
      return agent;
    } catch (err) {
      this.cache.delete(id);
      if (!isNodeError(err) || err.code !== 'ENOENT') {
        console.warn(`[parser] Failed to read agent ${id}:`, errorMessage(err));
      }
      return null;
    }
  }
}
