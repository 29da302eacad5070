import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import * as yaml from 'js-yaml';
import type { ErrorCode, ProjectSummary } from '@bmad-dashboard/shared';
import { BMAD_DIR, DEFAULT_OUTPUT_FOLDER, isBmadProject, isDirectory, projectNameOf, readProjectConfig } from '../parsers/projectConfig';
import { YamlCache, asString } from '../parsers/yamlFile';
import type { FileStateReader } from './fileStateReader';
import { ProjectSession, type ProjectSessionDeps } from './projectSession';
import type { RecentProjectsStore } from './recentProjects';
import { errorMessage } from '../utils';

export type SessionOutcome =
  | { ok: true; session: ProjectSession }
  | { ok: false; error: ErrorCode; message: string };

export interface CreateProjectInput {
  path: string;
  config: Record<string, unknown>;
  modules?: string[];
}

export const DEFAULT_MODULES = ['bmm', 'core'];

export interface SessionManagerDeps extends ProjectSessionDeps {
  recent: RecentProjectsStore;
}

export function summarize(session: ProjectSession): ProjectSummary {
  return { name: session.name, path: session.root, config: session.config };
}

/**
 * Holds the single active project session. Opening a project closes the
 * previous session, rebinds every subscriber and publishes the new
 * session's first snapshots.
 */
export class SessionManager {
  private active: ProjectSession | null = null;
  /** Sessionless id announced to subscribers before any project is open */
  readonly idleSessionId = 'none';

  constructor(private readonly deps: SessionManagerDeps) {}

  get current(): ProjectSession | null {
    return this.active;
  }

  get reader(): FileStateReader {
    return this.deps.reader;
  }

  async open(projectPath: string): Promise<SessionOutcome> {
    const root = path.resolve(projectPath);
    if (!(await isDirectory(root))) {
      return { ok: false, error: 'PROJECT_NOT_FOUND', message: `Directory not found: ${root}` };
    }
    if (!(await isBmadProject(root))) {
      return { ok: false, error: 'NOT_A_BMAD_PROJECT', message: `No ${BMAD_DIR}/ directory in ${root}` };
    }

    // read uncached so a config fixed on disk is picked up on reopen
    const configRead = await readProjectConfig(root, new YamlCache());
    if (configRead.state === 'failed') {
      return { ok: false, error: 'PARSE_ERROR', message: `Invalid project config: ${configRead.failure.message}` };
    }
    const config = configRead.state === 'ok' ? configRead.value : {};
    const name = projectNameOf(root, config);

    await this.close();
    const session = new ProjectSession(root, name, config, this.deps);
    this.active = session;
    console.log(`[server] Opened project ${name} (${root})`);

    this.deps.broadcaster.rebindAll(root, session.id);
    session.startWatching();
    await session.refresh();

    try {
      await this.deps.recent.touch(root, name);
    } catch (err) {
      console.warn(`[recent] Failed to record ${root}:`, errorMessage(err));
    }
    return { ok: true, session };
  }

  async create(input: CreateProjectInput): Promise<SessionOutcome> {
    const root = path.resolve(input.path);
    if (!(await isDirectory(root))) {
      return { ok: false, error: 'PROJECT_NOT_FOUND', message: `Directory not found: ${root}` };
    }
    if (await isBmadProject(root)) {
      return { ok: false, error: 'ALREADY_EXISTS', message: `${root} is already a BMAD project` };
    }

    const modules = input.modules && input.modules.length > 0 ? input.modules : DEFAULT_MODULES;
    const outputFolder = asString(input.config.output_folder).trim() || DEFAULT_OUTPUT_FOLDER;
    const config: Record<string, unknown> = {
      project_name: path.basename(root),
      ...input.config,
      output_folder: outputFolder,
    };

    try {
      for (const moduleName of new Set([...modules, 'bmm'])) {
        await mkdir(path.join(root, BMAD_DIR, moduleName), { recursive: true });
      }
      await writeFile(path.join(root, BMAD_DIR, 'bmm', 'config.yaml'), yaml.dump(config, { lineWidth: -1 }), 'utf-8');
      await mkdir(path.resolve(root, outputFolder.replace(/^\{project-root\}[\\/]?/, '')), { recursive: true });
    } catch (err) {
      return { ok: false, error: 'CREATE_FAILED', message: `Failed to create project: ${errorMessage(err)}` };
    }

    console.log(`[server] Created BMAD project in ${root} (modules: ${modules.join(', ')})`);
    return this.open(root);
  }

  async close(): Promise<void> {
    const session = this.active;
    this.active = null;
    if (!session) return;
    await session.close();
    console.log(`[server] Closed project ${session.name}`);
  }
}
