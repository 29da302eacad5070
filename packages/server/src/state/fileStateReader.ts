import { stat } from 'fs/promises';
import path from 'path';
import type { ImplementationFlow, SprintStatus, StoryStatus, TrackMode, WorkflowStatus } from '@bmad-dashboard/shared';
import {
  YamlCache,
  isRecord,
  type FileRead,
  type ReadFailure,
} from '../parsers/yamlFile';
import { WORKFLOW_ARTIFACTS, parseWorkflowManifest } from '../parsers/workflowParser';
import { hasDevelopmentStatus, parseSprintManifest, storyLocationOf } from '../parsers/sprintParser';
import { findStoryFile, readStoryFileStatuses, resolveStoryDir } from '../parsers/storyFile';
import { buildImplementationFlow } from '../parsers/implementationFlow';
import { outputFolderOf, projectNameOf, readProjectConfig } from '../parsers/projectConfig';
import { errorMessage } from '../utils';

export const WORKFLOW_MANIFEST = 'bmm-workflow-status.yaml';
export const SPRINT_MANIFEST = 'sprint-status.yaml';

export type ReadOutcome<T> = { ok: true; value: T } | { ok: false; failure: ReadFailure };

interface LocatedManifest {
  /** Absolute path */
  file: string;
  /** Path relative to the project root, forward slashes */
  relative: string;
  read: FileRead<unknown>;
}

function unique(values: string[]): string[] {
  return [...new Set(values.map((v) => path.posix.normalize(v)))];
}

function toRelative(projectRoot: string, file: string): string {
  return path.relative(projectRoot, file).split(path.sep).join('/');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export function emptyWorkflowStatus(project: string, fileCreated: boolean): WorkflowStatus {
  return {
    fileCreated,
    project,
    track: '',
    trackMode: 'standard',
    phases: [],
    warnings: [],
    generatedAt: new Date().toISOString(),
  };
}

export function emptySprintStatus(project: string, fileCreated: boolean): SprintStatus {
  return { fileCreated, project, epics: [], generatedAt: new Date().toISOString() };
}

/**
 * Derives workflow and sprint snapshots from a project's files.
 *
 * Every method is a function of what is on disk at call time. The only
 * state is the YAML cache, which re-parses a file whenever its mtime or
 * size changes. Missing manifests produce `fileCreated: false` snapshots;
 * unreadable or malformed ones produce a `ReadFailure`.
 */
export class FileStateReader {
  constructor(private readonly cache: YamlCache = new YamlCache()) {}

  async readConfig(projectRoot: string): Promise<Record<string, unknown>> {
    const read = await readProjectConfig(projectRoot, this.cache);
    if (read.state === 'failed') {
      console.warn(`[parser] Ignoring unreadable project config in ${projectRoot}:`, read.failure.message);
      return {};
    }
    return read.state === 'ok' ? read.value : {};
  }

  private async locate(projectRoot: string, fileName: string, dirs: string[]): Promise<LocatedManifest | null> {
    for (const dir of unique(dirs)) {
      const file = path.resolve(projectRoot, dir, fileName);
      const read = await this.cache.read(file);
      if (read.state === 'missing') continue;
      return { file, relative: toRelative(projectRoot, file), read };
    }
    return null;
  }

  private workflowDirs(outputFolder: string): string[] {
    return [outputFolder, 'md', 'docs', '.'];
  }

  private sprintDirs(outputFolder: string): string[] {
    return [
      outputFolder,
      'md',
      `${outputFolder}/sprint-artifacts`,
      'md/sprint-artifacts',
      'docs',
      'docs/sprint-artifacts',
      '.',
    ];
  }

  /** Absolute path of the sprint manifest, or null when the project has none */
  async locateSprintManifest(projectRoot: string): Promise<string | null> {
    const config = await this.readConfig(projectRoot);
    const located = await this.locate(projectRoot, SPRINT_MANIFEST, this.sprintDirs(outputFolderOf(config)));
    return located?.file ?? null;
  }

  /** Story file of one story, relative to the project root */
  async locateStoryFile(projectRoot: string, storyId: string): Promise<string | null> {
    const config = await this.readConfig(projectRoot);
    const located = await this.locate(projectRoot, SPRINT_MANIFEST, this.sprintDirs(outputFolderOf(config)));
    const data = located?.read.state === 'ok' && isRecord(located.read.value) ? located.read.value : null;
    const storyDir = await resolveStoryDir(projectRoot, storyLocationOf(data));
    const file = storyDir ? await findStoryFile(storyDir, storyId) : null;
    return file ? toRelative(projectRoot, file) : null;
  }

  /** Workflow id → artifact path for every known artifact present on disk */
  async detectArtifacts(projectRoot: string, outputFolder: string): Promise<Map<string, string>> {
    const detected = new Map<string, string>();
    for (const [workflowId, fileName] of Object.entries(WORKFLOW_ARTIFACTS)) {
      for (const candidate of unique([`${outputFolder}/${fileName}`, fileName])) {
        if (await fileExists(path.resolve(projectRoot, candidate))) {
          detected.set(workflowId, candidate);
          break;
        }
      }
    }
    return detected;
  }

  async readWorkflow(projectRoot: string): Promise<ReadOutcome<WorkflowStatus>> {
    try {
      const config = await this.readConfig(projectRoot);
      const project = projectNameOf(projectRoot, config);
      const outputFolder = outputFolderOf(config);
      const located = await this.locate(projectRoot, WORKFLOW_MANIFEST, this.workflowDirs(outputFolder));

      if (!located) return { ok: true, value: emptyWorkflowStatus(project, false) };
      if (located.read.state === 'failed') {
        return { ok: false, failure: { ...located.read.failure, file: located.relative } };
      }

      const data = located.read.state === 'ok' ? located.read.value : null;
      if (data !== null && !isRecord(data)) {
        return { ok: false, failure: { kind: 'parse', file: located.relative, message: 'expected a mapping at the top level' } };
      }

      const detected = await this.detectArtifacts(projectRoot, outputFolder);
      const manifest = parseWorkflowManifest(data ?? {}, detected);
      return {
        ok: true,
        value: {
          fileCreated: true,
          project: manifest.project,
          track: manifest.track,
          trackMode: manifest.trackMode,
          phases: manifest.phases,
          warnings: manifest.warnings,
          generatedAt: new Date().toISOString(),
        },
      };
    } catch (err) {
      return { ok: false, failure: { kind: 'transient', file: WORKFLOW_MANIFEST, message: errorMessage(err) } };
    }
  }

  async readSprint(projectRoot: string): Promise<ReadOutcome<SprintStatus>> {
    try {
      const config = await this.readConfig(projectRoot);
      const located = await this.locate(projectRoot, SPRINT_MANIFEST, this.sprintDirs(outputFolderOf(config)));

      if (!located) return { ok: true, value: emptySprintStatus(projectNameOf(projectRoot, config), false) };
      if (located.read.state === 'failed') {
        return { ok: false, failure: { ...located.read.failure, file: located.relative } };
      }

      const data = located.read.state === 'ok' ? located.read.value : null;
      if (data !== null && !isRecord(data)) {
        return { ok: false, failure: { kind: 'parse', file: located.relative, message: 'expected a mapping at the top level' } };
      }

      const storyDir = await resolveStoryDir(projectRoot, storyLocationOf(data));
      const storyStatuses = storyDir ? await readStoryFileStatuses(storyDir) : new Map<string, StoryStatus>();
      const manifest = parseSprintManifest(data, storyStatuses);

      const sprint: SprintStatus = {
        fileCreated: true,
        project: manifest.project,
        epics: manifest.epics,
        generatedAt: new Date().toISOString(),
      };
      if (manifest.message) sprint.message = manifest.message;
      return { ok: true, value: sprint };
    } catch (err) {
      return { ok: false, failure: { kind: 'transient', file: SPRINT_MANIFEST, message: errorMessage(err) } };
    }
  }

  async readImplementationFlow(projectRoot: string, trackMode?: TrackMode): Promise<ImplementationFlow> {
    const config = await this.readConfig(projectRoot);
    const outputFolder = outputFolderOf(config);

    let mode = trackMode;
    if (!mode) {
      const workflow = await this.readWorkflow(projectRoot);
      mode = workflow.ok ? workflow.value.trackMode : 'standard';
    }

    const completed = new Set((await this.detectArtifacts(projectRoot, outputFolder)).keys());
    completed.delete('sprint-planning');
    const sprint = await this.locate(projectRoot, SPRINT_MANIFEST, this.sprintDirs(outputFolder));
    if (sprint?.read.state === 'ok' && isRecord(sprint.read.value) && hasDevelopmentStatus(sprint.read.value)) {
      completed.add('sprint-planning');
    }
    return buildImplementationFlow(mode, completed);
  }
}
