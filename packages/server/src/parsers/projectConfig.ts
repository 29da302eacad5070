import { readdir, stat } from 'fs/promises';
import path from 'path';
import type { FileRead, YamlCache } from './yamlFile';
import { asString, isRecord } from './yamlFile';

export const BMAD_DIR = '.bmad';
export const DEFAULT_OUTPUT_FOLDER = 'md';

const CONFIG_CANDIDATES = [
  path.join(BMAD_DIR, 'bmm', 'config.yaml'),
  path.join(BMAD_DIR, 'core', 'config.yaml'),
  path.join(BMAD_DIR, '_cfg', 'config.yaml'),
];

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

export function isBmadProject(projectRoot: string): Promise<boolean> {
  return isDirectory(path.join(projectRoot, BMAD_DIR));
}

/** First config file found; `{}` when the project has none */
export async function readProjectConfig(projectRoot: string, cache: YamlCache): Promise<FileRead<Record<string, unknown>>> {
  for (const candidate of CONFIG_CANDIDATES) {
    const read = await cache.read(path.join(projectRoot, candidate));
    if (read.state === 'missing') continue;
    if (read.state === 'failed') return read;
    return { state: 'ok', value: isRecord(read.value) ? read.value : {} };
  }
  return { state: 'ok', value: {} };
}

/** Output folder relative to the project root, from `output_folder` ("{project-root}/docs" style values included) */
export function outputFolderOf(config: Record<string, unknown>): string {
  const raw = asString(config.output_folder).trim();
  if (!raw) return DEFAULT_OUTPUT_FOLDER;
  const relative = raw.replace(/^\{project-root\}[\\/]?/, '').replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+$/, '');
  return relative || DEFAULT_OUTPUT_FOLDER;
}

export function projectNameOf(projectRoot: string, config: Record<string, unknown>): string {
  return asString(config.project_name).trim() || path.basename(projectRoot);
}

export async function listInstalledModules(projectRoot: string): Promise<string[]> {
  try {
    const entries = await readdir(path.join(projectRoot, BMAD_DIR), { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('_'))
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}
