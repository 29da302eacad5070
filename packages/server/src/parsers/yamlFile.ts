import { readFile, stat } from 'fs/promises';
import * as yaml from 'js-yaml';
import { errorMessage, isNodeError } from '../utils';

export interface ReadFailure {
  /** "parse" is a malformed file; "transient" is an I/O error worth retrying on the next tick */
  kind: 'parse' | 'transient';
  file: string;
  message: string;
}

export type FileRead<T> =
  | { state: 'missing' }
  | { state: 'ok'; value: T }
  | { state: 'failed'; failure: ReadFailure };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

/** Parse YAML text, turning js-yaml exceptions into a parse failure */
export function parseYamlText(text: string, file: string): FileRead<unknown> {
  try {
    return { state: 'ok', value: yaml.load(text) ?? null };
  } catch (err) {
    return { state: 'failed', failure: { kind: 'parse', file, message: errorMessage(err) } };
  }
}

interface CacheEntry {
  mtimeMs: number;
  size: number;
  read: FileRead<unknown>;
}

/**
 * Parsed YAML documents keyed by path. An entry is reused only while the
 * file's mtime and size are unchanged.
 */
export class YamlCache {
  private entries = new Map<string, CacheEntry>();

  async read(filePath: string): Promise<FileRead<unknown>> {
    let mtimeMs: number;
    let size: number;
    try {
      const stats = await stat(filePath);
      mtimeMs = stats.mtimeMs;
      size = stats.size;
    } catch (err) {
      this.entries.delete(filePath);
      if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return { state: 'missing' };
      return { state: 'failed', failure: { kind: 'transient', file: filePath, message: errorMessage(err) } };
    }

    const cached = this.entries.get(filePath);
    if (cached && cached.mtimeMs === mtimeMs && cached.size === size) {
      return cached.read;
    }

    let text: string;
    try {
      text = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return { state: 'missing' };
      return { state: 'failed', failure: { kind: 'transient', file: filePath, message: errorMessage(err) } };
    }

    const read = parseYamlText(text, filePath);
    this.entries.set(filePath, { mtimeMs, size, read });
    return read;
  }

  invalidate(filePath?: string) {
    if (filePath) this.entries.delete(filePath);
    else this.entries.clear();
  }
}
