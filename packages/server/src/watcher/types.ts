import type { SnapshotKind } from '../state/reconciler';

// ================================================================
// Watch scope
// ================================================================
/** Levels below the project root that are watched */
export const WATCH_DEPTH = 3;
/** Directories never watched */
export const IGNORED_DIRS: ReadonlySet<string> = new Set(['node_modules', '.git', '.hg', '.svn', 'dist', 'build']);
/** File changes that can affect workflow or sprint state */
export const WATCHED_EXTENSIONS: ReadonlySet<string> = new Set(['.yaml', '.yml', '.md']);

// ================================================================
// Interfaces
// ================================================================

/** What the watcher drives; a ProjectSession in the server */
export interface RefreshTarget {
  readonly root: string;
  refresh(kinds?: readonly SnapshotKind[]): Promise<unknown>;
}

/** The part of a chokidar FSWatcher the watcher uses */
export interface FileWatchHandle {
  on(event: 'all', listener: (eventName: string, filePath: string) => void): this;
  on(event: 'ready', listener: () => void): this;
  on(event: 'error', listener: (err: unknown) => void): this;
  close(): Promise<void>;
}

export type WatchFactory = (root: string, options: { depth: number; ignored: (filePath: string) => boolean }) => FileWatchHandle;

export interface ProjectWatcherOptions {
  debounceMs: number;
  pollIntervalMs: number;
  watchFactory?: WatchFactory;
}

export interface ProjectWatcher {
  close(): Promise<void>;
}

export interface Debouncer {
  debounce(key: string, fn: () => void): void;
  clear(): void;
}
