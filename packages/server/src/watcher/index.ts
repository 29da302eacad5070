/**
 * Project watcher: keeps one session's snapshots current.
 *
 * - file changes under the project root (debounced) refresh workflow and sprint
 * - a fixed interval refreshes every kind, which is also how the
 *   assistant's process state is picked up
 *
 * Publishing is the session's job; the watcher only decides when.
 */

import chokidar from 'chokidar';
import path from 'path';
import { createDebouncer, isIgnoredPath, isRelevantChange } from './utils';
import { WATCH_DEPTH } from './types';
import type { FileWatchHandle, ProjectWatcher, ProjectWatcherOptions, RefreshTarget, WatchFactory } from './types';
import type { SnapshotKind } from '../state/reconciler';
import { errorMessage } from '../utils';

const FILE_KINDS: readonly SnapshotKind[] = ['workflow', 'sprint'];

const chokidarFactory: WatchFactory = (root, options) =>
  chokidar.watch(root, {
    ignoreInitial: true,
    persistent: true,
    depth: options.depth,
    ignored: options.ignored,
    awaitWriteFinish: { stabilityThreshold: 200, pollInterval: 50 },
  });

export function startProjectWatcher(target: RefreshTarget, options: ProjectWatcherOptions): ProjectWatcher {
  const debouncer = createDebouncer(options.debounceMs);
  const watchFactory = options.watchFactory ?? chokidarFactory;
  let closed = false;

  function refresh(kinds: readonly SnapshotKind[] | undefined, reason: string) {
    if (closed) return;
    target.refresh(kinds).catch((err: unknown) => {
      console.warn(`[watcher] Refresh after ${reason} failed for ${target.root}:`, errorMessage(err));
    });
  }

  const ignored = (filePath: string) => isIgnoredPath(path.relative(target.root, filePath));
  const fileWatcher: FileWatchHandle = watchFactory(target.root, { depth: WATCH_DEPTH, ignored });

  fileWatcher.on('ready', () => {
    console.log(`[watcher] Watching ${target.root}`);
  });
  fileWatcher.on('all', (eventName: string, filePath: string) => {
    if (!isRelevantChange(path.relative(target.root, filePath))) return;
    debouncer.debounce('files', () => refresh(FILE_KINDS, `${eventName} ${path.basename(filePath)}`));
  });
  fileWatcher.on('error', (err: unknown) => {
    console.warn('[watcher] File watcher error:', errorMessage(err));
  });

  const pollInterval = setInterval(() => refresh(undefined, 'poll'), options.pollIntervalMs);

  return {
    close: async () => {
      closed = true;
      clearInterval(pollInterval);
      debouncer.clear();
      await fileWatcher.close();
    },
  };
}
