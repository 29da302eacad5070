import path from 'path';
import type { Debouncer } from './types';
import { IGNORED_DIRS, WATCHED_EXTENSIONS } from './types';

export function createDebouncer(delayMs: number): Debouncer {
  const timers = new Map<string, ReturnType<typeof setTimeout>>();

  function debounce(key: string, fn: () => void) {
    const existing = timers.get(key);
    if (existing) clearTimeout(existing);
    timers.set(
      key,
      setTimeout(() => {
        timers.delete(key);
        fn();
      }, delayMs)
    );
  }

  function clear() {
    for (const timer of timers.values()) clearTimeout(timer);
    timers.clear();
  }

  return { debounce, clear };
}

export function isIgnoredPath(filePath: string): boolean {
  return filePath.split(/[\\/]/).some((segment) => IGNORED_DIRS.has(segment));
}

export function isRelevantChange(filePath: string): boolean {
  return WATCHED_EXTENSIONS.has(path.extname(filePath).toLowerCase()) && !isIgnoredPath(filePath);
}
