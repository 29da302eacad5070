import { isDeepStrictEqual } from 'util';

/** Keys that change on every read and never count as a change */
export const VOLATILE_KEYS: ReadonlySet<string> = new Set(['generatedAt', 'checkedAt']);

export function stripVolatile(snapshot: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(snapshot).filter(([key]) => !VOLATILE_KEYS.has(key)));
}

export function snapshotsEqual(a: object | null, b: object | null): boolean {
  if (a === null || b === null) return a === b;
  return isDeepStrictEqual(stripVolatile(a), stripVolatile(b));
}
