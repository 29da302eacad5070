/** Characters that continue a path or name segment */
const SEGMENT_CHAR = /[\p{L}\p{N}._-]/u;
const NON_ASCII = /[^\x00-\x7f]/;

/** Comparison-safe form: NFC, lower case, forward slashes, no trailing slash */
export function normalizeForMatch(value: string): string {
  return value
    .normalize('NFC')
    .toLowerCase()
    .replace(/\\/g, '/')
    .replace(/\/{2,}/g, '/')
    .replace(/\/+$/, '');
}

/**
 * ASCII letters, digits, whitespace, "/" and ":" only. Terminals and process
 * tables on some systems mangle non-ASCII path segments; the skeleton survives that.
 */
export function asciiSkeleton(value: string): string {
  return normalizeForMatch(value).replace(/[^a-z0-9/:\s]/g, '');
}

/** Whether `needle` occurs in `haystack` without running into a neighbouring segment */
function includesAtBoundary(haystack: string, needle: string): boolean {
  if (!needle) return false;
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(needle, from);
    if (idx === -1) return false;
    const before = idx === 0 ? '' : haystack[idx - 1];
    const after = haystack[idx + needle.length] ?? '';
    const leftOk = before === '' || !SEGMENT_CHAR.test(before);
    const rightOk = after === '' || !SEGMENT_CHAR.test(after);
    if (leftOk && rightOk) return true;
    from = idx + 1;
  }
}

/**
 * Whether `text` (a cwd, command line or window title) refers to
 * `projectPath` or a directory below it. "/work/app" matches "/work/app"
 * and "/work/app/src" but not "/work/app-old".
 */
export function containsPath(text: string, projectPath: string): boolean {
  const needle = normalizeForMatch(projectPath);
  if (includesAtBoundary(normalizeForMatch(text), needle)) return true;

  if (!NON_ASCII.test(projectPath)) return false;
  const skeleton = asciiSkeleton(projectPath);
  const lastSegment = skeleton.slice(skeleton.lastIndexOf('/') + 1);
  // a skeleton whose final segment vanished would match the parent directory
  if (!lastSegment) return false;
  return includesAtBoundary(asciiSkeleton(text), skeleton);
}

/** Whether `text` mentions the project by its directory name */
export function mentionsName(text: string, name: string): boolean {
  const needle = normalizeForMatch(name);
  if (needle.length < 3) return false;
  return includesAtBoundary(normalizeForMatch(text), needle);
}
