import { isAbsolute, posix, relative, sep } from 'path';

/**
 * Canonical slash-separated form of a report path: backslashes become slashes
 * and `.`, `..`, repeated and trailing separators are collapsed.
 */
export function normalizeReportPath(filePath: string): string {
  const normalized = posix.normalize(filePath.replace(/\\/g, '/'));
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

/**
 * Path of `filePath` relative to `root`, slash-separated, or null when the
 * file does not live under the root.
 */
export function relativeToRoot(filePath: string, root: string): string | null {
  const rel = relative(root, filePath);

  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }

  return rel.split(sep).join('/');
}
