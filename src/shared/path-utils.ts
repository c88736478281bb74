/**
 * Path helpers for watch roots
 */

import * as path from 'node:path';

/**
 * Convert an absolute path to a path relative to the base directory.
 * Returns POSIX-style forward-slash separated path.
 */
export function toRelativePath(absolutePath: string, baseDir: string): string {
  return path.relative(baseDir, absolutePath).split(path.sep).join('/');
}

/** True when a path from toRelativePath does not escape its base directory. */
export function isWithinRoot(relativePath: string): boolean {
  return (
    relativePath !== '..' &&
    !relativePath.startsWith('../') &&
    !path.isAbsolute(relativePath)
  );
}
