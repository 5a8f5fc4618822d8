/**
 * Path helpers shared by every store backend
 *
 * Manifest keys are always forward-slash separated and relative to a root, no
 * matter which platform or store produced them.
 */

import { posix } from 'node:path';
import { PathOutsideRootError } from './errors.js';

/**
 * Convert backslashes to forward slashes
 */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Join path parts with forward slashes
 */
export function joinPath(base: string, ...parts: string[]): string {
  return posix.join(normalizePath(base), ...parts.map(normalizePath));
}

/**
 * Parent directory of a path
 */
export function parentPath(path: string): string {
  return posix.dirname(normalizePath(path));
}

/**
 * Last segment of a path (`a/b/.manifestly.json` → `.manifestly.json`)
 */
export function baseName(path: string): string {
  return posix.basename(normalizePath(path));
}

/**
 * Compute the manifest key of `file` relative to `root`.
 *
 * @throws PathOutsideRootError when `file` is not below `root`
 */
export function toRelativeKey(root: string, file: string): string {
  const normalizedRoot = normalizePath(root).replace(/\/+$/, '');
  const normalizedFile = normalizePath(file);

  if (!normalizedFile.startsWith(`${normalizedRoot}/`)) {
    throw new PathOutsideRootError(file, root);
  }
  return normalizedFile.slice(normalizedRoot.length).replace(/^\/+/, '');
}

/**
 * Root directory a manifest tracks when none was given: the directory that
 * holds the manifest file.
 */
export function resolveManifestRoot(location: string): string {
  return parentPath(location);
}
