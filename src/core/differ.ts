/**
 * Manifest diff algorithm
 *
 * Pure comparison of two path → digest mappings. No I/O.
 */

import type { DiffResult, ManifestEntries } from './types.js';

/**
 * Anything that exposes manifest entries (a Manifest, or a plain wrapper in tests)
 */
export interface EntrySource {
  readonly entries: Readonly<ManifestEntries>;
}

/**
 * Define `path` as an own entry. Plain assignment would hit the prototype
 * setter for a file named `__proto__`.
 */
export function setEntry(entries: ManifestEntries, path: string, digest: string): void {
  Object.defineProperty(entries, path, {
    value: digest,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * A diff with no entries in any category
 */
export function emptyDiff(): DiffResult {
  return { added: {}, removed: {}, changed: {} };
}

/**
 * Check whether a diff has at least one entry
 */
export function hasChanges(diff: DiffResult): boolean {
  return (
    Object.keys(diff.added).length > 0 ||
    Object.keys(diff.removed).length > 0 ||
    Object.keys(diff.changed).length > 0
  );
}

/**
 * Count entries per category
 */
export function countChanges(diff: DiffResult): { added: number; removed: number; changed: number; total: number } {
  const added = Object.keys(diff.added).length;
  const removed = Object.keys(diff.removed).length;
  const changed = Object.keys(diff.changed).length;
  return { added, removed, changed, total: added + removed + changed };
}

/**
 * Compare a source manifest with a target manifest
 *
 * - added: in source, not in target (source digest)
 * - changed: in both, digests differ (source digest)
 * - removed: in target, not in source (target digest)
 */
export function diffManifests(source: EntrySource, target: EntrySource): DiffResult {
  const diff = emptyDiff();
  const sourceEntries = source.entries;
  const targetEntries = target.entries;

  for (const [path, digest] of Object.entries(sourceEntries)) {
    if (!Object.hasOwn(targetEntries, path)) {
      setEntry(diff.added, path, digest);
    } else if (targetEntries[path] !== digest) {
      setEntry(diff.changed, path, digest);
    }
  }

  for (const [path, digest] of Object.entries(targetEntries)) {
    if (!Object.hasOwn(sourceEntries, path)) {
      setEntry(diff.removed, path, digest);
    }
  }

  return diff;
}
