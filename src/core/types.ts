/**
 * Core manifest data types
 */

/**
 * Relative path → lowercase hex digest
 */
export type ManifestEntries = Record<string, string>;

/**
 * Three-way classification of two manifests (or a manifest and a live tree)
 */
export interface DiffResult {
  /** Present in source, absent in target (source digest) */
  added: ManifestEntries;
  /** Present in target, absent in source (target digest) */
  removed: ManifestEntries;
  /** Present in both with differing digests (source digest) */
  changed: ManifestEntries;
}

export type DiffCategory = keyof DiffResult;

export const DIFF_CATEGORIES: readonly DiffCategory[] = ['added', 'removed', 'changed'];

/**
 * Outcome of the last Manifest.load()
 *
 * - loaded: a manifest document was read
 * - empty: the backing file had no content
 * - created: the backing file did not exist and an empty one was written
 * - malformed: the backing file could not be parsed; treated as empty
 */
export type LoadStatus = 'loaded' | 'empty' | 'created' | 'malformed';
