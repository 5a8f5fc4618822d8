/**
 * Core exports
 */

export * from './errors.js';
export * from './types.js';
export * from './paths.js';
export { hashFile, hashStream, createDigest, isSupportedAlgorithm, type HashFileOptions } from './hasher.js';
export { ManifestIgnore, parseIgnoreFile } from './ignore.js';
export {
  Manifest,
  resolveManifest,
  sortEntries,
  serializeEntries,
  isManifestEntries,
  defaultManifestLocation,
  defaultIgnoreLocation,
  type ManifestContext,
  type ManifestOpenOptions,
  type GenerateOptions,
  type ManifestInput,
} from './manifest.js';
export { diffManifests, emptyDiff, hasChanges, countChanges, type EntrySource } from './differ.js';
export {
  syncManifests,
  type SyncAction,
  type SyncActionType,
  type SyncOptions,
  type SyncResult,
} from './sync.js';
export { writePatch, writePatchArchive, serializeDiff, DIFF_MEMBER_NAME, type ExportOptions } from './export.js';
