/**
 * Sync engine
 *
 * Makes a target tree match a source manifest by copying added and changed
 * files and deleting removed ones, then regenerates the target manifest.
 * A dry run only plans: it reports the same actions and touches nothing.
 */

import { isNotFoundError } from '../store/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { diffManifests } from './differ.js';
import { SyncWriteError } from './errors.js';
import { resolveManifest, type Manifest, type ManifestInput, type ManifestOpenOptions } from './manifest.js';
import { joinPath, parentPath } from './paths.js';
import type { DiffResult } from './types.js';

// =============================================================================
// Types
// =============================================================================

export type SyncActionType = 'copy' | 'delete' | 'skip';

/**
 * What happened (or would happen) to one path during a sync
 */
export interface SyncAction {
  type: SyncActionType;
  /** Manifest key */
  path: string;
  /** Source file, for copies and copy skips */
  from?: string;
  /** Target file */
  to: string;
  /** False for dry runs and skips */
  applied: boolean;
  /** Why a path was skipped */
  reason?: string;
}

export interface SyncOptions extends Pick<ManifestOpenOptions, 'settings' | 'store'> {
  /** Plan only; make no changes */
  dryRun?: boolean;
  logger?: Logger;
}

export interface SyncResult {
  /** The target manifest (refreshed unless this was a dry run) */
  target: Manifest;
  /** Diff that drove the sync */
  diff: DiffResult;
  /** One entry per added, changed or removed path, in processing order */
  actions: SyncAction[];
  dryRun: boolean;
}

// =============================================================================
// Sync
// =============================================================================

/**
 * Sync the target root so that it matches the source manifest
 */
export async function syncManifests(
  sourceInput: ManifestInput,
  targetInput: ManifestInput,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const dryRun = options.dryRun ?? false;
  const log = (options.logger ?? defaultLogger).child({ operation: 'sync', dryRun });
  const openOptions = { settings: options.settings, store: options.store, logger: options.logger };

  const source = await resolveManifest(sourceInput, openOptions);
  const target = await resolveManifest(targetInput, openOptions);
  const diff = diffManifests(source, target);
  const actions: SyncAction[] = [];

  log.debug(`Syncing ${source.root} to ${target.root}`);

  for (const path of [...Object.keys(diff.added), ...Object.keys(diff.changed)]) {
    const from = joinPath(source.root, path);
    const to = joinPath(target.root, path);

    if (!(await source.store.isFile(from))) {
      log.warn(`Source file ${from} no longer exists; skipping`);
      actions.push({ type: 'skip', path, from, to, applied: false, reason: 'source file missing' });
      continue;
    }

    if (dryRun) {
      actions.push({ type: 'copy', path, from, to, applied: false });
      continue;
    }

    try {
      const chunks = await openSource(source, from);
      if (chunks === null) {
        log.warn(`Source file ${from} disappeared before it was read; skipping`);
        actions.push({ type: 'skip', path, from, to, applied: false, reason: 'source file missing' });
        continue;
      }
      await target.store.makeDirs(parentPath(to));
      await target.store.writeStream(to, chunks);
    } catch (err) {
      throw new SyncWriteError(to, err);
    }
    log.debug(`Copied ${path}`);
    actions.push({ type: 'copy', path, from, to, applied: true });
  }

  for (const path of Object.keys(diff.removed)) {
    const to = joinPath(target.root, path);

    if (!(await target.store.isFile(to))) {
      actions.push({ type: 'skip', path, to, applied: false, reason: 'already absent from target' });
      continue;
    }

    if (dryRun) {
      actions.push({ type: 'delete', path, to, applied: false });
      continue;
    }

    try {
      await target.store.remove(to);
    } catch (err) {
      throw new SyncWriteError(to, err);
    }
    log.debug(`Deleted ${path}`);
    actions.push({ type: 'delete', path, to, applied: true });
  }

  if (!dryRun) {
    await target.refresh();
  }

  return { target, diff, actions, dryRun };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Start reading a source file. Resolves to null when the file is gone by the
 * time it is opened; nothing has been written to the target at that point.
 */
async function openSource(source: Manifest, from: string): Promise<AsyncIterable<Uint8Array> | null> {
  const iterator = source.store
    .openRead(from, { chunkSize: source.settings.chunkSize })
    [Symbol.asyncIterator]();

  let first: IteratorResult<Uint8Array>;
  try {
    first = await iterator.next();
  } catch (err) {
    if (isNotFoundError(err)) return null;
    throw err;
  }

  return (async function* () {
    try {
      if (first.done) return;
      yield first.value;
      for (let next = await iterator.next(); !next.done; next = await iterator.next()) {
        yield next.value;
      }
    } finally {
      await iterator.return?.();
    }
  })();
}
