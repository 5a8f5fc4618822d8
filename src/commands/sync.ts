/**
 * sync command - Make a target directory match a source manifest
 */

import type { CommandContext, CommandResult } from '../types.js';
import { Manifest } from '../core/manifest.js';
import { syncManifests, type SyncAction } from '../core/sync.js';
import type { DiffResult } from '../core/types.js';
import { dryRunNotice, printSyncActions, success } from '../utils/output.js';
import { commandFailure } from './result.js';

export interface SyncCommandOptions {
  /** Source manifest file */
  source: string;
  /** Target manifest file */
  target: string;
  /** Root the source manifest tracks */
  sourceDirectory?: string;
  /** Root the target manifest tracks */
  targetDirectory?: string;
  /** Regenerate the source manifest before syncing */
  refresh?: boolean;
  /** Report what would change without changing anything */
  dryRun?: boolean;
}

export interface SyncCommandData {
  sourceRoot: string;
  targetRoot: string;
  dryRun: boolean;
  diff: DiffResult;
  actions: SyncAction[];
}

/**
 * Execute the sync command
 */
export async function syncCommand(
  ctx: CommandContext,
  options: SyncCommandOptions
): Promise<CommandResult<SyncCommandData>> {
  const { settings, store, logger, outputFormat } = ctx;
  const dryRun = options.dryRun ?? false;

  try {
    const source = await Manifest.open(options.source, {
      root: options.sourceDirectory,
      settings,
      store,
      logger,
    });
    if (options.refresh) {
      logger.debug('Refreshing source manifest', { location: source.location });
      await source.refresh();
    }
    const target = await Manifest.open(options.target, {
      root: options.targetDirectory,
      settings,
      store,
      logger,
    });

    if (dryRun && outputFormat === 'human') {
      dryRunNotice();
    }

    const result = await syncManifests(source, target, { dryRun, settings, store, logger });

    const message = dryRun
      ? `Dry run completed for ${source.root} to ${target.root}`
      : `Synced ${source.root} with ${target.root}`;

    if (outputFormat === 'human') {
      printSyncActions(result.actions, outputFormat);
      success(message);
    }

    return {
      success: true,
      message,
      data: {
        sourceRoot: source.root,
        targetRoot: result.target.root,
        dryRun,
        diff: result.diff,
        actions: result.actions,
      },
    };
  } catch (err) {
    return commandFailure(err);
  }
}
