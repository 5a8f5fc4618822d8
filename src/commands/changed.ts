/**
 * changed command - Show files that drifted from a manifest
 */

import type { CommandContext, CommandResult } from '../types.js';
import { Manifest } from '../core/manifest.js';
import { hasChanges } from '../core/differ.js';
import type { DiffResult } from '../core/types.js';
import { header, info, printDiff } from '../utils/output.js';
import { commandFailure } from './result.js';

export interface ChangedCommandOptions {
  /** Manifest file (or the directory holding it) */
  manifest: string;
  /** Directory the manifest tracks (default: the manifest's directory) */
  root?: string;
}

/**
 * Execute the changed command
 * Compares the recorded digests with the files on disk
 */
export async function changedCommand(
  ctx: CommandContext,
  options: ChangedCommandOptions
): Promise<CommandResult<DiffResult>> {
  const { settings, store, logger, outputFormat } = ctx;

  try {
    const manifest = await Manifest.open(options.manifest, {
      root: options.root,
      settings,
      store,
      logger,
    });
    logger.debug('Checking for changes', { location: manifest.location, root: manifest.root });

    const diff = await manifest.changed();
    const message = hasChanges(diff) ? 'Changed files:' : 'No files have changed';

    if (outputFormat === 'human') {
      if (hasChanges(diff)) {
        header(message);
        printDiff(diff, outputFormat);
      } else {
        info(message);
      }
    }

    return { success: true, message, data: diff };
  } catch (err) {
    return commandFailure(err);
  }
}
