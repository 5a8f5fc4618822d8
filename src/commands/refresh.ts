/**
 * refresh command - Regenerate a manifest from its root
 */

import type { CommandContext, CommandResult } from '../types.js';
import { Manifest } from '../core/manifest.js';
import { success } from '../utils/output.js';
import { commandFailure } from './result.js';

export interface RefreshCommandOptions {
  manifest: string;
  root?: string;
}

export interface RefreshCommandData {
  location: string;
  root: string;
  files: number;
}

/**
 * Execute the refresh command
 */
export async function refreshCommand(
  ctx: CommandContext,
  options: RefreshCommandOptions
): Promise<CommandResult<RefreshCommandData>> {
  const { settings, store, logger, outputFormat } = ctx;

  try {
    const manifest = await Manifest.open(options.manifest, {
      root: options.root,
      settings,
      store,
      logger,
    });
    await manifest.refresh();

    const message = 'Manifest refreshed';
    if (outputFormat === 'human') {
      success(message);
    }

    return {
      success: true,
      message,
      data: { location: manifest.location, root: manifest.root, files: manifest.size },
    };
  } catch (err) {
    return commandFailure(err);
  }
}
