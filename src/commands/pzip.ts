/**
 * pzip command - Bundle changed files and the diff into a zip
 */

import type { CommandContext, CommandResult } from '../types.js';
import { writePatchArchive } from '../core/export.js';
import type { DiffResult } from '../core/types.js';
import { success } from '../utils/output.js';
import { commandFailure } from './result.js';

export interface PzipCommandOptions {
  source: string;
  target: string;
  /** Zip file to write */
  output: string;
}

/**
 * Execute the pzip command
 */
export async function pzipCommand(
  ctx: CommandContext,
  options: PzipCommandOptions
): Promise<CommandResult<DiffResult>> {
  const { settings, store, logger, outputFormat } = ctx;

  try {
    const diff = await writePatchArchive(options.source, options.target, options.output, {
      settings,
      store,
      logger,
    });

    const message = `Zip file saved to ${options.output}`;
    if (outputFormat === 'human') {
      success(message);
    }
    return { success: true, message, data: diff };
  } catch (err) {
    return commandFailure(err);
  }
}
