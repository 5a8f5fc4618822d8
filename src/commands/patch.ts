/**
 * patch command - Write the diff of two manifests as JSON
 */

import type { CommandContext, CommandResult } from '../types.js';
import { writePatch } from '../core/export.js';
import type { DiffResult } from '../core/types.js';
import { success } from '../utils/output.js';
import { commandFailure } from './result.js';

export interface PatchCommandOptions {
  source: string;
  target: string;
  /** Patch file to write */
  output: string;
}

/**
 * Execute the patch command
 */
export async function patchCommand(
  ctx: CommandContext,
  options: PatchCommandOptions
): Promise<CommandResult<DiffResult>> {
  const { settings, store, logger, outputFormat } = ctx;

  try {
    const diff = await writePatch(options.source, options.target, options.output, {
      settings,
      store,
      logger,
    });

    const message = `Patch saved to ${options.output}`;
    if (outputFormat === 'human') {
      success(message);
    }
    return { success: true, message, data: diff };
  } catch (err) {
    return commandFailure(err);
  }
}
