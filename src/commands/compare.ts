/**
 * compare command - Diff two manifests
 */

import type { CommandContext, CommandResult } from '../types.js';
import { Manifest } from '../core/manifest.js';
import { hasChanges } from '../core/differ.js';
import type { DiffResult } from '../core/types.js';
import { printDiff } from '../utils/output.js';
import { commandFailure } from './result.js';

export interface CompareCommandOptions {
  source: string;
  target: string;
}

/**
 * Execute the compare command
 */
export async function compareCommand(
  ctx: CommandContext,
  options: CompareCommandOptions
): Promise<CommandResult<DiffResult>> {
  const { settings, store, logger, outputFormat } = ctx;

  try {
    const source = await Manifest.open(options.source, { settings, store, logger });
    const target = await Manifest.open(options.target, { settings, store, logger });
    const diff = source.diff(target);

    if (outputFormat === 'human') {
      printDiff(diff, outputFormat);
    }

    return {
      success: true,
      message: hasChanges(diff) ? 'Manifests differ' : 'Manifests are identical',
      data: diff,
    };
  } catch (err) {
    return commandFailure(err);
  }
}
