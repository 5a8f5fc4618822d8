/**
 * generate command - Build a manifest for a directory
 */

import type { CommandContext, CommandResult } from '../types.js';
import { Manifest, defaultManifestLocation } from '../core/manifest.js';
import { success } from '../utils/output.js';
import { commandFailure } from './result.js';

export interface GenerateCommandOptions {
  /** Directory to scan */
  directory: string;
  /** Manifest file to write (default: <directory>/<manifestName>) */
  outputFile?: string;
  /** Digest algorithm (default: settings.hashAlgorithm) */
  hashAlgorithm?: string;
}

export interface GenerateCommandData {
  location: string;
  root: string;
  algorithm: string;
  files: number;
}

/**
 * Execute the generate command
 */
export async function generateCommand(
  ctx: CommandContext,
  options: GenerateCommandOptions
): Promise<CommandResult<GenerateCommandData>> {
  const { settings, store, logger, outputFormat } = ctx;

  try {
    const directory = store.resolve(options.directory);
    const output = options.outputFile ?? defaultManifestLocation(directory, settings);
    logger.debug('Executing generate command', { directory, output });

    const manifest = await Manifest.generate(directory, {
      output,
      algorithm: options.hashAlgorithm,
      settings,
      store,
      logger,
    });

    const message = `Manifest saved to ${manifest.location}`;
    if (outputFormat === 'human') {
      success(message);
    }

    return {
      success: true,
      message,
      data: {
        location: manifest.location,
        root: manifest.root,
        algorithm: manifest.algorithm,
        files: manifest.size,
      },
    };
  } catch (err) {
    return commandFailure(err);
  }
}
