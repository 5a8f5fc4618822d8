#!/usr/bin/env node
/**
 * manifestly CLI - Track directory contents with hash manifests
 *
 * Commands:
 * - generate: Write a manifest for a directory
 * - changed: Show files that differ from a manifest
 * - refresh: Regenerate a manifest
 * - sync: Make a target directory match a source manifest
 * - compare: Diff two manifests
 * - patch: Write the diff of two manifests as JSON
 * - pzip: Zip the changed files together with the diff
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import {
  generateCommand,
  changedCommand,
  refreshCommand,
  syncCommand,
  compareCommand,
  patchCommand,
  pzipCommand,
} from './commands/index.js';
import { printResult, error } from './utils/output.js';
import type { ManifestlySettings } from './config/index.js';
import { createContext } from './context.js';
import { ManifestlyError } from './core/errors.js';
import { VERSION } from './version.js';

/**
 * Run a command handler, print its result and exit with its status
 */
async function run<T>(
  name: string,
  execute: (ctx: CommandContext) => Promise<CommandResult<T>>,
  overrides: Partial<ManifestlySettings> = {}
): Promise<void> {
  try {
    const ctx = createContext(program.opts<GlobalOptions>(), { overrides });
    const result = await execute(ctx);

    if (ctx.outputFormat === 'json' || !result.success) {
      printResult(result, ctx.outputFormat);
    }

    process.exit(result.success ? 0 : 1);
  } catch (err) {
    const detail = err instanceof ManifestlyError
      ? err.toUserMessage()
      : err instanceof Error ? err.message : String(err);
    error(`${name} failed: ${detail}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('manifestly')
  .description('Generate, compare and sync hash manifests of directory trees')
  .version(VERSION)
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  )
  .addOption(
    new Option('--config <path>', 'Settings file (default: ./.manifestly.yaml)')
      .env('MANIFESTLY_CONFIG')
  );

/**
 * generate command - Build a manifest
 */
program
  .command('generate')
  .description('Generate a manifest for a directory')
  .argument('<directory>', 'Directory to scan')
  .option('--hash-algorithm <name>', 'Digest algorithm (default: sha256)')
  .option('--output-file <path>', 'Manifest file to write (default: <directory>/.manifestly.json)')
  .action(async (directory: string, cmdOpts: { hashAlgorithm?: string; outputFile?: string }) => {
    await run(
      'Generate',
      (ctx) => generateCommand(ctx, { directory, outputFile: cmdOpts.outputFile }),
      { hashAlgorithm: cmdOpts.hashAlgorithm }
    );
  });

/**
 * changed command - Show drift from a manifest
 */
program
  .command('changed')
  .description('Show files that changed since the manifest was written')
  .argument('<manifest>', 'Manifest file')
  .option('--root <directory>', 'Directory the manifest tracks')
  .action(async (manifest: string, cmdOpts: { root?: string }) => {
    await run('Changed', (ctx) => changedCommand(ctx, { manifest, root: cmdOpts.root }));
  });

/**
 * refresh command - Regenerate a manifest
 */
program
  .command('refresh')
  .description('Regenerate a manifest from the files on disk')
  .argument('<manifest>', 'Manifest file')
  .option('--root <directory>', 'Directory the manifest tracks')
  .action(async (manifest: string, cmdOpts: { root?: string }) => {
    await run('Refresh', (ctx) => refreshCommand(ctx, { manifest, root: cmdOpts.root }));
  });

/**
 * sync command - Copy and delete files so a target matches a source
 */
program
  .command('sync')
  .description('Sync two directories using manifest files')
  .argument('<source-manifest>', 'Source manifest file')
  .argument('<target-manifest>', 'Target manifest file')
  .option('--source_directory <directory>', 'Directory the source manifest tracks')
  .option('--target_directory <directory>', 'Directory the target manifest tracks')
  .option('--refresh', 'Refresh the source manifest first', false)
  .option('--dry-run', 'Show what would happen without making changes', false)
  .action(
    async (
      source: string,
      target: string,
      cmdOpts: {
        source_directory?: string;
        target_directory?: string;
        refresh: boolean;
        dryRun: boolean;
      }
    ) => {
      await run('Sync', (ctx) =>
        syncCommand(ctx, {
          source,
          target,
          sourceDirectory: cmdOpts.source_directory,
          targetDirectory: cmdOpts.target_directory,
          refresh: cmdOpts.refresh,
          dryRun: cmdOpts.dryRun,
        })
      );
    }
  );

/**
 * compare command - Diff two manifests
 */
program
  .command('compare')
  .description('Compare two manifest files and print the diff')
  .argument('<source-manifest>', 'Source manifest file')
  .argument('<target-manifest>', 'Target manifest file')
  .action(async (source: string, target: string) => {
    await run('Compare', (ctx) => compareCommand(ctx, { source, target }));
  });

/**
 * patch command - Write a JSON patch
 */
program
  .command('patch')
  .description('Write the diff of two manifests to a JSON patch file')
  .argument('<source-manifest>', 'Source manifest file')
  .argument('<target-manifest>', 'Target manifest file')
  .argument('<output>', 'Patch file to write')
  .action(async (source: string, target: string, output: string) => {
    await run('Patch', (ctx) => patchCommand(ctx, { source, target, output }));
  });

/**
 * pzip command - Write a zip patch
 */
program
  .command('pzip')
  .description('Write a zip with the changed files and the diff')
  .argument('<source-manifest>', 'Source manifest file')
  .argument('<target-manifest>', 'Target manifest file')
  .argument('<output>', 'Zip file to write')
  .action(async (source: string, target: string, output: string) => {
    await run('Pzip', (ctx) => pzipCommand(ctx, { source, target, output }));
  });

// Parse and execute
program.parseAsync().catch((err: unknown) => {
  error(`manifestly failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
