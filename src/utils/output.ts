/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import { countChanges, hasChanges } from '../core/differ.js';
import type { SyncAction } from '../core/sync.js';
import { DIFF_CATEGORIES, type DiffCategory, type DiffResult } from '../core/types.js';
import type { CommandResult, OutputFormat } from '../types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print a manifest diff in a human-readable format
 */
export function printDiff(diff: DiffResult, format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(diff, null, 2));
    return;
  }

  if (!hasChanges(diff)) {
    console.log(chalk.gray('No changes detected'));
    return;
  }

  console.log(chalk.bold(`\n${countChanges(diff).total} change(s) detected:\n`));

  for (const category of DIFF_CATEGORIES) {
    const color = getDiffColor(category);
    for (const [path, digest] of Object.entries(diff[category])) {
      console.log(color(`${getDiffIcon(category)} ${path}`), chalk.gray(shortDigest(digest)));
    }
  }
}

/**
 * Print the per-file actions of a sync run
 */
export function printSyncActions(actions: SyncAction[], format: OutputFormat): void {
  if (format === 'json') {
    console.log(JSON.stringify(actions, null, 2));
    return;
  }

  if (actions.length === 0) {
    console.log(chalk.gray('Nothing to sync'));
    return;
  }

  for (const action of actions) {
    console.log(formatSyncAction(action));
  }
}

/**
 * One line per sync action: `+ path` copied, `- path` deleted, `! path` skipped.
 * Planned (dry-run) actions are prefixed with "would".
 */
export function formatSyncAction(action: SyncAction): string {
  const planned = action.applied ? '' : 'would ';
  switch (action.type) {
    case 'copy':
      return chalk.green(`+ ${planned}copy ${action.path}`);
    case 'delete':
      return chalk.red(`- ${planned}delete ${action.path}`);
    case 'skip':
      return chalk.yellow(`! skip ${action.path} (${action.reason ?? 'no reason given'})`);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * Print dry-run notice
 */
export function dryRunNotice(): void {
  console.log(chalk.yellow.bold('\n[DRY RUN] No changes will be applied\n'));
}

// Helper functions

function getDiffIcon(category: DiffCategory): string {
  switch (category) {
    case 'added':
      return '+';
    case 'removed':
      return '-';
    case 'changed':
      return '~';
  }
}

function getDiffColor(category: DiffCategory): typeof chalk.green {
  switch (category) {
    case 'added':
      return chalk.green;
    case 'removed':
      return chalk.red;
    case 'changed':
      return chalk.yellow;
  }
}

function shortDigest(digest: string): string {
  return digest.length > 12 ? digest.slice(0, 12) : digest;
}
