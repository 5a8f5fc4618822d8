/**
 * Shared types for the manifestly CLI
 */

import type { ManifestlySettings, SettingKey, SettingSource } from './config/settings.js';
import type { FileStore } from './store/types.js';
import type { Logger } from './utils/logger.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable debug logging */
  verbose: boolean;
  /** Settings file to read instead of ./.manifestly.yaml */
  config?: string;
}

/**
 * Output format type
 */
export type OutputFormat = 'human' | 'json';

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Settings resolved from flags, environment and settings file */
  settings: ManifestlySettings;
  /** Where each setting came from */
  settingSources?: Record<SettingKey, SettingSource>;
  /** Store commands read and write through */
  store: FileStore;
  logger: Logger;
}
