/**
 * Command context construction
 */

import type { GlobalOptions, CommandContext } from './types.js';
import { resolveSettings, resolveLogLevel, type ManifestlySettings } from './config/index.js';
import { LocalFileStore } from './store/local.js';
import { logger } from './utils/logger.js';

export interface CreateContextOptions {
  /** Settings given as command flags (e.g. --hash-algorithm) */
  overrides?: Partial<ManifestlySettings>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Create the command context from parsed options
 * Resolves settings from flags, environment and the settings file
 */
export function createContext(
  options: GlobalOptions,
  { overrides, env = process.env, cwd = process.cwd() }: CreateContextOptions = {}
): CommandContext {
  logger.setConfig({
    level: options.verbose ? 'debug' : resolveLogLevel(env),
    json: options.json,
  });

  const resolution = resolveSettings({
    overrides,
    env,
    cwd,
    configFile: options.config,
  });

  logger.debug('Resolved settings', {
    settings: resolution.settings,
    sources: resolution.sources,
    configFile: resolution.configFile,
  });

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    settings: resolution.settings,
    settingSources: resolution.sources,
    store: new LocalFileStore(),
    logger,
  };
}
