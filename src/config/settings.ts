/**
 * Settings resolution for manifestly
 *
 * Resolves each setting from (highest priority first):
 * 1. CLI flag (e.g. --hash-algorithm)
 * 2. Environment variable (MANIFESTLY_HASH_ALGORITHM, MANIFESTLY_NAME, ...)
 * 3. Settings file (.manifestly.yaml in the working directory, or MANIFESTLY_CONFIG)
 * 4. Built-in default
 *
 * The environment is only read here. Core modules receive a resolved
 * ManifestlySettings value.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { SettingsError } from '../core/errors.js';
import type { LogLevel } from '../utils/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Settings consumed by generation, hashing and ignore loading
 */
export interface ManifestlySettings {
  /** Digest algorithm name (any name crypto.getHashes() knows) */
  hashAlgorithm: string;
  /** Filename of a manifest inside the directory it describes */
  manifestName: string;
  /** Filename of the per-directory ignore file */
  ignoreName: string;
  /** Bytes per read when hashing */
  chunkSize: number;
}

export type SettingKey = keyof ManifestlySettings;

/**
 * Where a resolved setting came from
 */
export type SettingSource = 'cli' | 'env' | 'file' | 'default';

/**
 * Result of settings resolution
 */
export interface SettingsResolutionResult {
  settings: ManifestlySettings;
  /** Source of each setting (for verbose output) */
  sources: Record<SettingKey, SettingSource>;
  /** Settings file that was read, if any */
  configFile: string | null;
}

/**
 * Options for settings resolution
 */
export interface SettingsResolveOptions {
  /** Values given on the command line */
  overrides?: Partial<ManifestlySettings>;
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory for the default settings file lookup */
  cwd?: string;
  /** Explicit settings file path */
  configFile?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_SETTINGS: Readonly<ManifestlySettings> = {
  hashAlgorithm: 'sha256',
  manifestName: '.manifestly.json',
  ignoreName: '.manifestlyignore',
  chunkSize: 8192,
};

/** Settings file looked up in the working directory */
export const DEFAULT_CONFIG_FILE = '.manifestly.yaml';

/** Environment variable names per setting */
export const ENV_VARS: Record<SettingKey, string> = {
  hashAlgorithm: 'MANIFESTLY_HASH_ALGORITHM',
  manifestName: 'MANIFESTLY_NAME',
  ignoreName: 'MANIFESTLY_IGNORE',
  chunkSize: 'MANIFESTLY_CHUNK_SIZE',
};

export const ENV_CONFIG_FILE = 'MANIFESTLY_CONFIG';
export const ENV_LOG_LEVEL = 'MANIFESTLY_LOG_LEVEL';

/** Settings file keys (snake_case, as written in YAML) */
const FILE_KEYS: Record<SettingKey, string> = {
  hashAlgorithm: 'hash_algorithm',
  manifestName: 'manifest_name',
  ignoreName: 'ignore_name',
  chunkSize: 'chunk_size',
};

const SETTING_KEYS: SettingKey[] = ['hashAlgorithm', 'manifestName', 'ignoreName', 'chunkSize'];

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve settings from CLI overrides, environment, settings file and defaults
 *
 * @throws SettingsError when a value cannot be used (e.g. a non-numeric chunk size)
 */
export function resolveSettings(options: SettingsResolveOptions = {}): SettingsResolutionResult {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  const configFile = findConfigFile(options.configFile ?? env[ENV_CONFIG_FILE], cwd);
  const fileValues: Record<string, unknown> = configFile ? loadConfigFile(configFile) : {};

  const raw: Record<SettingKey, unknown> = { ...DEFAULT_SETTINGS };
  const sources: Record<SettingKey, SettingSource> = {
    hashAlgorithm: 'default',
    manifestName: 'default',
    ignoreName: 'default',
    chunkSize: 'default',
  };

  for (const key of SETTING_KEYS) {
    const override = overrides[key];
    const envValue = env[ENV_VARS[key]];
    const fileValue = fileValues[FILE_KEYS[key]];

    if (override !== undefined) {
      raw[key] = override;
      sources[key] = 'cli';
    } else if (envValue !== undefined && envValue !== '') {
      raw[key] = envValue;
      sources[key] = 'env';
    } else if (fileValue !== undefined && fileValue !== null) {
      raw[key] = fileValue;
      sources[key] = 'file';
    }
  }

  return {
    settings: {
      hashAlgorithm: requireName('hashAlgorithm', raw.hashAlgorithm),
      manifestName: requireName('manifestName', raw.manifestName),
      ignoreName: requireName('ignoreName', raw.ignoreName),
      chunkSize: parseChunkSize(raw.chunkSize),
    },
    sources,
    configFile,
  };
}

/**
 * Resolve the log level from the environment, falling back to the given default
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env,
  fallback: LogLevel = 'info'
): LogLevel {
  const value = env[ENV_LOG_LEVEL]?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? fallback;
}

/**
 * Parse a chunk size given as a number or numeric string
 *
 * @throws SettingsError unless the value is a positive integer
 */
export function parseChunkSize(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new SettingsError('chunkSize', value, 'must be a positive integer');
  }
  return parsed;
}

// =============================================================================
// Helpers
// =============================================================================

function requireName(key: SettingKey, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new SettingsError(key, value, 'must be a non-empty string');
  }
  return value.trim();
}

/**
 * Find the settings file: an explicit path must exist, the default one is optional
 */
function findConfigFile(explicit: string | undefined, cwd: string): string | null {
  if (explicit) {
    const explicitPath = resolve(cwd, explicit);
    if (!existsSync(explicitPath)) {
      throw new SettingsError('config', explicit, 'file not found');
    }
    return explicitPath;
  }

  const defaultPath = resolve(cwd, DEFAULT_CONFIG_FILE);
  return existsSync(defaultPath) ? defaultPath : null;
}

/**
 * Load a YAML settings file into a plain record
 */
function loadConfigFile(configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new SettingsError(
      'config',
      configPath,
      `cannot parse YAML: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new SettingsError('config', configPath, 'expected a mapping of settings');
  }
  return Object.fromEntries(Object.entries(parsed));
}
