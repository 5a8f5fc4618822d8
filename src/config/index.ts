/**
 * Configuration module exports
 */

export {
  resolveSettings,
  resolveLogLevel,
  parseChunkSize,
  DEFAULT_SETTINGS,
  DEFAULT_CONFIG_FILE,
  ENV_VARS,
  ENV_CONFIG_FILE,
  ENV_LOG_LEVEL,
  type ManifestlySettings,
  type SettingKey,
  type SettingSource,
  type SettingsResolutionResult,
  type SettingsResolveOptions,
} from './settings.js';
