/**
 * Configuration module exports
 */

export {
  resolveSettings,
  loadConfigFile,
  parseConfigFile,
  parseTagList,
  formatSources,
  DEFAULT_CONFIG_FILE,
  ENV_SOURCE,
  ENV_TARGET,
  ENV_TAGS,
  ENV_OVERWRITE,
  type PruneConfigFile,
  type SettingSource,
  type SettingsResolveOptions,
  type SettingsResolutionResult,
} from './settings.js';
