/**
 * Run settings resolution
 *
 * Each setting resolves independently from, in priority order:
 * 1. CLI flag
 * 2. Environment variable (EXPORT_PRUNE_SOURCE, EXPORT_PRUNE_TARGET, ...)
 * 3. Config file (--config, or .export-prune.yaml in the working directory)
 * 4. Built-in default (booleans only)
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { InvalidConfigError } from '../errors.js';
import { isJsonObject } from '../export/records.js';
import type { PruneSettings } from '../pipeline.js';

/** Config file looked up in the working directory when --config is absent */
export const DEFAULT_CONFIG_FILE = '.export-prune.yaml';

export const ENV_SOURCE = 'EXPORT_PRUNE_SOURCE';
export const ENV_TARGET = 'EXPORT_PRUNE_TARGET';
export const ENV_TAGS = 'EXPORT_PRUNE_TAGS';
export const ENV_OVERWRITE = 'EXPORT_PRUNE_OVERWRITE';

export type SettingSource = 'cli' | 'env' | 'config_file' | 'default';

/**
 * Shape of the YAML config file; every key optional
 */
export interface PruneConfigFile {
  source?: string;
  target?: string;
  tags?: string[];
  overwrite?: boolean;
  skipMetastore?: boolean;
  skipArtifacts?: boolean;
  passThrough?: string[];
}

export interface SettingsResolveOptions {
  cliSource?: string;
  cliTarget?: string;
  cliTags?: string[];
  cliOverwrite?: boolean;
  cliSkipMetastore?: boolean;
  cliSkipArtifacts?: boolean;
  /** Explicit config file path (must exist when given) */
  configPath?: string;
  /** Working directory for relative paths and the default config file */
  cwd?: string;
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface SettingsResolutionResult {
  settings: PruneSettings | null;
  /** Where each required setting came from */
  sources: Partial<Record<'sourcePath' | 'targetPath' | 'tags', SettingSource>>;
  /** Config file that was read, if any */
  configFile?: string;
  error?: string;
}

// =============================================================================
// Config file
// =============================================================================

function optionalString(data: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`${file}: "${key}" must be a string`);
  }
  return value;
}

function optionalBoolean(data: Record<string, unknown>, key: string, file: string): boolean | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new InvalidConfigError(`${file}: "${key}" must be true or false`);
  }
  return value;
}

function optionalStringList(data: Record<string, unknown>, key: string, file: string): string[] | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return [value];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new InvalidConfigError(`${file}: "${key}" must be a list of strings`);
  }
  return value;
}

/**
 * Parse YAML config content. Unknown keys are ignored.
 */
export function parseConfigFile(content: string, file: string): PruneConfigFile {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (err) {
    throw new InvalidConfigError(
      `${file}: invalid YAML (${err instanceof Error ? err.message : String(err)})`,
      'Check the file with a YAML linter'
    );
  }

  if (data === null || data === undefined) {
    return {};
  }
  if (!isJsonObject(data)) {
    throw new InvalidConfigError(`${file}: expected a mapping at the top level`);
  }
  const fields = data;

  return {
    source: optionalString(fields, 'source', file),
    target: optionalString(fields, 'target', file),
    tags: optionalStringList(fields, 'tags', file),
    overwrite: optionalBoolean(fields, 'overwrite', file),
    skipMetastore: optionalBoolean(fields, 'skipMetastore', file),
    skipArtifacts: optionalBoolean(fields, 'skipArtifacts', file),
    passThrough: optionalStringList(fields, 'passThrough', file),
  };
}

/**
 * Load the config file. An explicit path must exist; the default file is
 * optional.
 */
export function loadConfigFile(
  cwd: string,
  explicitPath?: string
): { path: string; config: PruneConfigFile } | null {
  const path = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
  if (!existsSync(path)) {
    if (explicitPath !== undefined) {
      throw new InvalidConfigError(`Config file not found: ${path}`, 'Check the --config path');
    }
    return null;
  }
  return { path, config: parseConfigFile(readFileSync(path, 'utf-8'), path) };
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Split a comma separated tag list (as used in EXPORT_PRUNE_TAGS)
 */
export function parseTagList(value: string): string[] {
  return value
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

export function resolveSettings(options: SettingsResolveOptions = {}): SettingsResolutionResult {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const sources: SettingsResolutionResult['sources'] = {};

  const loaded = loadConfigFile(cwd, options.configPath);
  const file: PruneConfigFile = loaded?.config ?? {};
  const fileDir = loaded ? dirname(loaded.path) : cwd;

  function pickPath(
    key: 'sourcePath' | 'targetPath',
    cli: string | undefined,
    envValue: string | undefined,
    fromFile: string | undefined
  ): string | undefined {
    if (cli) {
      sources[key] = 'cli';
      return resolve(cwd, cli);
    }
    if (envValue) {
      sources[key] = 'env';
      return resolve(cwd, envValue);
    }
    if (fromFile) {
      sources[key] = 'config_file';
      return resolve(fileDir, fromFile);
    }
    return undefined;
  }

  const sourcePath = pickPath('sourcePath', options.cliSource, env[ENV_SOURCE], file.source);
  const targetPath = pickPath('targetPath', options.cliTarget, env[ENV_TARGET], file.target);

  const envTags = env[ENV_TAGS];
  let tags: string[] | undefined;
  if (options.cliTags && options.cliTags.length > 0) {
    tags = options.cliTags;
    sources.tags = 'cli';
  } else if (envTags) {
    tags = parseTagList(envTags);
    sources.tags = 'env';
  } else if (file.tags && file.tags.length > 0) {
    tags = file.tags;
    sources.tags = 'config_file';
  }

  const missing: string[] = [];
  if (!sourcePath) missing.push(`source path (--source-path or ${ENV_SOURCE})`);
  if (!targetPath) missing.push(`target path (--target-path or ${ENV_TARGET})`);
  if (!tags || tags.length === 0) missing.push(`tags (--tags or ${ENV_TAGS})`);

  if (!sourcePath || !targetPath || !tags || tags.length === 0) {
    return {
      settings: null,
      sources,
      configFile: loaded?.path,
      error: `Missing required settings: ${missing.join(', ')}`,
    };
  }

  return {
    settings: {
      sourcePath,
      targetPath,
      tags: [...new Set(tags)],
      overwrite: options.cliOverwrite ?? parseEnvBoolean(env[ENV_OVERWRITE]) ?? file.overwrite ?? false,
      skipMetastore: options.cliSkipMetastore ?? file.skipMetastore ?? false,
      skipArtifacts: options.cliSkipArtifacts ?? file.skipArtifacts ?? false,
      passThrough: file.passThrough ?? [],
    },
    sources,
    configFile: loaded?.path,
  };
}

/**
 * Describe where the settings came from (for verbose output)
 */
export function formatSources(result: SettingsResolutionResult): string {
  const parts = Object.entries(result.sources).map(([key, source]) => `${key}=${source}`);
  if (result.configFile) {
    parts.push(`configFile=${result.configFile}`);
  }
  return parts.join(', ');
}
