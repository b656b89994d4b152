import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { parse, stringify } from 'yaml';
import { resolveEncryptionKey, ENCRYPTION_KEY_ENV } from '@parley/core';
import { ConfigSchema, ConfigDefaults, type RawConfig, type RawProfile, type Config, type ProfileConfig } from './schema.js';
import { expandTilde, resolveAppPaths } from '../paths.js';

export const HOST_ENV = 'PARLEY_HOST';

function resolveEnvVar(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.slice(4);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('${') && value.endsWith('}')) {
    const envKey = value.slice(2, -1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  if (value.startsWith('$')) {
    const envKey = value.slice(1);
    const envVal = process.env[envKey];
    return envVal ? envVal : value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripNullValues(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return undefined;
  }
  if (Array.isArray(obj)) {
    return obj.filter(item => item !== null).map(stripNullValues);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== null) {
        result[key] = stripNullValues(value);
      }
    }
    return result;
  }
  return obj;
}

function resolveEnvVarsInObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }
  if (typeof obj === 'string') {
    return resolveEnvVar(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVarsInObject);
  }
  if (isRecord(obj)) {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvVarsInObject(value);
    }
    return resolved;
  }
  return obj;
}

export interface LoadConfigOptions {
  configPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isUnresolvedEnvRef(value: string | undefined): boolean {
  if (!value) return false;
  return value.startsWith('env:') || value.startsWith('$');
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
}

function cloneDefaults(): Config {
  return structuredClone(ConfigDefaults);
}

function toProfile(raw: RawProfile): ProfileConfig {
  return {
    ...raw,
    description: raw.description ?? '',
    auto_apply: raw.auto_apply ?? false,
  };
}

function toProfiles(raw: Record<string, RawProfile>): Record<string, ProfileConfig> {
  const profiles: Record<string, ProfileConfig> = {};
  for (const [name, profile] of Object.entries(raw)) {
    profiles[name] = toProfile(profile);
  }
  return profiles;
}

function mergeConfig(raw: RawConfig): Config {
  const result = cloneDefaults();

  if (raw.host) result.host = raw.host;
  if (raw.default_model) result.default_model = raw.default_model;
  if (raw.render_markdown !== undefined) result.render_markdown = raw.render_markdown;
  if (raw.export_dir) result.export_dir = raw.export_dir;
  if (raw.active_profile) result.active_profile = raw.active_profile;

  if (raw.context) {
    result.context = { ...result.context, ...raw.context };
  }
  if (raw.profiles) {
    result.profiles = toProfiles(raw.profiles);
  }
  if (raw.model_profiles) {
    result.model_profiles = toProfiles(raw.model_profiles);
  }
  if (raw.sessions) {
    result.sessions = { ...result.sessions, ...raw.sessions };
  }
  if (raw.security) {
    result.security = { ...result.security, ...raw.security };
  }
  if (raw.logging) {
    result.logging = { ...result.logging, ...raw.logging };
  }
  return result;
}

/**
 * Environment overrides win over the file. Unresolved `env:` references
 * are cleared so they never reach the cipher as a literal key.
 */
function applyEnvOverrides(config: Config, envOverrides: string[]): void {
  if (isUnresolvedEnvRef(config.security.encryption_key)) {
    config.security.encryption_key = undefined;
  }

  const host = process.env[HOST_ENV]?.trim();
  if (host) {
    config.host = host;
    envOverrides.push(HOST_ENV);
  }

  if (process.env[ENCRYPTION_KEY_ENV]?.trim()) {
    envOverrides.push(ENCRYPTION_KEY_ENV);
  }
  config.security.encryption_key = resolveEncryptionKey(config.security.encryption_key, process.env);
}

export interface LoadConfigResult {
  config: Config;
  configPath: string;
  configFileExists: boolean;
  envOverrides: string[];
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  return loadConfigWithMeta(options).config;
}

export function loadConfigWithMeta(options: LoadConfigOptions = {}): LoadConfigResult {
  const configPath = getConfigPath(options.configPath);
  const configFileExists = existsSync(configPath);

  let result: Config;

  if (!configFileExists) {
    result = cloneDefaults();
  } else {
    let fileContent: string;
    try {
      fileContent = readFileSync(configPath, 'utf-8');
    } catch {
      throw new ConfigError(`Failed to read config file: ${configPath}`);
    }

    let rawConfig: unknown;
    try {
      rawConfig = parse(fileContent);
    } catch {
      throw new ConfigError(`Failed to parse config file: ${configPath}`);
    }

    if (rawConfig === null || rawConfig === undefined) {
      result = cloneDefaults();
    } else {
      const resolvedConfig = resolveEnvVarsInObject(stripNullValues(rawConfig));
      const validated = ConfigSchema.safeParse(resolvedConfig);

      if (!validated.success) {
        throw new ConfigError(`Invalid config: ${formatIssues(validated.error.issues)}`);
      }

      result = mergeConfig(validated.data);
    }
  }

  const envOverrides: string[] = [];
  applyEnvOverrides(result, envOverrides);

  return { config: result, configPath, configFileExists, envOverrides };
}

export function getConfigPath(configPath?: string): string {
  if (configPath) {
    return expandTilde(configPath);
  }
  return resolveAppPaths().configFile;
}

function coerceValue(value: string): string | number | boolean {
  const numValue = Number(value);
  if (!isNaN(numValue) && value.trim() !== '') {
    return numValue;
  }
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export function setConfigValue(key: string, value: string, options: LoadConfigOptions = {}): void {
  const configPath = getConfigPath(options.configPath);

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}. Run 'parley config init' first.`);
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch {
    throw new ConfigError(`Failed to read config file: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(fileContent);
  } catch {
    throw new ConfigError(`Failed to parse config file: ${configPath}`);
  }
  const doc: Record<string, unknown> = isRecord(parsed) ? parsed : {};

  const keys = key.split('.').filter(part => part.length > 0);
  const lastKey = keys.pop();
  if (!lastKey) {
    throw new ConfigError('Config key is required');
  }

  let current = doc;
  for (const part of keys) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[lastKey] = coerceValue(value);

  const validated = ConfigSchema.safeParse(stripNullValues(doc));
  if (!validated.success) {
    throw new ConfigError(`Invalid config after setting ${key}: ${formatIssues(validated.error.issues)}`);
  }

  writeFileSync(configPath, stringify(doc), 'utf-8');
}

/** Writes `content` unless a config file is already there. Returns false when it was kept. */
export function writeConfigTemplate(content: string, options: LoadConfigOptions = {}): boolean {
  const configPath = getConfigPath(options.configPath);
  if (existsSync(configPath)) {
    return false;
  }
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, content, 'utf-8');
  return true;
}
