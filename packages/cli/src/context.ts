import { ConfigError, type Config } from './config/index.js';

/** Options every command sees through `optsWithGlobals()`. */
export interface GlobalOptions {
  verbose?: boolean;
  config?: string;
}

/** The config for this process, with where it came from. */
export interface ActiveConfig {
  config: Config;
  configPath: string;
  envOverrides: string[];
}

let active: ActiveConfig | undefined;

export function setActiveConfig(value: ActiveConfig): void {
  active = value;
}

export function getActiveConfig(): ActiveConfig {
  if (!active) {
    throw new ConfigError('Config not loaded. Run "parley config init" first.');
  }
  return active;
}

export function getConfig(): Config {
  return getActiveConfig().config;
}

export function clearActiveConfig(): void {
  active = undefined;
}
