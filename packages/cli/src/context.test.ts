import { afterEach, describe, expect, it } from 'vitest';
import { ConfigDefaults, ConfigError } from './config/index.js';
import { clearActiveConfig, getActiveConfig, getConfig, setActiveConfig } from './context.js';

afterEach(() => {
  clearActiveConfig();
});

describe('active config', () => {
  it('throws before a config is loaded', () => {
    expect(() => getConfig()).toThrow(ConfigError);
    expect(() => getConfig()).toThrow('Config not loaded. Run "parley config init" first.');
  });

  it('returns what was set', () => {
    setActiveConfig({ config: ConfigDefaults, configPath: '/tmp/parley/config.yaml', envOverrides: ['PARLEY_HOST'] });

    expect(getConfig()).toBe(ConfigDefaults);
    expect(getActiveConfig().envOverrides).toEqual(['PARLEY_HOST']);
  });
});
