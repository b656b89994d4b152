import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'yaml';
import { initCommand } from './init.js';
import { getActiveConfig, type GlobalOptions } from '../context.js';
import { setConfigValue, getConfigPath, type Config } from '../config/index.js';

const REDACTED = '********';

/** A copy of the config that is safe to print. */
export function redactConfig(config: Config): Config {
  const copy = structuredClone(config);
  if (copy.security.encryption_key) {
    copy.security.encryption_key = REDACTED;
  }
  return copy;
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage parley configuration');

  config
    .command('init')
    .description('Create a config file and the data directories under ~/.parley/')
    .action(async (_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      await initCommand({ configPath: globalOpts.config });
    });

  config
    .command('show')
    .description('Show the effective configuration')
    .option('--json', 'Print JSON instead of YAML')
    .action((options: { json?: boolean }) => {
      const { config: loaded, configPath, envOverrides } = getActiveConfig();
      const cfg = redactConfig(loaded);

      if (options.json) {
        console.log(JSON.stringify(cfg, null, 2));
        return;
      }
      console.log(chalk.bold('Current configuration:'), chalk.dim(configPath));
      if (envOverrides.length > 0) {
        console.log(chalk.dim(`Overridden from environment: ${envOverrides.join(', ')}`));
      }
      console.log('');
      console.log(stringify(cfg));
    });

  config
    .command('path')
    .description('Print the config file location')
    .action((_options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();
      console.log(getConfigPath(globalOpts.config));
    });

  config
    .command('set')
    .description('Set a config value')
    .argument('<key>', 'Config key (dot-notation, e.g. context.token_budget)')
    .argument('<value>', 'Value to set')
    .action((key: string, value: string, _options: Record<string, never>, command: Command) => {
      const globalOpts = command.optsWithGlobals<GlobalOptions>();

      setConfigValue(key, value, { configPath: globalOpts.config });

      const configPath = getConfigPath(globalOpts.config);
      console.log(chalk.green(`Set ${chalk.bold(key)} = ${chalk.bold(value)}`));
      console.log(chalk.dim(`Config: ${configPath}`));
    });
}
