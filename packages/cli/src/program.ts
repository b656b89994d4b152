import { Command } from 'commander';
import chalk from 'chalk';
import React from 'react';
import { render } from 'ink';
import { loadConfigWithMeta } from './config/index.js';
import { getConfig, setActiveConfig, type GlobalOptions } from './context.js';
import { resolveAppPaths } from './paths.js';
import { createAppLogger, createControllerFactory } from './runtime.js';
import { createSessionStore } from './chat/store.js';
import { ChatApp } from './chat/index.js';
import { registerConfigCommand } from './commands/config.js';
import { registerSessionsCommand } from './commands/sessions.js';
import { registerKeygenCommand } from './commands/keygen.js';

export const VERSION = '0.1.0';

export interface ChatOptions extends GlobalOptions {
  model?: string;
  resume?: string;
  continue?: boolean;
  persona?: string;
}

// These run before a config file exists, or do not need one.
const CONFIG_FREE_COMMANDS = ['config init', 'config path', 'keygen'];

async function runChat(options: ChatOptions): Promise<void> {
  const config = getConfig();
  const paths = resolveAppPaths();
  const logger = createAppLogger(config, paths, options.verbose);
  const createController = createControllerFactory({ config, paths, logger });
  const recentSessions = createSessionStore(config, paths.sessionsDir, logger).listSessions();

  logger.info({ host: config.host, model: options.model ?? config.default_model }, 'Starting chat');

  const { waitUntilExit } = render(
    React.createElement(ChatApp, {
      createController,
      logger,
      version: VERSION,
      host: config.host,
      recentSessions,
      model: options.model,
      persona: options.persona,
      resume: options.resume,
      continueLatest: options.continue,
    }),
    { exitOnCtrlC: false },
  );

  await waitUntilExit();
  logger.info('Chat ended');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('parley')
    .description('Terminal chat for local models with rolling summaries and saved sessions')
    .version(VERSION)
    .option('-m, --model <name>', 'Model to chat with (default: default_model)')
    .option('-r, --resume <ref>', 'Resume a saved session by number, id or id prefix')
    .option('--continue', 'Continue the most recently updated session')
    .option('-p, --persona <name>', 'Start with a persona active')
    .option('-v, --verbose', 'Log at debug level')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: ChatOptions) => {
      await runChat(options);
    });

  registerSessionsCommand(program);
  registerConfigCommand(program);
  registerKeygenCommand(program);

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const chain = getCommandChain(actionCommand, program).join(' ');
    if (CONFIG_FREE_COMMANDS.includes(chain)) {
      return;
    }

    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    const { config, configPath, configFileExists, envOverrides } = loadConfigWithMeta({ configPath: opts.config });

    // First run: no file yet, but the environment already points somewhere.
    if (!configFileExists && envOverrides.length > 0) {
      console.error(chalk.cyan(`  Using ${envOverrides.join(', ')} from environment.`));
      console.error(chalk.dim('  Run "parley config init" to create a config file for more options.\n'));
    }

    setActiveConfig({ config, configPath, envOverrides });
  });

  return program;
}

export function getCommandChain(cmd: Command, root: Command): string[] {
  const chain: string[] = [];
  let current: Command | null = cmd;
  while (current && current !== root) {
    chain.unshift(current.name());
    current = current.parent;
  }
  return chain;
}
