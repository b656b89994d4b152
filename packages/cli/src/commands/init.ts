import chalk from 'chalk';
import { existsSync, mkdirSync } from 'node:fs';
import { writeConfigTemplate } from '../config/index.js';
import { expandTilde, resolveAppPaths } from '../paths.js';

export interface InitCommandOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: (...args: unknown[]) => void;
}

export const CONFIG_TEMPLATE = `# parley configuration
# String values may read the environment: env:NAME, $NAME or \${NAME}.

# OpenAI-compatible generation server (Ollama by default)
host: http://localhost:11434
default_model: llama3.1
render_markdown: true

context:
  token_budget: 8192      # estimated tokens before older turns are summarized; 0 disables
  keep_last: 6            # recent messages never folded into the summary
  autosummarize: true
  # summary_model: llama3.1

# profiles:
#   coding:
#     model: qwen2.5-coder
#     temperature: 0.2
#     system_prompt: Prefer short answers with code.
#     description: Coding help
#     auto_apply: true
# model_profiles:
#   llama3:
#     temperature: 0.7
# active_profile: coding

sessions:
  retention_count: 200    # 0 keeps everything
  retention_days: 0       # 0 disables age-based pruning
  auto_save: false

security:
  mask_sensitive: false
  encryption_enabled: false
  # Generate a key with "parley keygen". PARLEY_KEY in the environment wins.
  # encryption_key: env:PARLEY_KEY
  encrypt_exports: false

export_dir: ~/parley-chats

logging:
  level: info
`;

export async function initCommand(options: InitCommandOptions = {}): Promise<void> {
  const log = options.logger ?? console.log;
  const paths = resolveAppPaths(options.env);
  const configPath = options.configPath ? expandTilde(options.configPath) : paths.configFile;

  for (const dir of [paths.home, paths.sessionsDir, paths.personasDir]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
      log(chalk.green('Created directory:'), dir);
    }
  }

  if (!writeConfigTemplate(CONFIG_TEMPLATE, { configPath })) {
    log(chalk.yellow('Config already exists at:'), configPath);
    log(chalk.yellow('Run with --config <path> to use a different location.'));
    return;
  }

  log(chalk.green('Created config file:'), configPath);
  log('');
  log(chalk.cyan('Next steps:'));
  log('  1. Edit', configPath);
  log('  2. Start your model server (for example', chalk.green('ollama serve') + ')');
  log('  3. Run', chalk.green('parley'));
}
