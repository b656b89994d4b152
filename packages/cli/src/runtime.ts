import { AiSdkBackend, ProviderRegistry, createLogger, type GenerationBackend, type Logger } from '@parley/core';
import type { Config } from './config/index.js';
import type { AppPaths } from './paths.js';
import { ProfileResolver, loadAllPersonas, loadModelPrompts } from './context/index.js';
import { ChatController } from './chat/controller.js';
import type { ControllerHooks } from './chat/hooks/useChat.js';

export interface RuntimeOptions {
  config: Config;
  paths: AppPaths;
  logger: Logger;
  /** Defaults to the OpenAI-compatible endpoint under `config.host`. */
  backend?: GenerationBackend;
}

export function createAppLogger(config: Config, paths: AppPaths, verbose = false): Logger {
  return createLogger({
    level: verbose ? 'debug' : config.logging.level,
    file: paths.logFile,
  });
}

/** Loads prompts and personas and returns a factory for chat controllers. */
export function createControllerFactory(options: RuntimeOptions): (hooks: ControllerHooks) => ChatController {
  const { config, paths, logger } = options;
  const backend = options.backend ?? new AiSdkBackend(new ProviderRegistry({ host: config.host }));
  const resolver = new ProfileResolver(
    config,
    loadModelPrompts(paths.promptsFile, logger),
    loadAllPersonas(paths.personasDir, logger),
  );

  return hooks => new ChatController({
    config,
    sessionsDir: paths.sessionsDir,
    backend,
    resolver,
    logger,
    onEvent: hooks.onEvent,
    onAutosaveError: hooks.onAutosaveError,
  });
}
