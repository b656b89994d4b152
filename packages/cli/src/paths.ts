import { homedir } from 'os';
import { resolve } from 'path';

export const HOME_ENV = 'PARLEY_HOME';

export interface AppPaths {
  home: string;
  configFile: string;
  logFile: string;
  sessionsDir: string;
  personasDir: string;
  promptsFile: string;
}

export function expandTilde(path: string, homeDirectory: string = homedir()): string {
  if (path === '~') {
    return homeDirectory;
  }
  if (path.startsWith('~/')) {
    return resolve(homeDirectory, path.slice(2));
  }
  return path;
}

/** Everything parley keeps on disk hangs off `$PARLEY_HOME` (default `~/.parley`). */
export function resolveAppPaths(env: NodeJS.ProcessEnv = process.env): AppPaths {
  const configured = env[HOME_ENV]?.trim();
  const home = configured ? resolve(expandTilde(configured)) : resolve(homedir(), '.parley');
  return {
    home,
    configFile: resolve(home, 'config.yaml'),
    logFile: resolve(home, 'parley.log'),
    sessionsDir: resolve(home, 'sessions'),
    personasDir: resolve(home, 'personas'),
    promptsFile: resolve(home, 'prompts.yaml'),
  };
}
