import { Command } from 'commander';
import chalk from 'chalk';
import { ENCRYPTION_KEY_ENV, generateKey } from '@parley/core';

export interface KeygenOutput {
  out: (line: string) => void;
  err: (line: string) => void;
}

/** Prints a fresh key on stdout so it can be piped; the hint goes to stderr. */
export function keygenCommand(output: KeygenOutput = { out: console.log, err: console.error }): string {
  const key = generateKey();
  output.out(key);
  output.err(chalk.dim(`Export it as ${ENCRYPTION_KEY_ENV} or set security.encryption_key, then enable security.encryption_enabled.`));
  return key;
}

export function registerKeygenCommand(program: Command): void {
  program
    .command('keygen')
    .description('Generate a key for encrypting sessions and exports')
    .action(() => {
      keygenCommand();
    });
}
