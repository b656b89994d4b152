import { Command } from 'commander';
import chalk from 'chalk';
import type { SessionMeta, SessionStore } from '@parley/core';
import { getConfig, type GlobalOptions } from '../context.js';
import { resolveAppPaths } from '../paths.js';
import { createAppLogger } from '../runtime.js';
import { createSessionStore } from '../chat/store.js';

export type Print = (line: string) => void;

export class SessionNotFoundError extends Error {
  constructor(public readonly ref: string) {
    super(`Session not found: ${ref}`);
    this.name = 'SessionNotFoundError';
  }
}

function resolveSession(store: SessionStore, ref: string): SessionMeta {
  const meta = store.findSession(ref);
  if (!meta) throw new SessionNotFoundError(ref);
  return meta;
}

export function formatSessionLine(meta: SessionMeta, position: number): string {
  const tags = meta.tags.length > 0 ? ` [${meta.tags.join(', ')}]` : '';
  const lock = meta.encrypted ? ' (encrypted)' : '';
  const updated = meta.updated_at.slice(0, 16).replace('T', ' ');
  return `${position}. ${meta.id}  ${meta.title}  ${meta.model}  ${meta.message_count} msgs  ${updated}${tags}${lock}`;
}

export function listSessions(store: SessionStore, options: { tag?: string }, print: Print): void {
  const all = store.listSessions();
  const matches = all
    .map((meta, i) => ({ meta, position: i + 1 }))
    .filter(({ meta }) => !options.tag || meta.tags.includes(options.tag));

  if (matches.length === 0) {
    print(chalk.dim(options.tag ? `No sessions tagged "${options.tag}".` : 'No saved sessions.'));
    return;
  }
  // Positions stay those of the full list so they work with `show 3`.
  for (const { meta, position } of matches) {
    print(formatSessionLine(meta, position));
  }
}

export function showSession(store: SessionStore, ref: string, print: Print): void {
  const meta = resolveSession(store, ref);
  const data = store.loadSession(meta.id);
  if (!data) throw new SessionNotFoundError(ref);

  print(`id:       ${meta.id}`);
  print(`title:    ${meta.title}`);
  print(`model:    ${meta.model}`);
  print(`created:  ${meta.created_at}`);
  print(`updated:  ${meta.updated_at}`);
  print(`messages: ${meta.message_count}`);
  print(`tokens:   ${meta.token_total}`);
  print(`tags:     ${meta.tags.length > 0 ? meta.tags.join(', ') : '-'}`);
  if (data.persona) print(`persona:  ${data.persona}`);
  if (data.summary) {
    print('');
    print(`summary:  ${data.summary}`);
  }

  for (const message of data.messages) {
    if (message.role === 'system') continue;
    const extra = message.content.type === 'attachments'
      ? ` [${message.content.attachments.length} attachment(s)]`
      : '';
    print('');
    print(`${message.role}:${extra}`);
    print(message.content.text);
  }
}

export function deleteSession(store: SessionStore, ref: string, print: Print): void {
  const meta = resolveSession(store, ref);
  store.deleteSession(meta.id);
  print(`Deleted session ${meta.id}`);
}

export function tagSession(
  store: SessionStore,
  ref: string,
  tags: string[],
  options: { remove?: boolean },
  print: Print,
): string[] {
  const meta = resolveSession(store, ref);
  const next = options.remove
    ? meta.tags.filter(tag => !tags.includes(tag))
    : [...meta.tags, ...tags];
  store.updateTags(meta.id, next);

  const updated = store.getSession(meta.id)?.tags ?? [];
  print(`Tags for ${meta.id}: ${updated.length > 0 ? updated.join(', ') : '-'}`);
  return updated;
}

export function retitleSession(store: SessionStore, ref: string, title: string, print: Print): void {
  const meta = resolveSession(store, ref);
  const trimmed = title.trim();
  if (!trimmed) throw new Error('Title must not be empty');
  store.updateTitle(meta.id, trimmed);
  print(`Renamed ${meta.id} to "${trimmed}"`);
}

export function pruneSessions(store: SessionStore, print: Print): string[] {
  const removed = store.pruneSessions();
  if (removed.length === 0) {
    print('Nothing to prune.');
  } else {
    print(`Removed ${removed.length} session${removed.length === 1 ? '' : 's'}:`);
    for (const id of removed) print(`  ${id}`);
  }
  return removed;
}

function openStore(command: Command): SessionStore {
  const { verbose } = command.optsWithGlobals<GlobalOptions>();
  const config = getConfig();
  const paths = resolveAppPaths();
  const logger = createAppLogger(config, paths, verbose);
  return createSessionStore(config, paths.sessionsDir, logger);
}

export function registerSessionsCommand(program: Command): void {
  const sessions = program
    .command('sessions')
    .description('Manage saved conversations');

  const print: Print = line => console.log(line);

  sessions
    .command('list')
    .description('List saved sessions, newest first')
    .option('-t, --tag <tag>', 'Only sessions with this tag')
    .action((options: { tag?: string }, command: Command) => {
      listSessions(openStore(command), options, print);
    });

  sessions
    .command('show')
    .description('Print a saved session')
    .argument('<ref>', 'List position, id or unique id prefix')
    .action((ref: string, _options: Record<string, never>, command: Command) => {
      showSession(openStore(command), ref, print);
    });

  sessions
    .command('delete')
    .description('Delete a saved session')
    .argument('<ref>', 'List position, id or unique id prefix')
    .action((ref: string, _options: Record<string, never>, command: Command) => {
      deleteSession(openStore(command), ref, print);
    });

  sessions
    .command('tag')
    .description('Add tags to a session')
    .argument('<ref>', 'List position, id or unique id prefix')
    .argument('<tags...>', 'Tags to add')
    .option('-r, --remove', 'Remove the tags instead')
    .action((ref: string, tags: string[], options: { remove?: boolean }, command: Command) => {
      tagSession(openStore(command), ref, tags, options, print);
    });

  sessions
    .command('title')
    .description('Rename a session')
    .argument('<ref>', 'List position, id or unique id prefix')
    .argument('<title>', 'New title')
    .action((ref: string, title: string, _options: Record<string, never>, command: Command) => {
      retitleSession(openStore(command), ref, title, print);
    });

  sessions
    .command('prune')
    .description('Apply the retention settings now')
    .action((_options: Record<string, never>, command: Command) => {
      pruneSessions(openStore(command), print);
    });
}
