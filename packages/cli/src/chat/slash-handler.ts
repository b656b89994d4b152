import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { Logger } from '@parley/core';
import { getCommandList, type SlashCommand } from './commands.js';
import type { ChatController } from './controller.js';
import { EXPORT_FORMATS, isExportFormat } from './export.js';
import { expandTilde } from '../paths.js';

export type NoticeTone = 'info' | 'success' | 'error';

/** What the UI should do after a slash command ran. */
export type SlashResult =
  | { type: 'notice'; tone: NoticeTone; text: string }
  | { type: 'retry' }
  | { type: 'edit'; text: string }
  | { type: 'send'; text: string; attachments: string[] }
  | { type: 'attach'; attachment: string; fileName: string }
  | { type: 'quit' };

function notice(text: string, tone: NoticeTone = 'info'): SlashResult {
  return { type: 'notice', tone, text };
}

function usage(name: string, args: string): SlashResult {
  return notice(`Usage: /${name} ${args}`, 'error');
}

export function formatHelp(): string {
  return getCommandList()
    .map(cmd => `/${cmd.name}${cmd.usage ? ` ${cmd.usage}` : ''}  ${cmd.description}`)
    .join('\n');
}

function formatSessions(controller: ChatController): string {
  const sessions = controller.listSessions();
  if (sessions.length === 0) return 'No saved sessions.';
  return sessions
    .map((s, i) => {
      const current = s.id === controller.currentSessionId ? ' *' : '';
      const tags = s.tags.length > 0 ? ` [${s.tags.join(', ')}]` : '';
      const lock = s.encrypted ? ' (encrypted)' : '';
      return `${i + 1}. ${s.id}  ${s.title}  ${s.message_count} msgs${tags}${lock}${current}`;
    })
    .join('\n');
}

function handlePersona(controller: ChatController, args: string): SlashResult {
  if (!args) {
    const active = controller.engine.persona;
    const lines = controller.personas.map(name => `  ${name}${name === active ? ' *' : ''}`);
    return notice(['Personas:', ...lines, 'Usage: /persona <name> or /persona off'].join('\n'));
  }
  if (args.toLowerCase() === 'off') {
    controller.setPersona(null);
    return notice('Persona cleared', 'success');
  }
  const name = args.toLowerCase();
  if (!controller.setPersona(name)) {
    return notice(`Persona not found: ${args}`, 'error');
  }
  return notice(`Persona: ${name}`, 'success');
}

function handleProfile(controller: ChatController, args: string): SlashResult {
  const profiles = controller.profiles;
  if (!args) {
    const names = Object.keys(profiles);
    if (names.length === 0) return notice('No profiles configured.');
    const lines = names.map(name => {
      const p = profiles[name];
      const marker = name === controller.activeProfile ? ' *' : '';
      return `  ${name} (${p?.model ?? '-'}, ${p?.temperature ?? '-'})${marker}`;
    });
    return notice(['Profiles:', ...lines, 'Usage: /profile <name> or /profile off'].join('\n'));
  }
  if (args === 'off') {
    controller.setProfile(undefined);
    return notice('Profile cleared', 'success');
  }
  if (!controller.setProfile(args)) {
    return notice(`Profile not found: ${args}`, 'error');
  }
  return notice(`Profile: ${args} (model ${controller.engine.model})`, 'success');
}

function handleTemperature(controller: ChatController, args: string): SlashResult {
  if (!args) {
    const current = controller.engine.temperature;
    return notice(`Temperature: ${current === undefined ? 'model default' : current}`);
  }
  if (args === 'off') {
    controller.setTemperature(undefined);
    return notice('Temperature reset to the model default', 'success');
  }
  const value = Number(args);
  if (!Number.isFinite(value) || value < 0 || value > 2) {
    return notice('Temperature must be a number between 0 and 2', 'error');
  }
  controller.setTemperature(value);
  return notice(`Temperature: ${value}`, 'success');
}

function handleContext(controller: ChatController): SlashResult {
  const status = controller.contextStatus();
  const budget = status.tokenBudget > 0 ? String(status.tokenBudget) : 'unlimited';
  return notice([
    `Context: ~${status.estimatedTokens} / ${budget} tokens`,
    `Summary: ~${status.summaryTokens} tokens`,
    `Autosummarize: ${status.autosummarize ? 'on' : 'off'}, keep last ${status.keepLast}`,
    `Summary model: ${status.summaryModel ?? controller.engine.model}`,
  ].join('\n'));
}

function handleSearch(controller: ChatController, args: string): SlashResult {
  if (!args) return usage('search', '<text>');
  const hits = controller.search(args);
  if (hits.length === 0) return notice(`No matches for "${args}"`);
  const lines = hits.map(hit => `  #${hit.index + 1} ${hit.role}: ${hit.snippet}`);
  return notice([`${hits.length} match${hits.length === 1 ? '' : 'es'}:`, ...lines].join('\n'));
}

function handleImage(args: string): SlashResult {
  if (!args) return usage('img', '<path> [prompt]');
  const spaceIndex = args.search(/\s/);
  const path = spaceIndex === -1 ? args : args.slice(0, spaceIndex);
  const prompt = spaceIndex === -1 ? '' : args.slice(spaceIndex + 1).trim();

  const filePath = resolve(expandTilde(path));
  const attachment = readFileSync(filePath).toString('base64');
  if (prompt) {
    return { type: 'send', text: prompt, attachments: [attachment] };
  }
  return { type: 'attach', attachment, fileName: path };
}

async function dispatch(command: SlashCommand, controller: ChatController): Promise<SlashResult> {
  const { args } = command;

  switch (command.type) {
    case 'help':
      return notice(formatHelp());
    case 'clear':
      controller.newConversation();
      return notice('Started a new conversation', 'success');
    case 'model':
      if (!args) return notice(`Model: ${controller.engine.model}`);
      controller.switchModel(args);
      return notice(`Model: ${args}`, 'success');
    case 'persona':
      return handlePersona(controller, args);
    case 'profile':
      return handleProfile(controller, args);
    case 'temp':
      return handleTemperature(controller, args);
    case 'summarize':
      return (await controller.summarize())
        ? notice('Conversation summarized', 'success')
        : notice('Nothing was summarized', 'error');
    case 'context':
      return handleContext(controller);
    case 'tokens': {
      const stats = controller.tokenStats();
      return notice(`Tokens: ${stats.promptTokens} prompt, ${stats.completionTokens} completion, ${stats.totalTokens} total`);
    }
    case 'search':
      return handleSearch(controller, args);
    case 'save': {
      const meta = controller.save();
      return notice(`Saved session ${meta.id}`, 'success');
    }
    case 'sessions':
      return notice(formatSessions(controller));
    case 'load': {
      if (!args) return usage('load', '<ref>');
      const meta = controller.load(args);
      return meta
        ? notice(`Loaded "${meta.title}" (${meta.message_count} messages)`, 'success')
        : notice(`Session not found: ${args}`, 'error');
    }
    case 'delete': {
      if (!args) return usage('delete', '<ref>');
      const result = controller.delete(args);
      return result
        ? notice(`Deleted session ${result.meta.id}`, 'success')
        : notice(`Session not found: ${args}`, 'error');
    }
    case 'tag':
      if (!args) return usage('tag', '<tag>');
      return controller.addTag(args)
        ? notice(`Tagged: ${args}`, 'success')
        : notice(`Already tagged: ${args}`);
    case 'untag':
      if (!args) return usage('untag', '<tag>');
      return controller.removeTag(args)
        ? notice(`Removed tag: ${args}`, 'success')
        : notice(`Not tagged: ${args}`, 'error');
    case 'title':
      if (!args) return notice(`Title: ${controller.title}`);
      controller.rename(args);
      return notice(`Title: ${args}`, 'success');
    case 'retry':
      return { type: 'retry' };
    case 'edit':
      if (!args) return usage('edit', '<text>');
      return { type: 'edit', text: args };
    case 'img':
      return handleImage(args);
    case 'export': {
      const format = args.toLowerCase() || 'md';
      if (!isExportFormat(format)) {
        return notice(`Export format must be one of: ${EXPORT_FORMATS.join(', ')}`, 'error');
      }
      return notice(`Exported to ${controller.export(format)}`, 'success');
    }
    case 'markdown': {
      const value = args.toLowerCase();
      if (value && value !== 'on' && value !== 'off') return usage('markdown', '[on|off]');
      const enabled = value ? value === 'on' : !controller.settings.render_markdown;
      controller.setRenderMarkdown(enabled);
      return notice(`Markdown rendering ${enabled ? 'on' : 'off'}`, 'success');
    }
    case 'quit':
      return { type: 'quit' };
    case 'unknown':
      return notice(`Unknown command: ${command.raw.split(/\s/)[0]}. Type /help for a list.`, 'error');
  }
}

/** Runs a slash command; failures come back as error notices. */
export async function handleSlashCommand(
  command: SlashCommand,
  controller: ChatController,
  logger: Logger,
): Promise<SlashResult> {
  try {
    return await dispatch(command, controller);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ err: error, command: command.type }, 'Command failed');
    return notice(message, 'error');
  }
}
