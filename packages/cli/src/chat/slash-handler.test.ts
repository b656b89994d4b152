import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { createSilentLogger } from '@parley/core';
import { FakeBackend } from '@parley/core/testing';
import { ConfigDefaults, type Config } from '../config/index.js';
import { ProfileResolver, loadAllPersonas } from '../context/index.js';
import { ChatController } from './controller.js';
import { parseSlashCommand } from './commands.js';
import { handleSlashCommand, formatHelp, type SlashResult } from './slash-handler.js';

let dir: string;
let backend: FakeBackend;
let controller: ChatController;
const logger = createSilentLogger();

function setup(overrides: (config: Config) => void = () => {}): void {
  const config = structuredClone(ConfigDefaults);
  config.export_dir = resolve(dir, 'exports');
  overrides(config);
  const resolver = new ProfileResolver(
    config,
    { _default: { name: 'Default', description: '', system_prompt: 'Base prompt.' } },
    loadAllPersonas(resolve(dir, 'personas')),
  );
  controller = new ChatController({
    config,
    sessionsDir: resolve(dir, 'sessions'),
    backend,
    resolver,
    logger,
    clock: () => new Date('2024-01-02T03:04:05.000Z'),
  });
  controller.start('llama3.1');
}

async function run(input: string): Promise<SlashResult> {
  const command = parseSlashCommand(input);
  if (!command) throw new Error(`not a command: ${input}`);
  return handleSlashCommand(command, controller, logger);
}

beforeEach(() => {
  dir = mkdtempSync(resolve(tmpdir(), 'parley-slash-'));
  backend = new FakeBackend();
  setup();
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('handleSlashCommand', () => {
  it('prints help', async () => {
    expect(await run('/help')).toEqual({ type: 'notice', tone: 'info', text: formatHelp() });
    expect(formatHelp().split('\n')).toContain('/summarize  Fold older messages into the summary now');
    expect(formatHelp().split('\n')).toContain('/load <ref>  Load a session by number, id or id prefix');
  });

  it('reports unknown commands', async () => {
    expect(await run('/foo bar')).toEqual({
      type: 'notice',
      tone: 'error',
      text: 'Unknown command: /foo. Type /help for a list.',
    });
  });

  it('switches and shows the model', async () => {
    expect(await run('/model mistral')).toEqual({ type: 'notice', tone: 'success', text: 'Model: mistral' });
    expect(controller.engine.model).toBe('mistral');
    expect(await run('/model')).toEqual({ type: 'notice', tone: 'info', text: 'Model: mistral' });
  });

  it('validates temperatures', async () => {
    expect(await run('/temp 3')).toMatchObject({ tone: 'error' });
    expect(await run('/temp warm')).toMatchObject({ tone: 'error' });

    await run('/temp 0.7');
    expect(controller.engine.temperature).toBe(0.7);

    await run('/temp off');
    expect(controller.engine.temperature).toBeUndefined();
    expect(await run('/temp')).toEqual({ type: 'notice', tone: 'info', text: 'Temperature: model default' });
  });

  it('sets, lists and clears personas', async () => {
    expect(await run('/persona Teacher')).toEqual({ type: 'notice', tone: 'success', text: 'Persona: teacher' });
    expect(controller.engine.persona).toBe('teacher');

    const listing = await run('/persona');
    expect(listing.type === 'notice' && listing.text.split('\n')).toContain('  teacher *');

    expect(await run('/persona nobody')).toEqual({ type: 'notice', tone: 'error', text: 'Persona not found: nobody' });
    expect(controller.engine.persona).toBe('teacher');

    await run('/persona off');
    expect(controller.engine.persona).toBeNull();
  });

  it('handles profiles', async () => {
    expect(await run('/profile')).toEqual({ type: 'notice', tone: 'info', text: 'No profiles configured.' });
    expect(await run('/profile ghost')).toEqual({ type: 'notice', tone: 'error', text: 'Profile not found: ghost' });
  });

  it('reports token usage', async () => {
    expect(await run('/tokens')).toEqual({
      type: 'notice',
      tone: 'info',
      text: 'Tokens: 0 prompt, 0 completion, 0 total',
    });
  });

  it('shows context status', async () => {
    const result = await run('/context');
    expect(result.type === 'notice' && result.text.split('\n')).toEqual([
      `Context: ~${controller.contextStatus().estimatedTokens} / 8192 tokens`,
      'Summary: ~0 tokens',
      'Autosummarize: on, keep last 6',
      'Summary model: llama3.1',
    ]);
  });

  it('reports when nothing could be summarized', async () => {
    expect(await run('/summarize')).toEqual({ type: 'notice', tone: 'error', text: 'Nothing was summarized' });
  });

  it('searches the conversation', async () => {
    backend.queueReply('Try a trie.');
    await controller.send('Fast prefix lookups?');

    expect(await run('/search trie')).toEqual({
      type: 'notice',
      tone: 'info',
      text: '1 match:\n  #2 assistant: Try a trie.',
    });
    expect(await run('/search zebra')).toEqual({ type: 'notice', tone: 'info', text: 'No matches for "zebra"' });
  });

  it('saves and lists sessions', async () => {
    const saved = await run('/save');
    const id = controller.currentSessionId;

    expect(saved).toEqual({ type: 'notice', tone: 'success', text: `Saved session ${id}` });
    expect(await run('/sessions')).toEqual({ type: 'notice', tone: 'info', text: `1. ${id}  llama3.1  0 msgs *` });
  });

  it('reports unknown session refs', async () => {
    expect(await run('/load 9')).toEqual({ type: 'notice', tone: 'error', text: 'Session not found: 9' });
    expect(await run('/delete abc')).toEqual({ type: 'notice', tone: 'error', text: 'Session not found: abc' });
    expect(await run('/load')).toEqual({ type: 'notice', tone: 'error', text: 'Usage: /load <ref>' });
  });

  it('turns store errors into error notices', async () => {
    setup(config => { config.security.encryption_enabled = true; });

    expect(await run('/save')).toEqual({
      type: 'notice',
      tone: 'error',
      text: 'Encryption is enabled but no encryption key is configured',
    });
  });

  it('tags and renames', async () => {
    expect(await run('/tag work')).toEqual({ type: 'notice', tone: 'success', text: 'Tagged: work' });
    expect(await run('/tag work')).toEqual({ type: 'notice', tone: 'info', text: 'Already tagged: work' });
    expect(await run('/untag play')).toEqual({ type: 'notice', tone: 'error', text: 'Not tagged: play' });
    await run('/title Weekly notes');
    expect(controller.title).toBe('Weekly notes');
  });

  it('validates export formats', async () => {
    expect(await run('/export html')).toEqual({
      type: 'notice',
      tone: 'error',
      text: 'Export format must be one of: md, json, txt',
    });
    expect(await run('/export')).toEqual({
      type: 'notice',
      tone: 'success',
      text: `Exported to ${resolve(dir, 'exports', '20240102_030405_llama3-1.md')}`,
    });
  });

  it('toggles markdown rendering', async () => {
    await run('/markdown');
    expect(controller.settings.render_markdown).toBe(false);
    await run('/markdown on');
    expect(controller.settings.render_markdown).toBe(true);
    expect(await run('/markdown maybe')).toMatchObject({ tone: 'error' });
  });

  it('attaches images as base64', async () => {
    const imagePath = resolve(dir, 'cat.png');
    writeFileSync(imagePath, 'hello');

    expect(await run(`/img ${imagePath}`)).toEqual({ type: 'attach', attachment: 'aGVsbG8=', fileName: imagePath });
    expect(await run(`/img ${imagePath} what is this?`)).toEqual({
      type: 'send',
      text: 'what is this?',
      attachments: ['aGVsbG8='],
    });
  });

  it('reports unreadable images', async () => {
    const result = await run(`/img ${resolve(dir, 'missing.png')}`);
    expect(result).toMatchObject({ type: 'notice', tone: 'error' });
  });

  it('hands turns back to the caller', async () => {
    expect(await run('/retry')).toEqual({ type: 'retry' });
    expect(await run('/edit better question')).toEqual({ type: 'edit', text: 'better question' });
    expect(await run('/edit')).toEqual({ type: 'notice', tone: 'error', text: 'Usage: /edit <text>' });
    expect(await run('/quit')).toEqual({ type: 'quit' });
  });
});
