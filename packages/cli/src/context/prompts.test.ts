import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { parse } from 'yaml';
import { createSilentLogger } from '@parley/core';
import { loadModelPrompts, getModelPrompt, DEFAULT_PROMPT } from './prompts.js';
import type { ModelPrompts } from './types.js';

let dir: string;
let promptsFile: string;
const logger = createSilentLogger();

beforeEach(() => {
  dir = mkdtempSync(resolve(tmpdir(), 'parley-prompts-'));
  promptsFile = resolve(dir, 'home', 'prompts.yaml');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadModelPrompts', () => {
  it('creates the file with the default entry on first run', () => {
    const prompts = loadModelPrompts(promptsFile, logger);

    expect(existsSync(promptsFile)).toBe(true);
    expect(parse(readFileSync(promptsFile, 'utf-8'))).toEqual({ _default: DEFAULT_PROMPT });
    expect(prompts).toEqual({ _default: DEFAULT_PROMPT });
  });

  it('reads model entries and fills defaults', () => {
    loadModelPrompts(promptsFile, logger);
    writeFileSync(promptsFile, 'llama:\n  system_prompt: You are Llama.\nqwen:\n  name: Qwen\n  description: Coder\n  system_prompt: You write code.\n');

    const prompts = loadModelPrompts(promptsFile, logger);

    expect(prompts['llama']).toEqual({ name: 'Default', description: '', system_prompt: 'You are Llama.' });
    expect(prompts['qwen']?.name).toBe('Qwen');
    expect(prompts['_default']).toEqual(DEFAULT_PROMPT);
  });

  it('skips entries without a system prompt', () => {
    loadModelPrompts(promptsFile, logger);
    writeFileSync(promptsFile, 'broken:\n  name: Broken\n');

    expect(Object.keys(loadModelPrompts(promptsFile, logger))).toEqual(['_default']);
  });

  it('falls back to the default when the file cannot be parsed', () => {
    loadModelPrompts(promptsFile, logger);
    writeFileSync(promptsFile, 'key: [unclosed\n');

    expect(loadModelPrompts(promptsFile, logger)).toEqual({ _default: DEFAULT_PROMPT });
  });
});

describe('getModelPrompt', () => {
  const prompts: ModelPrompts = {
    _default: { name: 'Fallback', description: '', system_prompt: 'Fallback prompt.' },
    _hidden: { name: 'Hidden', description: '', system_prompt: 'Never matched.' },
    llama: { name: 'Llama', description: '', system_prompt: 'Llama prompt.' },
    'deepseek-coder-v2': { name: 'DeepSeek', description: '', system_prompt: 'DeepSeek prompt.' },
  };

  it('matches on the base name before the tag', () => {
    expect(getModelPrompt('Llama3.1:8b', prompts).system_prompt).toBe('Llama prompt.');
  });

  it('matches a key that contains the base name', () => {
    expect(getModelPrompt('deepseek-coder:6.7b', prompts).system_prompt).toBe('DeepSeek prompt.');
  });

  it('falls back to _default when nothing matches', () => {
    expect(getModelPrompt('mistral:latest', prompts).system_prompt).toBe('Fallback prompt.');
  });

  it('never matches underscore keys by name', () => {
    expect(getModelPrompt('_hidden', prompts).system_prompt).toBe('Fallback prompt.');
  });

  it('falls back to the built-in default without _default', () => {
    expect(getModelPrompt('mistral', {})).toEqual(DEFAULT_PROMPT);
  });
});
