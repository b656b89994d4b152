import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { Logger } from '@parley/core';
import { PromptEntrySchema, PromptsFileSchema } from './schemas.js';
import type { ModelPrompts, PromptEntry } from './types.js';

export const DEFAULT_PROMPT_KEY = '_default';

export const DEFAULT_PROMPT: PromptEntry = {
  name: 'Default',
  description: 'General assistant',
  system_prompt: 'You are a helpful AI assistant.',
};

/**
 * Reads the model prompt table, writing one holding only `_default` on first run.
 * Entries that fail validation are logged and skipped.
 */
export function loadModelPrompts(promptsFile: string, logger: Logger): ModelPrompts {
  if (!existsSync(promptsFile)) {
    mkdirSync(dirname(promptsFile), { recursive: true });
    writeFileSync(promptsFile, stringifyYaml({ [DEFAULT_PROMPT_KEY]: DEFAULT_PROMPT }), 'utf-8');
    logger.info({ promptsFile }, 'Created default prompts file');
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(promptsFile, 'utf-8'));
  } catch (error) {
    logger.error({ promptsFile, err: error }, 'Failed to read prompts file');
    return { [DEFAULT_PROMPT_KEY]: { ...DEFAULT_PROMPT } };
  }

  const file = PromptsFileSchema.safeParse(raw ?? {});
  const prompts: ModelPrompts = {};
  if (file.success) {
    for (const [key, value] of Object.entries(file.data)) {
      const entry = PromptEntrySchema.safeParse(value);
      if (entry.success) {
        prompts[key] = entry.data;
      } else {
        logger.warn({ promptsFile, key }, 'Skipping invalid prompt entry');
      }
    }
  } else {
    logger.warn({ promptsFile }, 'Prompts file is not a mapping');
  }

  if (!prompts[DEFAULT_PROMPT_KEY]) {
    prompts[DEFAULT_PROMPT_KEY] = { ...DEFAULT_PROMPT };
  }
  return prompts;
}

/** Fuzzy lookup on the model's base name (the part before `:`). */
export function getModelPrompt(model: string, prompts: ModelPrompts): PromptEntry {
  const base = model.split(':')[0]?.toLowerCase() ?? '';

  for (const [key, value] of Object.entries(prompts)) {
    if (key.startsWith('_')) continue;
    const keyLower = key.toLowerCase();
    if (keyLower === base || keyLower.includes(base) || base.includes(keyLower)) {
      return value;
    }
  }

  return prompts[DEFAULT_PROMPT_KEY] ?? DEFAULT_PROMPT;
}
