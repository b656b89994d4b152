import { z } from 'zod';

export const PersonaSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  system_prompt: z.string().min(1),
});

export const PromptEntrySchema = z.object({
  name: z.string().default('Default'),
  description: z.string().default(''),
  system_prompt: z.string(),
}).passthrough();

export const PromptsFileSchema = z.record(z.string(), z.unknown());
