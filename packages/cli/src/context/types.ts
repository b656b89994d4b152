import type { z } from 'zod';
import type { PersonaSchema, PromptEntrySchema } from './schemas.js';

export type Persona = z.infer<typeof PersonaSchema>;
export type PromptEntry = z.infer<typeof PromptEntrySchema>;
export type ModelPrompts = Record<string, PromptEntry>;

export interface LoadedPersona {
  persona: Persona;
  filePath: string;
  source: 'built-in' | 'user';
}
