import { readdirSync, readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Logger } from '@parley/core';
import { PersonaSchema } from './schemas.js';
import type { Persona, LoadedPersona } from './types.js';

export const BUILT_IN_PERSONAS: Persona[] = [
  {
    name: 'developer',
    description: 'Experienced software developer',
    system_prompt: 'You are an experienced software developer. Follow good engineering practice and write clean, readable code. Explain errors in detail and suggest fixes.',
  },
  {
    name: 'teacher',
    description: 'Patient teacher',
    system_prompt: 'You are a patient, understanding teacher. Explain topics simply, give examples and go step by step. Adapt to the level of the student.',
  },
  {
    name: 'assistant',
    description: 'Efficient assistant',
    system_prompt: 'You are a helpful, efficient assistant. Give short, direct answers and skip unnecessary detail.',
  },
  {
    name: 'creative',
    description: 'Creative writer',
    system_prompt: 'You are a creative writer. Come up with original ideas, tell engaging stories, write poems and prose. Use your imagination.',
  },
  {
    name: 'analyst',
    description: 'Detail-oriented analyst',
    system_prompt: 'You are a detail-oriented analyst. Examine and compare data, list pros and cons, and give objective, reasoned assessments.',
  },
  {
    name: 'debug',
    description: 'Debugging specialist',
    system_prompt: 'You are a debugging specialist. Find bugs, explain their causes and propose fixes. Think systematically and consider every plausible scenario.',
  },
  {
    name: 'concise',
    description: 'Answers in as few words as possible',
    system_prompt: 'Answer as briefly as possible. Prefer a single sentence or a short list. Do not repeat the question.',
  },
];

function loadUserPersonas(personasDir: string, logger?: Logger): LoadedPersona[] {
  if (!existsSync(personasDir)) return [];

  const files = readdirSync(personasDir)
    .filter(f => f.endsWith('.yaml') || f.endsWith('.yml'))
    .sort();
  const personas: LoadedPersona[] = [];

  for (const file of files) {
    const filePath = resolve(personasDir, file);
    try {
      const raw: unknown = parseYaml(readFileSync(filePath, 'utf-8'));
      if (raw === null || raw === undefined) continue;

      const result = PersonaSchema.safeParse(raw);
      if (result.success) {
        personas.push({ persona: result.data, filePath, source: 'user' });
      } else {
        logger?.warn({ filePath, issues: result.error.issues.length }, 'Skipping invalid persona file');
      }
    } catch (error) {
      logger?.warn({ filePath, err: error }, 'Skipping unreadable persona file');
    }
  }

  return personas;
}

export function loadAllPersonas(personasDir: string, logger?: Logger): LoadedPersona[] {
  const builtIn: LoadedPersona[] = BUILT_IN_PERSONAS.map(persona => ({
    persona,
    filePath: '<built-in>',
    source: 'built-in' as const,
  }));

  // User personas override built-in by name
  const byName = new Map<string, LoadedPersona>();
  for (const p of builtIn) byName.set(p.persona.name, p);
  for (const p of loadUserPersonas(personasDir, logger)) byName.set(p.persona.name, p);

  return [...byName.values()];
}

export function findPersona(name: string, personas: LoadedPersona[]): LoadedPersona | undefined {
  const wanted = name.toLowerCase();
  return personas.find(p => p.persona.name.toLowerCase() === wanted);
}
