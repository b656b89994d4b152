export type { LoadedPersona, Persona, PromptEntry, ModelPrompts } from './types.js';
export { PersonaSchema, PromptEntrySchema, PromptsFileSchema } from './schemas.js';
export { loadAllPersonas, findPersona, BUILT_IN_PERSONAS } from './personas.js';
export { loadModelPrompts, getModelPrompt, DEFAULT_PROMPT, DEFAULT_PROMPT_KEY } from './prompts.js';
export { findModelProfile, ProfileResolver, type ProfileSettings, type MatchedProfile } from './profiles.js';
