import type { PromptResolver, ResolvedProfile } from '@parley/core';
import type { ProfileConfig } from '../config/index.js';
import { findPersona } from './personas.js';
import { getModelPrompt } from './prompts.js';
import type { LoadedPersona, ModelPrompts } from './types.js';

export interface ProfileSettings {
  profiles: Record<string, ProfileConfig>;
  model_profiles: Record<string, ProfileConfig>;
  active_profile?: string;
}

export interface MatchedProfile {
  name: string;
  profile: ProfileConfig;
}

function matchesModel(model: string, key: string): boolean {
  return model === key || model.startsWith(key) || model.includes(key);
}

/**
 * The longest matching `model_profiles` key wins; failing that, the first
 * `auto_apply` profile whose model matches.
 */
export function findModelProfile(model: string, settings: ProfileSettings): MatchedProfile | undefined {
  const name = model.toLowerCase();
  let best: MatchedProfile | undefined;

  for (const [key, profile] of Object.entries(settings.model_profiles)) {
    const keyLower = key.toLowerCase();
    if (matchesModel(name, keyLower) && (!best || keyLower.length > best.name.length)) {
      best = { name: keyLower, profile };
    }
  }
  if (best) return best;

  for (const [profileName, profile] of Object.entries(settings.profiles)) {
    if (!profile.auto_apply || !profile.model) continue;
    if (matchesModel(name, profile.model.toLowerCase())) {
      return { name: profileName, profile };
    }
  }
  return undefined;
}

export class ProfileResolver implements PromptResolver {
  private settings: ProfileSettings;
  private prompts: ModelPrompts;
  private personas: LoadedPersona[];

  constructor(settings: ProfileSettings, prompts: ModelPrompts, personas: LoadedPersona[]) {
    this.settings = settings;
    this.prompts = prompts;
    this.personas = personas;
  }

  get activeProfile(): string | undefined {
    return this.settings.active_profile;
  }

  get profiles(): Record<string, ProfileConfig> {
    return this.settings.profiles;
  }

  get availablePersonas(): LoadedPersona[] {
    return this.personas;
  }

  /** Returns false when the name is not a configured profile. */
  setActiveProfile(name: string | undefined): boolean {
    if (name !== undefined && !this.settings.profiles[name]) {
      return false;
    }
    this.settings = { ...this.settings, active_profile: name };
    return true;
  }

  modelPrompt(model: string): string {
    return getModelPrompt(model, this.prompts).system_prompt;
  }

  resolveProfile(model: string): ResolvedProfile {
    const resolved: ResolvedProfile = { prompt: '' };

    const matched = findModelProfile(model, this.settings);
    if (matched) {
      resolved.name = matched.name;
      if (matched.profile.system_prompt) resolved.prompt = matched.profile.system_prompt;
      if (matched.profile.temperature !== undefined) resolved.temperature = matched.profile.temperature;
    }

    const activeName = this.settings.active_profile;
    const active = activeName ? this.settings.profiles[activeName] : undefined;
    if (activeName && active) {
      resolved.name = activeName;
      if (active.system_prompt) resolved.prompt = active.system_prompt;
      if (active.temperature !== undefined) resolved.temperature = active.temperature;
    }

    return resolved;
  }

  personaPrompt(name: string): string | undefined {
    return findPersona(name, this.personas)?.persona.system_prompt;
  }
}
