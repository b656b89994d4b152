import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';

export const DEFAULT_HOST = 'http://localhost:11434';

export interface ProviderConfig {
  /** Base URL of the generation server, without the `/v1` suffix. */
  host: string;
  /** Most local servers ignore the key, but the client requires one. */
  apiKey?: string;
}

/** Strip trailing slashes and a trailing `/v1` so the base URL is built once. */
export function normalizeHost(host: string): string {
  let trimmed = host.trim();
  if (!trimmed) return DEFAULT_HOST;
  if (!/^https?:\/\//i.test(trimmed)) {
    trimmed = `http://${trimmed}`;
  }
  trimmed = trimmed.replace(/\/+$/, '');
  if (trimmed.endsWith('/v1')) {
    trimmed = trimmed.slice(0, -3);
  }
  return trimmed;
}

/**
 * Registry that lazily initialises the OpenAI-compatible provider and hands
 * out LanguageModel instances by model-id string.
 */
export class ProviderRegistry {
  private config: ProviderConfig;
  private provider: ReturnType<typeof createOpenAI> | null = null;

  constructor(config: ProviderConfig) {
    this.config = { ...config, host: normalizeHost(config.host) };
  }

  get host(): string {
    return this.config.host;
  }

  get baseURL(): string {
    return `${this.config.host}/v1`;
  }

  /** Return a LanguageModel for the given model-id, creating the provider lazily. */
  getModel(modelId: string): LanguageModel {
    if (!modelId.trim()) {
      throw new Error('Model name is required');
    }
    if (!this.provider) {
      this.provider = createOpenAI({
        baseURL: this.baseURL,
        apiKey: this.config.apiKey ?? 'ollama',
      });
    }
    return this.provider.chat(modelId);
  }
}
