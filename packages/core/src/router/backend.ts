import type { Message } from '../conversation/types.js';
import { callLLM, streamLLM, toModelMessages } from './llm.js';
import type { ProviderRegistry } from './providers.js';

export interface GenerationRequest {
  model: string;
  messages: readonly Message[];
  temperature?: number;
  abortSignal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  promptTokens: number;
  completionTokens: number;
}

/** The remote text-generation service as the conversation engine sees it. */
export interface GenerationBackend {
  complete(request: GenerationRequest): Promise<GenerationResult>;
  stream(request: GenerationRequest, onDelta: (delta: string) => void): Promise<GenerationResult>;
}

/** Backend over an OpenAI-compatible endpoint through the AI SDK. */
export class AiSdkBackend implements GenerationBackend {
  constructor(private readonly registry: ProviderRegistry) {}

  async complete(request: GenerationRequest): Promise<GenerationResult> {
    const response = await callLLM({
      model: this.registry.getModel(request.model),
      messages: toModelMessages(request.messages),
      temperature: request.temperature,
      abortSignal: request.abortSignal,
    });
    return {
      text: response.content,
      promptTokens: response.usage.inputTokens,
      completionTokens: response.usage.outputTokens,
    };
  }

  async stream(request: GenerationRequest, onDelta: (delta: string) => void): Promise<GenerationResult> {
    const { stream, response } = streamLLM({
      model: this.registry.getModel(request.model),
      messages: toModelMessages(request.messages),
      temperature: request.temperature,
      abortSignal: request.abortSignal,
    });

    try {
      for await (const delta of stream) {
        if (delta) onDelta(delta);
      }
    } catch (err) {
      // Settle the response so its rejection is not left unhandled.
      await Promise.allSettled([response]);
      throw err;
    }

    const final = await response;
    return {
      text: final.content,
      promptTokens: final.usage.inputTokens,
      completionTokens: final.usage.outputTokens,
    };
  }
}
