import { generateText, streamText, type LanguageModel, type ModelMessage } from 'ai';
import type { Message } from '../conversation/types.js';

export interface LLMCallOptions {
  /** Resolved AI SDK LanguageModel instance. */
  model: LanguageModel;
  /** Conversation messages, system messages included. */
  messages: ModelMessage[];
  maxOutputTokens?: number;
  temperature?: number;
  /** Abort signal for cancellation. */
  abortSignal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  usage: { inputTokens: number; outputTokens: number };
}

export interface LLMStreamResult {
  /** Async iterable of text chunks. */
  stream: AsyncIterable<string>;
  /** Resolves after the stream finishes with the full response + usage. */
  response: Promise<LLMResponse>;
}

/**
 * Convert transcript messages to AI SDK messages. Attachments are base64
 * images and only travel on user messages.
 */
export function toModelMessages(messages: readonly Message[]): ModelMessage[] {
  return messages.map((msg): ModelMessage => {
    const { content } = msg;
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: content.text };
      case 'assistant':
        return { role: 'assistant', content: content.text };
      case 'user':
        if (content.type === 'attachments') {
          return {
            role: 'user',
            content: [
              { type: 'text', text: content.text },
              ...content.attachments.map(image => ({ type: 'image' as const, image })),
            ],
          };
        }
        return { role: 'user', content: content.text };
    }
  });
}

/** Single-shot LLM call (non-streaming). */
export async function callLLM(options: LLMCallOptions): Promise<LLMResponse> {
  const result = await generateText({
    model: options.model,
    messages: options.messages,
    maxOutputTokens: options.maxOutputTokens,
    temperature: options.temperature,
    abortSignal: options.abortSignal,
  });

  return {
    content: result.text,
    usage: {
      inputTokens: result.usage.inputTokens ?? 0,
      outputTokens: result.usage.outputTokens ?? 0,
    },
  };
}

/**
 * Streaming LLM call.
 *
 * Stream errors are reported through `onError` rather than thrown from the
 * text stream, so the response promise rejects with the captured error.
 */
export function streamLLM(options: LLMCallOptions): LLMStreamResult {
  let streamError: unknown;
  let failed = false;

  const result = streamText({
    model: options.model,
    messages: options.messages,
    maxOutputTokens: options.maxOutputTokens,
    temperature: options.temperature,
    abortSignal: options.abortSignal,
    onError: ({ error }) => {
      failed = true;
      streamError = error;
    },
  });

  const response = (async (): Promise<LLMResponse> => {
    let fullText: string;
    let inputTokens: number;
    let outputTokens: number;
    try {
      fullText = await result.text;
      const usage = await result.usage;
      inputTokens = usage.inputTokens ?? 0;
      outputTokens = usage.outputTokens ?? 0;
    } catch (err) {
      throw failed ? streamError : err;
    }
    if (failed) throw streamError;

    return {
      content: fullText,
      usage: { inputTokens, outputTokens },
    };
  })();

  return {
    stream: result.textStream,
    response,
  };
}
