import type { Logger } from 'pino';
import type { GenerationBackend } from '../router/backend.js';
import type { Message } from '../conversation/types.js';
import { conversationMessages, createMessage } from '../conversation/messages.js';
import { buildSummaryDigest } from './prompts.js';

export const DEFAULT_SUMMARY_KEEP = 6;

export interface SummarySplit {
  toSummarize: Message[];
  keep: Message[];
}

/**
 * Partition the non-system transcript into an older prefix to fold into the
 * summary and the last `keepLast` messages to keep verbatim.
 */
export function splitMessagesForSummary(messages: readonly Message[], keepLast: number): SummarySplit {
  const conversation = conversationMessages(messages);
  const keepCount = Math.max(1, keepLast || DEFAULT_SUMMARY_KEEP);

  if (conversation.length <= keepCount) {
    return { toSummarize: [], keep: conversation };
  }

  return {
    toSummarize: conversation.slice(0, conversation.length - keepCount),
    keep: conversation.slice(conversation.length - keepCount),
  };
}

export interface SummaryRequest {
  backend: GenerationBackend;
  model: string;
  instruction: string;
  messages: readonly Message[];
  previousSummary: string;
  logger: Logger;
  abortSignal?: AbortSignal;
}

export type SummaryOutcome =
  | { ok: true; summary: string; promptTokens: number; completionTokens: number }
  | { ok: false; reason: string };

/** One non-streaming summary call. Backend failures are logged and reported, never thrown. */
export async function requestSummary(request: SummaryRequest): Promise<SummaryOutcome> {
  const { backend, model, instruction, messages, previousSummary, logger } = request;

  if (!model) {
    return { ok: false, reason: 'no summary model' };
  }

  const digest = buildSummaryDigest(messages, previousSummary);

  try {
    const response = await backend.complete({
      model,
      messages: [createMessage('system', instruction), createMessage('user', digest)],
      abortSignal: request.abortSignal,
    });
    const summary = response.text.trim();
    if (!summary) {
      logger.warn({ model }, 'Summary response was empty');
      return { ok: false, reason: 'empty response' };
    }
    logger.debug({ model, messages: messages.length, chars: summary.length }, 'Summary generated');
    return {
      ok: true,
      summary,
      promptTokens: response.promptTokens,
      completionTokens: response.completionTokens,
    };
  } catch (err) {
    logger.error({ err, model }, 'Summary request failed');
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}
