import type { Message } from '../conversation/types.js';

/**
 * Character-based token estimation.
 *
 * Roughly four characters per token. Not tokenizer-exact; it only has to
 * decide when the transcript is getting too large.
 */
const CHARS_PER_TOKEN = 4;

/** Flat cost charged for a message carrying attachments. */
export const ATTACHMENT_TOKEN_ESTIMATE = 256;

export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.max(1, Math.ceil(text.length / CHARS_PER_TOKEN));
}

export function estimateMessageTokens(message: Message): number {
  switch (message.content.type) {
    case 'text':
      return estimateTokens(message.content.text);
    case 'attachments':
      return ATTACHMENT_TOKEN_ESTIMATE;
  }
}

export function estimateMessagesTokens(messages: readonly Message[]): number {
  let total = 0;
  for (const msg of messages) {
    total += estimateMessageTokens(msg);
  }
  return total;
}
