import { z } from 'zod';
import type { Message, TokenUsage } from '../conversation/types.js';
import { createMessage } from '../conversation/messages.js';

/** Messages as written to disk: plain text content plus optional base64 attachments. */
export const StoredMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
  attachments: z.array(z.string()).optional(),
  /** Older files named the attachment list `images`. */
  images: z.array(z.string()).optional(),
});

export type StoredMessage = z.input<typeof StoredMessageSchema>;

export const TokenStatsSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().default(0),
  completion_tokens: z.number().int().nonnegative().default(0),
  total_tokens: z.number().int().nonnegative().default(0),
});

export type TokenStats = z.infer<typeof TokenStatsSchema>;

export const SessionMetaSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  model: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  message_count: z.number().int().nonnegative(),
  token_total: z.number().int().nonnegative(),
  tags: z.array(z.string()).default([]),
  encrypted: z.boolean().default(false),
  path: z.string(),
  summary_excerpt: z.string().default(''),
});

export type SessionMeta = z.infer<typeof SessionMetaSchema>;

export const SessionFileSchema = z.object({
  meta: SessionMetaSchema,
  messages: z.array(StoredMessageSchema),
  token_stats: TokenStatsSchema.default({}),
  summary: z.string().default(''),
  base_prompt: z.string().optional(),
  persona: z.string().nullable().optional(),
});

export type SessionFile = z.input<typeof SessionFileSchema>;

/** Entries stay raw so one bad record does not cost the others. */
export const SessionIndexSchema = z.object({
  sessions: z.array(z.unknown()).default([]),
});

export function toStoredMessage(message: Message): StoredMessage {
  switch (message.content.type) {
    case 'text':
      return { role: message.role, content: message.content.text };
    case 'attachments':
      return { role: message.role, content: message.content.text, attachments: [...message.content.attachments] };
  }
}

export function fromStoredMessage(stored: z.infer<typeof StoredMessageSchema>): Message {
  return createMessage(stored.role, stored.content, stored.attachments ?? stored.images);
}

export function toTokenStats(usage: TokenUsage): TokenStats {
  return {
    prompt_tokens: usage.promptTokens,
    completion_tokens: usage.completionTokens,
    total_tokens: usage.totalTokens,
  };
}

export function fromTokenStats(stats: TokenStats): TokenUsage {
  return {
    promptTokens: stats.prompt_tokens,
    completionTokens: stats.completion_tokens,
    totalTokens: stats.total_tokens,
  };
}
