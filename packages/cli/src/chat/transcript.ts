import { randomUUID } from 'node:crypto';
import { conversationMessages, type Message } from '@parley/core';
import type { NoticeTone } from './slash-handler.js';
import type { ChatMessage } from './types.js';

export function noticeMessage(content: string, tone: NoticeTone = 'info', now = Date.now()): ChatMessage {
  return { id: randomUUID(), role: 'system', content, tone, timestamp: now };
}

/**
 * View messages for a restored transcript. System messages (base prompt and
 * summary) are not shown.
 */
export function toChatMessages(messages: readonly Message[], now = Date.now()): ChatMessage[] {
  return conversationMessages(messages).map(message => {
    const attachments = message.content.type === 'attachments' ? message.content.attachments.length : 0;
    return {
      id: randomUUID(),
      role: message.role,
      content: message.content.text,
      timestamp: now,
      ...(attachments > 0 ? { attachmentCount: attachments } : {}),
    };
  });
}
