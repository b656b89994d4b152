import type { Message, MessageContent, MessageRole } from './types.js';

/** Reserved prefix of the rolling-summary system message. */
export const SUMMARY_MARKER = '## Conversation Summary';

export function textContent(text: string): MessageContent {
  return { type: 'text', text };
}

export function createMessage(role: MessageRole, text: string, attachments?: readonly string[]): Message {
  if (attachments && attachments.length > 0) {
    return { role, content: { type: 'attachments', text, attachments: [...attachments] } };
  }
  return { role, content: textContent(text) };
}

export function messageText(message: Message): string {
  return message.content.text;
}

/** Replace the text of a message, keeping any attachments. */
export function withText(message: Message, text: string): Message {
  switch (message.content.type) {
    case 'text':
      return { role: message.role, content: textContent(text) };
    case 'attachments':
      return {
        role: message.role,
        content: { type: 'attachments', text, attachments: [...message.content.attachments] },
      };
  }
}

export function isSummaryMessage(message: Message): boolean {
  return message.role === 'system' && message.content.type === 'text' && message.content.text.startsWith(SUMMARY_MARKER);
}

export function isBaseSystemMessage(message: Message): boolean {
  return message.role === 'system' && !isSummaryMessage(message);
}

export function findSummaryIndex(messages: readonly Message[]): number {
  return messages.findIndex(isSummaryMessage);
}

export function findBaseSystemIndex(messages: readonly Message[]): number {
  return messages.findIndex(isBaseSystemMessage);
}

export function conversationMessages(messages: readonly Message[]): Message[] {
  return messages.filter(m => m.role !== 'system');
}

/** Summary text carried by a marker message, or empty. */
export function extractSummary(messages: readonly Message[]): string {
  const summaryMessage = messages.find(isSummaryMessage);
  if (!summaryMessage) return '';
  return summaryMessage.content.text.slice(SUMMARY_MARKER.length).trim();
}

export function extractBasePrompt(messages: readonly Message[]): string {
  const base = messages.find(isBaseSystemMessage);
  return base ? base.content.text : '';
}

export function cloneMessages(messages: readonly Message[]): Message[] {
  return messages.map(m => withText(m, m.content.text));
}
