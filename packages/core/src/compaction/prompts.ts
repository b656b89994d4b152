import type { Message } from '../conversation/types.js';

/** System instruction sent with every summary request unless configured otherwise. */
export const DEFAULT_SUMMARY_PROMPT =
  'Write a short, clear and structured summary. Keep technical terms, ' +
  'skip unnecessary detail. Use bullet points where they help.';

export const ATTACHMENT_PLACEHOLDER = '[attachment]';

function renderMessage(message: Message): string {
  const label = message.role === 'user' ? 'User' : 'Assistant';
  const body = message.content.type === 'attachments' ? ATTACHMENT_PLACEHOLDER : message.content.text;
  return `${label}: ${body}`;
}

/**
 * Build the user content of a summary request: the previous rolling summary
 * (if any) followed by a role-labelled rendering of the messages to fold in.
 */
export function buildSummaryDigest(messages: readonly Message[], previousSummary: string): string {
  const lines: string[] = [];

  if (previousSummary) {
    lines.push('Previous summary:', previousSummary, '');
  }

  lines.push('Messages:');
  for (const msg of messages) {
    lines.push(renderMessage(msg));
  }

  lines.push('', 'Write a new, up-to-date summary.');
  return lines.join('\n');
}
