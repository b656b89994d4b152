export type MessageRole = 'system' | 'user' | 'assistant';

export interface TextContent {
  type: 'text';
  text: string;
}

/** Text plus base64-encoded attachments (images). */
export interface AttachmentContent {
  type: 'attachments';
  text: string;
  attachments: string[];
}

export type MessageContent = TextContent | AttachmentContent;

export interface Message {
  role: MessageRole;
  content: MessageContent;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}
