import type { NoticeTone } from './slash-handler.js';

export interface ChatMessage {
  id: string;
  role: 'user' | 'assistant' | 'system';
  content: string;
  timestamp: number;
  /** Set on system notices. */
  tone?: NoticeTone;
  attachmentCount?: number;
  /** The reply was cut short by the user. */
  aborted?: boolean;
}

export interface PendingAttachment {
  data: string;
  fileName: string;
}
