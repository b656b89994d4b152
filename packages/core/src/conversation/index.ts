export type { MessageRole, TextContent, AttachmentContent, MessageContent, Message, TokenUsage } from './types.js';
export {
  SUMMARY_MARKER,
  textContent,
  createMessage,
  messageText,
  withText,
  isSummaryMessage,
  isBaseSystemMessage,
  findSummaryIndex,
  findBaseSystemIndex,
  conversationMessages,
  extractSummary,
  extractBasePrompt,
  cloneMessages,
} from './messages.js';
export {
  type ContextSettings,
  type ResolvedProfile,
  type PromptResolver,
  type ContextEvent,
  type ContextEngineOptions,
  type SendOptions,
  type AssistantReply,
  type ConversationSnapshot,
  type SearchHit,
  type ContextStatus,
  ContextEngine,
} from './engine.js';
