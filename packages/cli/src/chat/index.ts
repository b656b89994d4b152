export { ChatApp, type ChatAppProps } from './ChatApp.js';
export { ChatController, type ChatControllerOptions, type TurnOptions } from './controller.js';
export { createSessionStore } from './store.js';
export type { ChatMessage, PendingAttachment } from './types.js';
export type { ControllerHooks, StartupOptions } from './hooks/useChat.js';
