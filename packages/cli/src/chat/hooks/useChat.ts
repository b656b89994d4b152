import { useCallback, useRef, useState } from 'react';
import { randomUUID } from 'node:crypto';
import type { AssistantReply, ContextEvent, ContextStatus, Logger } from '@parley/core';
import type { ChatController, TurnOptions } from '../controller.js';
import { parseSlashCommand, type SlashCommandType } from '../commands.js';
import { handleSlashCommand, type NoticeTone, type SlashResult } from '../slash-handler.js';
import { noticeMessage, toChatMessages } from '../transcript.js';
import type { ChatMessage, PendingAttachment } from '../types.js';
import { useThrottledUpdate, type MessageUpdate } from './useThrottledUpdate.js';

/** Callbacks the controller needs before the UI state exists. */
export interface ControllerHooks {
  onEvent: (event: ContextEvent) => void;
  onAutosaveError: (error: Error) => void;
}

export interface StartupOptions {
  model?: string;
  persona?: string;
  resume?: string;
  continueLatest?: boolean;
}

export interface UseChatOptions extends StartupOptions {
  createController: (hooks: ControllerHooks) => ChatController;
  logger: Logger;
  onQuit: () => void;
}

export interface UseChatReturn {
  controller: ChatController;
  messages: ChatMessage[];
  /** Bumped whenever the transcript on screen is replaced. */
  epoch: number;
  streamingMessageId?: string;
  isProcessing: boolean;
  isSummarizing: boolean;
  contextStatus: ContextStatus;
  pendingAttachments: PendingAttachment[];
  submit: (text: string) => void;
  abort: () => void;
  quit: () => void;
}

type Turn = (options: TurnOptions) => Promise<AssistantReply | null>;

// After these the engine transcript no longer matches what is on screen.
const RESETTING_COMMANDS: ReadonlySet<SlashCommandType> = new Set(['clear', 'load']);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function restoreSession(controller: ChatController, options: StartupOptions): ChatMessage[] {
  if (options.resume) {
    const meta = controller.load(options.resume);
    if (!meta) return [noticeMessage(`Session not found: ${options.resume}`, 'error')];
    return [...toChatMessages(controller.engine.messages), noticeMessage(`Resumed "${meta.title}"`, 'success')];
  }
  if (options.continueLatest) {
    const meta = controller.continueLatest();
    if (!meta) return [noticeMessage('No saved sessions to continue')];
    return [...toChatMessages(controller.engine.messages), noticeMessage(`Continuing "${meta.title}"`, 'success')];
  }
  return [];
}

/** Starts the first conversation and returns what to show for it. */
export function startConversation(controller: ChatController, options: StartupOptions, logger: Logger): ChatMessage[] {
  controller.start(options.model);
  const messages: ChatMessage[] = [];

  try {
    messages.push(...restoreSession(controller, options));
  } catch (error) {
    logger.error({ err: error }, 'Could not restore session');
    messages.push(noticeMessage(errorMessage(error), 'error'));
  }

  if (options.model && options.model !== controller.engine.model) {
    controller.switchModel(options.model);
  }
  if (options.persona && !controller.setPersona(options.persona.toLowerCase())) {
    messages.push(noticeMessage(`Persona not found: ${options.persona}`, 'error'));
  }
  return messages;
}

export function useChat(options: UseChatOptions): UseChatReturn {
  const { logger, onQuit } = options;
  const eventRef = useRef<(event: ContextEvent) => void>(() => {});
  const autosaveRef = useRef<(error: Error) => void>(() => {});

  const [initial] = useState(() => {
    const controller = options.createController({
      onEvent: event => eventRef.current(event),
      onAutosaveError: error => autosaveRef.current(error),
    });
    return { controller, messages: startConversation(controller, options, logger) };
  });
  const { controller } = initial;

  const [messages, setMessages] = useState<ChatMessage[]>(initial.messages);
  const [epoch, setEpoch] = useState(0);
  const [streamingMessageId, setStreamingMessageId] = useState<string | undefined>(undefined);
  const [isProcessing, setIsProcessing] = useState(false);
  const [isSummarizing, setIsSummarizing] = useState(false);
  const [pendingAttachments, setPendingAttachments] = useState<PendingAttachment[]>([]);
  const [contextStatus, setContextStatus] = useState<ContextStatus>(() => controller.contextStatus());
  const abortRef = useRef<AbortController | null>(null);
  const failedRef = useRef(false);

  const addMessage = useCallback((message: ChatMessage) => {
    setMessages(prev => [...prev, message]);
  }, []);

  const addNotice = useCallback((text: string, tone: NoticeTone = 'info') => {
    addMessage(noticeMessage(text, tone));
  }, [addMessage]);

  const updateMessage = useCallback((id: string, update: MessageUpdate) => {
    setMessages(prev => prev.map(m => (m.id === id ? { ...m, ...update } : m)));
  }, []);

  // Static output only appends, so a finished reply moves behind any
  // notices raised while it streamed.
  const finishMessage = useCallback((id: string, update: MessageUpdate) => {
    setMessages(prev => {
      const message = prev.find(m => m.id === id);
      if (!message) return prev;
      return [...prev.filter(m => m.id !== id), { ...message, ...update }];
    });
  }, []);

  const removeMessage = useCallback((id: string) => {
    setMessages(prev => prev.filter(m => m.id !== id));
  }, []);

  const { throttledUpdate, flush } = useThrottledUpdate(updateMessage);

  eventRef.current = (event: ContextEvent) => {
    switch (event.type) {
      case 'summarize:start':
        setIsSummarizing(true);
        break;
      case 'summarize:done':
        setIsSummarizing(false);
        addNotice(`Summarized older messages (~${event.summaryTokens} tokens, kept the last ${event.kept})`);
        break;
      case 'summarize:failed':
        setIsSummarizing(false);
        addNotice(`Summary failed: ${event.reason}`, 'error');
        break;
      case 'generate:failed':
        failedRef.current = true;
        addNotice(`Generation failed: ${event.error}`, 'error');
        break;
    }
  };
  autosaveRef.current = error => addNotice(`Autosave failed: ${error.message}`, 'error');

  const refreshStatus = useCallback(() => {
    setContextStatus(controller.contextStatus());
  }, [controller]);

  const resetView = useCallback(() => {
    setEpoch(prev => prev + 1);
    setMessages(toChatMessages(controller.engine.messages));
    setPendingAttachments([]);
  }, [controller]);

  const quit = useCallback(() => {
    abortRef.current?.abort();
    onQuit();
  }, [onQuit]);

  const abort = useCallback(() => {
    abortRef.current?.abort();
  }, []);

  const runTurn = useCallback(async (turn: Turn, emptyNotice: string) => {
    const id = randomUUID();
    const abortController = new AbortController();
    abortRef.current = abortController;
    failedRef.current = false;
    addMessage({ id, role: 'assistant', content: '', timestamp: Date.now() });
    setStreamingMessageId(id);

    let text = '';
    try {
      const reply = await turn({
        abortSignal: abortController.signal,
        onDelta: delta => {
          text += delta;
          throttledUpdate(id, { content: text });
        },
      });
      flush();
      if (reply) {
        finishMessage(id, { content: reply.text, aborted: reply.aborted });
      } else {
        removeMessage(id);
        if (abortController.signal.aborted) addNotice('Cancelled');
        else if (!failedRef.current) addNotice(emptyNotice, 'error');
      }
    } catch (error) {
      flush();
      removeMessage(id);
      logger.error({ err: error }, 'Turn failed');
      addNotice(errorMessage(error), 'error');
    } finally {
      abortRef.current = null;
      setStreamingMessageId(undefined);
    }
  }, [addMessage, addNotice, finishMessage, flush, logger, removeMessage, throttledUpdate]);

  const sendText = useCallback(async (text: string, attachments: string[]) => {
    addMessage({
      id: randomUUID(),
      role: 'user',
      content: text,
      timestamp: Date.now(),
      ...(attachments.length > 0 ? { attachmentCount: attachments.length } : {}),
    });
    await runTurn(turn => controller.send(text, attachments, turn), 'No reply from the model');
  }, [addMessage, controller, runTurn]);

  const applyResult = useCallback(async (result: SlashResult, queued: string[]) => {
    switch (result.type) {
      case 'notice':
        addNotice(result.text, result.tone);
        return;
      case 'retry':
        await runTurn(turn => controller.retry(turn), 'Nothing to retry');
        return;
      case 'edit':
        addMessage({ id: randomUUID(), role: 'user', content: result.text, timestamp: Date.now() });
        await runTurn(turn => controller.edit(result.text, turn), 'Nothing to resend');
        return;
      case 'send':
        setPendingAttachments([]);
        await sendText(result.text, [...queued, ...result.attachments]);
        return;
      case 'attach':
        setPendingAttachments(prev => [...prev, { data: result.attachment, fileName: result.fileName }]);
        addNotice(`Attached ${result.fileName} to your next message`, 'success');
        return;
      case 'quit':
        quit();
        return;
    }
  }, [addMessage, addNotice, controller, quit, runTurn, sendText]);

  const handleInput = useCallback(async (text: string) => {
    const queued = pendingAttachments.map(p => p.data);
    try {
      const command = parseSlashCommand(text);
      if (!command) {
        setPendingAttachments([]);
        await sendText(text, queued);
        return;
      }

      const result = await handleSlashCommand(command, controller, logger);
      if (RESETTING_COMMANDS.has(command.type) && result.type === 'notice' && result.tone === 'success') {
        resetView();
      }
      await applyResult(result, queued);
    } catch (error) {
      logger.error({ err: error }, 'Input handling failed');
      addNotice(errorMessage(error), 'error');
    } finally {
      setIsProcessing(false);
      refreshStatus();
    }
  }, [addNotice, applyResult, controller, logger, pendingAttachments, refreshStatus, resetView, sendText]);

  const submit = useCallback((text: string) => {
    if (isProcessing) return;
    setIsProcessing(true);
    void handleInput(text);
  }, [handleInput, isProcessing]);

  return {
    controller,
    messages,
    epoch,
    streamingMessageId,
    isProcessing,
    isSummarizing,
    contextStatus,
    pendingAttachments,
    submit,
    abort,
    quit,
  };
}
