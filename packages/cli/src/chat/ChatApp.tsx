import React, { useEffect, useMemo, useState } from 'react';
import { Box, Static, Text, useApp, useInput } from 'ink';
import type { Logger, SessionMeta } from '@parley/core';
import type { ChatController } from './controller.js';
import type { ChatMessage } from './types.js';
import { getCommandList } from './commands.js';
import { useChat, type ControllerHooks, type StartupOptions } from './hooks/useChat.js';
import { WelcomeBanner } from './components/WelcomeBanner.js';
import { MessageBubble } from './components/MessageBubble.js';
import { InputPrompt } from './components/InputPrompt.js';
import { ContextUsageBar } from './components/ContextUsageBar.js';

export interface ChatAppProps extends StartupOptions {
  createController: (hooks: ControllerHooks) => ChatController;
  logger: Logger;
  version: string;
  host: string;
  recentSessions: SessionMeta[];
}

type StaticItem =
  | { id: string; type: 'banner' }
  | { id: string; type: 'message'; msg: ChatMessage };

export function ChatApp({
  createController,
  logger,
  version,
  host,
  recentSessions,
  ...startup
}: ChatAppProps): React.ReactElement {
  const { exit } = useApp();
  const {
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
  } = useChat({ createController, logger, onQuit: exit, ...startup });

  const commands = useMemo(() => getCommandList(), []);
  const [ctrlCCount, setCtrlCCount] = useState(0);

  useEffect(() => {
    if (!isProcessing) setCtrlCCount(0);
  }, [isProcessing]);

  // First Ctrl+C cancels the reply in flight, a second one (or one at the
  // prompt) leaves.
  useInput((input, key) => {
    if (!(key.ctrl && input === 'c')) return;
    if (isProcessing && ctrlCCount === 0) {
      abort();
      setCtrlCCount(1);
      return;
    }
    quit();
  });

  // Completed messages go through Static so they render once; the epoch key
  // reprints the transcript after /clear or /load.
  const staticItems = useMemo<StaticItem[]>(() => {
    const items: StaticItem[] = epoch === 0 ? [{ id: '__banner__', type: 'banner' }] : [];
    for (const m of messages) {
      if (m.id !== streamingMessageId) {
        items.push({ id: m.id, type: 'message', msg: m });
      }
    }
    return items;
  }, [epoch, messages, streamingMessageId]);

  const streamingMessage = streamingMessageId
    ? messages.find(m => m.id === streamingMessageId)
    : undefined;

  const renderMarkdown = controller.settings.render_markdown;
  const activeProfile = controller.activeProfile;
  const persona = controller.engine.persona;

  return (
    <>
      <Static key={epoch} items={staticItems}>
        {item => {
          if (item.type === 'banner') {
            return (
              <WelcomeBanner
                key={item.id}
                version={version}
                model={controller.engine.model}
                host={host}
                persona={persona}
                profile={activeProfile}
                recentSessions={recentSessions}
              />
            );
          }
          return <MessageBubble key={item.id} message={item.msg} renderMarkdown={renderMarkdown} />;
        }}
      </Static>
      <Box flexDirection="column">
        {streamingMessage && (
          <MessageBubble message={streamingMessage} isStreaming renderMarkdown={renderMarkdown} />
        )}
        <ContextUsageBar
          currentTokens={contextStatus.estimatedTokens}
          maxTokens={contextStatus.tokenBudget}
          summaryTokens={contextStatus.summaryTokens}
          isSummarizing={isSummarizing}
        />
        <Box gap={1}>
          <Text dimColor>{controller.engine.model}</Text>
          {persona && <Text dimColor>· {persona}</Text>}
          {activeProfile && <Text dimColor>· profile {activeProfile}</Text>}
          {controller.currentSessionId && <Text dimColor>· {controller.title}</Text>}
        </Box>
        <InputPrompt
          onSubmit={submit}
          disabled={isProcessing}
          attachmentCount={pendingAttachments.length}
          commands={commands}
        />
      </Box>
    </>
  );
}
