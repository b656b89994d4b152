import React from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';
import type { NoticeTone } from '../slash-handler.js';
import type { ChatMessage } from '../types.js';
import { MarkdownText } from './MarkdownText.js';

interface MessageBubbleProps {
  message: ChatMessage;
  isStreaming?: boolean;
  renderMarkdown?: boolean;
}

const TONE_COLORS: Record<NoticeTone, string | undefined> = {
  info: undefined,
  success: 'green',
  error: 'red',
};

function attachmentLabel(count: number): string {
  return count === 1 ? '[1 image]' : `[${count} images]`;
}

export function MessageBubble({ message, isStreaming, renderMarkdown = true }: MessageBubbleProps): React.ReactElement {
  if (message.role === 'system') {
    const color = TONE_COLORS[message.tone ?? 'info'];
    return (
      <Box marginY={0}>
        <Text color={color} dimColor={!color} italic>{message.content}</Text>
      </Box>
    );
  }

  if (message.role === 'user') {
    return (
      <Box marginY={0} gap={1}>
        <Text color="blue" bold>{'❯'}</Text>
        <Text>{message.content}</Text>
        {message.attachmentCount ? <Text color="magenta">{attachmentLabel(message.attachmentCount)}</Text> : null}
      </Box>
    );
  }

  if (isStreaming && !message.content) {
    return (
      <Box gap={1}>
        <Text color="cyan"><Spinner type="dots" /></Text>
        <Text dimColor>Thinking...</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" marginY={0}>
      {isStreaming ? (
        // Raw while streaming; markdown once the reply is complete.
        <Text>{message.content}<Text color="cyan">{'█'}</Text></Text>
      ) : (
        <MarkdownText enabled={renderMarkdown}>{message.content}</MarkdownText>
      )}
      {message.aborted && <Text dimColor>(cancelled)</Text>}
    </Box>
  );
}
