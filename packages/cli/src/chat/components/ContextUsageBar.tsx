import React from 'react';
import { Box, Text } from 'ink';

interface ContextUsageBarProps {
  currentTokens: number;
  /** 0 means the conversation has no budget and is never summarized. */
  maxTokens: number;
  summaryTokens?: number;
  isSummarizing?: boolean;
}

export function formatTokens(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 10_000) return `${Math.round(n / 1_000)}K`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}K`;
  return String(n);
}

export function ContextUsageBar({
  currentTokens,
  maxTokens,
  summaryTokens = 0,
  isSummarizing,
}: ContextUsageBarProps): React.ReactElement {
  const summary = summaryTokens > 0 && <Text dimColor>summary ~{formatTokens(summaryTokens)}</Text>;
  const spinner = isSummarizing && <Text color="yellow">{'⟳'} Summarizing...</Text>;

  if (maxTokens <= 0) {
    return (
      <Box gap={1}>
        <Text dimColor>Context:</Text>
        <Text bold>~{formatTokens(currentTokens)}</Text>
        <Text dimColor>(no budget)</Text>
        {summary}
        {spinner}
      </Box>
    );
  }

  const pct = Math.min(currentTokens / maxTokens, 1);
  const barWidth = 20;
  const filled = Math.round(pct * barWidth);

  let barColor = 'blue';
  if (pct > 0.9) barColor = 'red';
  else if (pct >= 0.7) barColor = 'yellow';

  const bar = '█'.repeat(filled) + '░'.repeat(barWidth - filled);

  return (
    <Box gap={1}>
      <Text dimColor>Context:</Text>
      <Text bold>~{formatTokens(currentTokens)}</Text>
      <Text dimColor>/</Text>
      <Text>{formatTokens(maxTokens)}</Text>
      <Text dimColor>({Math.round(pct * 100)}%)</Text>
      <Text color={barColor}>{bar}</Text>
      {summary}
      {spinner}
    </Box>
  );
}
