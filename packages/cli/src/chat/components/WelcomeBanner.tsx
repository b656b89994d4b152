import React from 'react';
import { Box, Text, useStdout } from 'ink';
import type { SessionMeta } from '@parley/core';

interface WelcomeBannerProps {
  version: string;
  model: string;
  host: string;
  persona?: string | null;
  profile?: string;
  recentSessions: SessionMeta[];
  now?: number;
}

const TIPS: Array<[string, string]> = [
  ['/help', 'list commands'],
  ['/img <path>', 'attach an image'],
  ['/load <n>', 'reopen a saved chat'],
];

export function formatTimeAgo(timestamp: number, now = Date.now()): string {
  const mins = Math.floor((now - timestamp) / 60_000);
  if (mins < 1) return 'just now';
  if (mins < 60) return `${mins}m ago`;
  const hours = Math.floor(mins / 60);
  if (hours < 24) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}

export function WelcomeBanner({
  version,
  model,
  host,
  persona,
  profile,
  recentSessions,
  now = Date.now(),
}: WelcomeBannerProps): React.ReactElement {
  const { stdout } = useStdout();
  const boxWidth = stdout.columns || 80;

  const titleText = ` parley v${version} `;
  const fillLen = Math.max(0, boxWidth - 3 - titleText.length);
  const topBorder = `╭─${titleText}${'─'.repeat(fillLen)}╮`;

  const details = [persona && `persona ${persona}`, profile && `profile ${profile}`].filter(Boolean).join(' · ');

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color="blue">{topBorder}</Text>
      <Box
        borderStyle="round"
        borderColor="blue"
        borderTop={false}
        paddingX={2}
        width={boxWidth}
      >
        <Box flexDirection="row" width="100%">
          <Box flexDirection="column" width="50%">
            <Text bold>{model}</Text>
            <Text dimColor>{host}</Text>
            {details && <Text dimColor>{details}</Text>}
          </Box>
          <Box
            flexDirection="column"
            borderStyle="single"
            borderColor="blue"
            borderLeft
            borderTop={false}
            borderBottom={false}
            borderRight={false}
            paddingLeft={2}
            flexGrow={1}
          >
            <Text bold color="blue">Tips</Text>
            {TIPS.map(([command, hint]) => (
              <Text key={command}>
                <Text dimColor>{command}</Text>
                <Text> {hint}</Text>
              </Text>
            ))}
            <Text bold color="blue">Recent sessions</Text>
            {recentSessions.length === 0 ? (
              <Text dimColor>No saved sessions</Text>
            ) : (
              recentSessions.slice(0, 3).map((s, i) => (
                <Text key={s.id} dimColor>
                  {i + 1}. {truncate(s.title, 28)} {formatTimeAgo(Date.parse(s.updated_at), now)}
                </Text>
              ))
            )}
          </Box>
        </Box>
      </Box>
    </Box>
  );
}
