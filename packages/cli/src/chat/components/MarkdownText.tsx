import React, { useMemo } from 'react';
import { Text, useStdout } from 'ink';
import { renderMarkdown } from '../utils/renderMarkdown.js';

interface MarkdownTextProps {
  children: string;
  /** Off shows the raw text. */
  enabled?: boolean;
}

export function MarkdownText({ children, enabled = true }: MarkdownTextProps): React.ReactElement {
  const { stdout } = useStdout();
  const termWidth = stdout.columns || 80;

  const rendered = useMemo(() => {
    if (!enabled) return children;
    return renderMarkdown(children, termWidth);
  }, [children, enabled, termWidth]);

  return <Text>{rendered}</Text>;
}
