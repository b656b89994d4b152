import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { MessageBubble } from './MessageBubble.js';
import type { ChatMessage } from '../types.js';

function makeMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: 'test-id',
    role: 'assistant',
    content: 'Hello, world!',
    timestamp: 0,
    ...overrides,
  };
}

describe('MessageBubble', () => {
  it('renders user messages behind the prompt marker', () => {
    const { lastFrame } = render(<MessageBubble message={makeMessage({ role: 'user', content: 'How do I rebase?' })} />);
    const output = lastFrame() ?? '';

    expect(output).toContain('❯');
    expect(output).toContain('How do I rebase?');
  });

  it('labels attached images', () => {
    const one = render(<MessageBubble message={makeMessage({ role: 'user', content: 'What is this?', attachmentCount: 1 })} />);
    const two = render(<MessageBubble message={makeMessage({ role: 'user', content: 'Compare', attachmentCount: 2 })} />);

    expect(one.lastFrame()).toContain('[1 image]');
    expect(two.lastFrame()).toContain('[2 images]');
  });

  it('renders notices', () => {
    const { lastFrame } = render(
      <MessageBubble message={makeMessage({ role: 'system', content: 'Saved session 20240102_030405_abcdef', tone: 'success' })} />,
    );
    expect(lastFrame()).toContain('Saved session 20240102_030405_abcdef');
  });

  it('renders finished replies as markdown', () => {
    const { lastFrame } = render(<MessageBubble message={makeMessage({ content: 'Use **git rebase -i**' })} />);
    const output = lastFrame() ?? '';

    expect(output).toContain('git rebase -i');
    expect(output).not.toContain('**');
  });

  it('keeps raw text when markdown is off', () => {
    const { lastFrame } = render(
      <MessageBubble message={makeMessage({ content: 'Use **git rebase -i**' })} renderMarkdown={false} />,
    );
    expect(lastFrame()).toBe('Use **git rebase -i**');
  });

  it('shows a cursor while streaming', () => {
    const { lastFrame } = render(<MessageBubble message={makeMessage({ content: 'Partial' })} isStreaming />);
    const output = lastFrame() ?? '';

    expect(output).toContain('Partial');
    expect(output).toContain('█');
  });

  it('shows a spinner before the first token', () => {
    const { lastFrame } = render(<MessageBubble message={makeMessage({ content: '' })} isStreaming />);
    expect(lastFrame()).toContain('Thinking...');
  });

  it('marks cancelled replies', () => {
    const { lastFrame } = render(<MessageBubble message={makeMessage({ content: 'Half an answer', aborted: true })} />);
    const output = lastFrame() ?? '';

    expect(output).toContain('Half an answer');
    expect(output).toContain('(cancelled)');
  });
});
