import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import type { SessionMeta } from '@parley/core';
import { WelcomeBanner, formatTimeAgo } from './WelcomeBanner.js';

const NOW = Date.parse('2024-01-02T12:00:00.000Z');

function meta(id: string, title: string, updatedAt: string): SessionMeta {
  return {
    id,
    title,
    model: 'llama3.1',
    created_at: updatedAt,
    updated_at: updatedAt,
    message_count: 2,
    token_total: 0,
    tags: [],
    encrypted: false,
    path: `${id}.json`,
    summary_excerpt: '',
  };
}

describe('formatTimeAgo', () => {
  it('buckets by minutes, hours and days', () => {
    expect(formatTimeAgo(NOW - 30_000, NOW)).toBe('just now');
    expect(formatTimeAgo(NOW - 5 * 60_000, NOW)).toBe('5m ago');
    expect(formatTimeAgo(NOW - 3 * 3_600_000, NOW)).toBe('3h ago');
    expect(formatTimeAgo(NOW - 2 * 86_400_000, NOW)).toBe('2d ago');
  });
});

describe('WelcomeBanner', () => {
  it('shows the version, model and host', () => {
    const { lastFrame } = render(
      <WelcomeBanner version="0.1.0" model="llama3.1" host="http://localhost:11434" recentSessions={[]} now={NOW} />,
    );
    const frame = lastFrame() ?? '';

    expect(frame).toContain('parley v0.1.0');
    expect(frame).toContain('llama3.1');
    expect(frame).toContain('http://localhost:11434');
    expect(frame).toContain('No saved sessions');
  });

  it('lists recent sessions', () => {
    const { lastFrame } = render(
      <WelcomeBanner
        version="0.1.0"
        model="llama3.1"
        host="http://localhost:11434"
        persona="teacher"
        recentSessions={[meta('20240102_110000_aaaaaa', 'Rust lifetimes', '2024-01-02T11:00:00.000Z')]}
        now={NOW}
      />,
    );
    const frame = lastFrame() ?? '';

    expect(frame).toContain('1. Rust lifetimes 1h ago');
    expect(frame).toContain('persona teacher');
  });
});
