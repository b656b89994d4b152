import { describe, it, expect } from 'vitest';
import { DEFAULT_SUMMARY_KEEP, requestSummary, splitMessagesForSummary } from './compactor.js';
import { createMessage } from '../conversation/messages.js';
import { FakeBackend } from '../testing/fake-backend.js';
import { createSilentLogger } from '../logging/logger.js';
import type { Message } from '../conversation/types.js';

function turns(count: number): Message[] {
  return Array.from({ length: count }, (_, i) =>
    createMessage(i % 2 === 0 ? 'user' : 'assistant', `Message ${i}`),
  );
}

describe('splitMessagesForSummary', () => {
  it('returns nothing to summarize when the conversation fits in keepLast', () => {
    const messages = [createMessage('system', 'base'), ...turns(4)];

    const { toSummarize, keep } = splitMessagesForSummary(messages, 4);

    expect(toSummarize).toEqual([]);
    expect(keep).toEqual(turns(4));
  });

  it('keeps exactly the last keepLast non-system messages', () => {
    const messages = [createMessage('system', 'base'), ...turns(9)];

    const { toSummarize, keep } = splitMessagesForSummary(messages, 3);

    expect(keep).toEqual(turns(9).slice(6));
    expect(toSummarize).toEqual(turns(9).slice(0, 6));
  });

  it('ignores system messages wherever they sit', () => {
    const messages = [...turns(2), createMessage('system', '## Conversation Summary\nold'), ...turns(2)];

    const { toSummarize, keep } = splitMessagesForSummary(messages, 1);

    expect(toSummarize).toHaveLength(3);
    expect(keep).toHaveLength(1);
    expect(keep[0].role).toBe('assistant');
  });

  it('falls back to the default keep count for zero', () => {
    const { toSummarize, keep } = splitMessagesForSummary(turns(10), 0);

    expect(keep).toHaveLength(DEFAULT_SUMMARY_KEEP);
    expect(toSummarize).toHaveLength(10 - DEFAULT_SUMMARY_KEEP);
  });

  it('keeps at least one message for negative counts', () => {
    const { keep } = splitMessagesForSummary(turns(3), -5);

    expect(keep).toHaveLength(1);
  });
});

describe('requestSummary', () => {
  const logger = createSilentLogger();

  it('sends the instruction and digest and trims the result', async () => {
    const backend = new FakeBackend().queueSummary('  The user asked twice.  \n');

    const outcome = await requestSummary({
      backend,
      model: 'llama3.1',
      instruction: 'Summarize.',
      messages: turns(2),
      previousSummary: '',
      logger,
    });

    expect(outcome).toEqual({ ok: true, summary: 'The user asked twice.', promptTokens: 10, completionTokens: 5 });
    expect(backend.completeRequests).toHaveLength(1);
    const request = backend.completeRequests[0];
    expect(request.model).toBe('llama3.1');
    expect(request.messages.map(m => m.role)).toEqual(['system', 'user']);
    expect(request.messages[0].content.text).toBe('Summarize.');
    expect(request.messages[1].content.text).toBe(
      'Messages:\nUser: Message 0\nAssistant: Message 1\n\nWrite a new, up-to-date summary.',
    );
  });

  it('reports a blank response as failure', async () => {
    const backend = new FakeBackend().queueSummary('   ');

    const outcome = await requestSummary({
      backend,
      model: 'llama3.1',
      instruction: 'Summarize.',
      messages: turns(2),
      previousSummary: '',
      logger,
    });

    expect(outcome).toEqual({ ok: false, reason: 'empty response' });
  });

  it('reports backend errors without throwing', async () => {
    const backend = new FakeBackend().queueSummary(new Error('connection refused'));

    const outcome = await requestSummary({
      backend,
      model: 'llama3.1',
      instruction: 'Summarize.',
      messages: turns(2),
      previousSummary: 'earlier',
      logger,
    });

    expect(outcome).toEqual({ ok: false, reason: 'connection refused' });
  });

  it('fails without a model', async () => {
    const backend = new FakeBackend();

    const outcome = await requestSummary({
      backend,
      model: '',
      instruction: 'Summarize.',
      messages: turns(2),
      previousSummary: '',
      logger,
    });

    expect(outcome.ok).toBe(false);
    expect(backend.completeRequests).toHaveLength(0);
  });
});
