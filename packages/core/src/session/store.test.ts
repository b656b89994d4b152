import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SessionStore, normalizeTags, type SaveSessionInput, type SessionStoreOptions } from './store.js';
import { SessionCorruptError, SessionIndexError } from './errors.js';
import { createMessage } from '../conversation/messages.js';
import { SecurityError } from '../security/errors.js';
import { generateKey } from '../security/fernet.js';
import { DEFAULT_MASK_PATTERNS } from '../security/mask.js';
import { createLogger, createSilentLogger } from '../logging/logger.js';

let dir: string;
let now: Date;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'parley-sessions-'));
  now = new Date('2024-01-02T03:04:05.000Z');
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function makeStore(overrides: Partial<SessionStoreOptions> = {}): SessionStore {
  return new SessionStore({
    sessionsDir: dir,
    security: { maskSensitive: false, maskPatterns: DEFAULT_MASK_PATTERNS, encryptionEnabled: false },
    retention: { count: 0, days: 0 },
    logger: createSilentLogger(),
    clock: () => now,
    ...overrides,
  });
}

function input(overrides: Partial<SaveSessionInput> = {}): SaveSessionInput {
  return {
    title: 'Test',
    model: 'demo',
    messages: [createMessage('user', 'Merhaba')],
    tokenStats: { promptTokens: 7, completionTokens: 3, totalTokens: 10 },
    tags: ['tag'],
    summary: '',
    ...overrides,
  };
}

function advance(minutes: number): void {
  now = new Date(now.getTime() + minutes * 60_000);
}

function readIndex(): { sessions: Array<Record<string, unknown>> } {
  return JSON.parse(readFileSync(join(dir, 'index.json'), 'utf-8'));
}

describe('saveSession / loadSession', () => {
  it('round-trips a plain session', () => {
    const store = makeStore();

    const meta = store.saveSession(input());
    const data = store.loadSession(meta.id);

    expect(data?.meta.title).toBe('Test');
    expect(data?.messages[0].content.text).toBe('Merhaba');
    expect(data?.messages).toEqual([createMessage('user', 'Merhaba')]);
    expect(data?.tokenStats).toEqual({ promptTokens: 7, completionTokens: 3, totalTokens: 10 });
    expect(data?.summary).toBe('');
    expect(data?.persona).toBeNull();
  });

  it('generates time-ordered ids and names the file after them', () => {
    const store = makeStore();

    const meta = store.saveSession(input());

    expect(meta.id).toMatch(/^20240102_030405_[0-9a-f]{6}$/);
    expect(meta.path).toBe(`${meta.id}.json`);
    expect(existsSync(join(dir, `${meta.id}.json`))).toBe(true);
  });

  it('writes the session file format', () => {
    const store = makeStore();

    const meta = store.saveSession(
      input({
        messages: [createMessage('system', 'base'), createMessage('user', 'look', ['aW1hZ2U=']), createMessage('assistant', 'ok')],
        summary: 's'.repeat(150),
        basePrompt: 'base',
        persona: 'teacher',
      }),
    );

    const file = JSON.parse(readFileSync(join(dir, meta.path), 'utf-8'));
    expect(file.messages).toEqual([
      { role: 'system', content: 'base' },
      { role: 'user', content: 'look', attachments: ['aW1hZ2U='] },
      { role: 'assistant', content: 'ok' },
    ]);
    expect(file.token_stats).toEqual({ prompt_tokens: 7, completion_tokens: 3, total_tokens: 10 });
    expect(file.base_prompt).toBe('base');
    expect(file.persona).toBe('teacher');
    expect(meta.message_count).toBe(2);
    expect(meta.token_total).toBe(10);
    expect(meta.summary_excerpt).toBe('s'.repeat(120));
    expect(meta.created_at).toBe('2024-01-02T03:04:05.000Z');
  });

  it('upserts by id and preserves created_at', () => {
    const store = makeStore();
    const first = store.saveSession(input());
    advance(5);

    const second = store.saveSession(input({ id: first.id, title: 'Renamed' }));

    expect(second.created_at).toBe('2024-01-02T03:04:05.000Z');
    expect(second.updated_at).toBe('2024-01-02T03:09:05.000Z');
    expect(readIndex().sessions).toHaveLength(1);
    expect(store.listSessions()[0].title).toBe('Renamed');
  });

  it('stores tags sorted and unique', () => {
    const store = makeStore();

    const meta = store.saveSession(input({ tags: ['work', ' alpha ', 'work', ''] }));

    expect(meta.tags).toEqual(['alpha', 'work']);
  });

  it('masks title, summary, base prompt and messages when enabled', () => {
    const store = makeStore({
      security: { maskSensitive: true, maskPatterns: DEFAULT_MASK_PATTERNS, encryptionEnabled: false },
    });

    const meta = store.saveSession(
      input({
        title: 'key sk-abcdefghijklmnopqrstuv',
        summary: 'secret=abcdefghijklmnopqr',
        basePrompt: 'api-key: abcdefghijklmnopqrst',
        messages: [createMessage('user', 'my api_key=abcdefghijklmnop1234')],
      }),
    );
    const data = store.loadSession(meta.id);

    expect(meta.title).toBe('key [REDACTED]');
    expect(data?.summary).toBe('[REDACTED]');
    expect(data?.basePrompt).toBe('[REDACTED]');
    expect(data?.messages[0].content.text).toBe('my [REDACTED]');
    expect(readFileSync(join(dir, meta.path), 'utf-8')).not.toContain('abcdefghijklmnop1234');
  });
});

describe('encryption', () => {
  const key = generateKey();
  const encrypted = { maskSensitive: false, maskPatterns: [], encryptionEnabled: true, encryptionKey: key };

  it('encrypts the file and reads it back', () => {
    const store = makeStore({ security: encrypted });

    const meta = store.saveSession(input());

    expect(meta.encrypted).toBe(true);
    expect(meta.path).toBe(`${meta.id}.json.enc`);
    const raw = readFileSync(join(dir, meta.path), 'utf-8');
    expect(raw).not.toContain('Merhaba');
    expect(store.loadSession(meta.id)?.messages[0].content.text).toBe('Merhaba');
  });

  it('refuses to save without a key', () => {
    const store = makeStore({ security: { ...encrypted, encryptionKey: undefined } });

    expect(() => store.saveSession(input())).toThrow(SecurityError);
    expect(existsSync(join(dir, 'index.json'))).toBe(false);
  });

  it('refuses to load an encrypted session without a key', () => {
    const store = makeStore({ security: encrypted });
    const meta = store.saveSession(input());

    store.updateOptions({ security: { ...encrypted, encryptionKey: undefined } });

    expect(() => store.loadSession(meta.id)).toThrow(SecurityError);
  });

  it('fails loudly with the wrong key', () => {
    const store = makeStore({ security: encrypted });
    const meta = store.saveSession(input());

    store.updateOptions({ security: { ...encrypted, encryptionKey: generateKey() } });

    expect(() => store.loadSession(meta.id)).toThrow('Decryption failed');
  });

  it('removes the stale file when encryption is switched off', () => {
    const store = makeStore({ security: encrypted });
    const meta = store.saveSession(input());

    store.updateOptions({ security: { ...encrypted, encryptionEnabled: false } });
    const plain = store.saveSession(input({ id: meta.id }));

    expect(plain.path).toBe(`${meta.id}.json`);
    expect(existsSync(join(dir, `${meta.id}.json.enc`))).toBe(false);
    expect(store.loadSession(meta.id)?.messages[0].content.text).toBe('Merhaba');
  });
});

describe('loadSession edge cases', () => {
  it('returns null for unknown ids and missing files', () => {
    const store = makeStore();
    const meta = store.saveSession(input());

    expect(store.loadSession('nope')).toBeNull();
    rmSync(join(dir, meta.path));
    expect(store.loadSession(meta.id)).toBeNull();
  });

  it('raises SessionCorruptError for unparseable files', () => {
    const store = makeStore();
    const meta = store.saveSession(input());
    writeFileSync(join(dir, meta.path), '{ not json');

    expect(() => store.loadSession(meta.id)).toThrow(SessionCorruptError);
  });

  it('raises SessionCorruptError for files that fail validation', () => {
    const store = makeStore();
    const meta = store.saveSession(input());
    writeFileSync(join(dir, meta.path), JSON.stringify({ meta: { id: meta.id }, messages: 'nope' }));

    expect(() => store.loadSession(meta.id)).toThrow(`Session ${meta.id} is invalid`);
  });

  it('reads attachments stored under the older images key', () => {
    const store = makeStore();
    const meta = store.saveSession(input());
    const file = JSON.parse(readFileSync(join(dir, meta.path), 'utf-8'));
    file.messages = [{ role: 'user', content: 'see', images: ['aW1hZ2U='] }];
    writeFileSync(join(dir, meta.path), JSON.stringify(file));

    expect(store.loadSession(meta.id)?.messages).toEqual([createMessage('user', 'see', ['aW1hZ2U='])]);
  });
});

describe('listSessions', () => {
  it('orders by updated_at descending', () => {
    const store = makeStore();
    const a = store.saveSession(input({ title: 'a' }));
    advance(1);
    const b = store.saveSession(input({ title: 'b' }));
    advance(1);
    store.updateTitle(a.id, 'a2');

    expect(store.listSessions().map(s => s.id)).toEqual([a.id, b.id]);
  });

  it('skips invalid entries with a warning', () => {
    const lines: string[] = [];
    const logger = createLogger({ stream: { write: (chunk: string) => { lines.push(chunk); } } });
    const store = makeStore({ logger });
    const good = store.saveSession(input());
    const index = readIndex();
    index.sessions.push({ id: 'broken', title: 42 });
    writeFileSync(join(dir, 'index.json'), JSON.stringify(index));

    const sessions = store.listSessions();

    expect(sessions.map(s => s.id)).toEqual([good.id]);
    const warnings = lines.map(line => JSON.parse(line)).filter(record => record.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].id).toBe('broken');
    expect(warnings[0].msg).toBe('Skipping invalid session entry');
  });

  it('keeps invalid entries in the index when saving others', () => {
    const store = makeStore();
    writeFileSync(join(dir, 'index.json'), JSON.stringify({ sessions: [{ id: 'legacy', extra: true }] }));

    store.saveSession(input());

    expect(readIndex().sessions[0]).toEqual({ id: 'legacy', extra: true });
  });

  it('lists nothing for a corrupt index but refuses to overwrite it', () => {
    const store = makeStore();
    writeFileSync(join(dir, 'index.json'), '{{{');

    expect(store.listSessions()).toEqual([]);
    expect(() => store.saveSession(input())).toThrow(SessionIndexError);
    expect(readFileSync(join(dir, 'index.json'), 'utf-8')).toBe('{{{');
  });
});

describe('findSession / getSession', () => {
  it('resolves positions, exact ids and unique prefixes', () => {
    const store = makeStore();
    const older = store.saveSession(input({ id: '20240101_000000_aaaaaa' }));
    advance(1);
    const newer = store.saveSession(input({ id: '20240101_000000_abbbbb' }));

    expect(store.findSession('1')?.id).toBe(newer.id);
    expect(store.findSession('2')?.id).toBe(older.id);
    expect(store.findSession(older.id)?.id).toBe(older.id);
    expect(store.findSession('20240101_000000_ab')?.id).toBe(newer.id);
    expect(store.findSession('20240101_000000_a')).toBeUndefined();
    expect(store.findSession('3')).toBeUndefined();
    expect(store.findSession('  ')).toBeUndefined();
    expect(store.getSession(newer.id)?.id).toBe(newer.id);
    expect(store.getSession('missing')).toBeUndefined();
  });
});

describe('deleteSession / updateTags / updateTitle', () => {
  it('removes the file and the index entry', () => {
    const store = makeStore();
    const meta = store.saveSession(input());

    expect(store.deleteSession(meta.id)).toBe(true);
    expect(existsSync(join(dir, meta.path))).toBe(false);
    expect(store.listSessions()).toEqual([]);
    expect(store.deleteSession(meta.id)).toBe(false);
  });

  it('deletes an entry whose file is already gone', () => {
    const store = makeStore();
    const meta = store.saveSession(input());
    rmSync(join(dir, meta.path));

    expect(store.deleteSession(meta.id)).toBe(true);
    expect(store.listSessions()).toEqual([]);
  });

  it('updates tags and bumps updated_at', () => {
    const store = makeStore();
    const meta = store.saveSession(input());
    advance(2);

    expect(store.updateTags(meta.id, ['z', 'a', 'z'])).toBe(true);

    const updated = store.getSession(meta.id);
    expect(updated?.tags).toEqual(['a', 'z']);
    expect(updated?.updated_at).toBe('2024-01-02T03:06:05.000Z');
  });

  it('updates the title', () => {
    const store = makeStore();
    const meta = store.saveSession(input());

    expect(store.updateTitle(meta.id, 'New title')).toBe(true);
    expect(store.getSession(meta.id)?.title).toBe('New title');
  });

  it('masks a new title when masking is enabled', () => {
    const store = makeStore({
      security: { maskSensitive: true, maskPatterns: DEFAULT_MASK_PATTERNS, encryptionEnabled: false },
    });
    const meta = store.saveSession(input());

    expect(store.updateTitle(meta.id, 'key sk-abcdefghijklmnopqrstuvwxyz123')).toBe(true);

    expect(store.getSession(meta.id)?.title).toBe('key [REDACTED]');
    expect(readFileSync(join(dir, 'index.json'), 'utf-8')).not.toContain('sk-abcdefghijklmnopqrstuvwxyz123');
  });

  it('returns index edits from loadSession', () => {
    const store = makeStore();
    const meta = store.saveSession(input());
    advance(2);

    store.updateTags(meta.id, ['work']);
    store.updateTitle(meta.id, 'Renamed');

    const data = store.loadSession(meta.id);
    expect(data?.meta.tags).toEqual(['work']);
    expect(data?.meta.title).toBe('Renamed');
    expect(data?.meta.updated_at).toBe('2024-01-02T03:06:05.000Z');
  });

  it('returns false for unknown ids', () => {
    const store = makeStore();

    expect(store.updateTags('missing', ['a'])).toBe(false);
    expect(store.updateTitle('missing', 'x')).toBe(false);
  });
});

describe('pruneSessions', () => {
  function saveThree(store: SessionStore): string[] {
    const ids: string[] = [];
    for (const title of ['oldest', 'middle', 'newest']) {
      ids.push(store.saveSession(input({ title })).id);
      advance(1);
    }
    return ids;
  }

  it('keeps only the most recent session under a count of 1', () => {
    const store = makeStore({ retention: { count: 1, days: 0 } });
    const [oldest, middle, newest] = saveThree(store);

    const removed = store.pruneSessions([]);

    expect(removed.sort()).toEqual([oldest, middle].sort());
    expect(store.listSessions().map(s => s.id)).toEqual([newest]);
    expect(existsSync(join(dir, `${oldest}.json`))).toBe(false);
    expect(existsSync(join(dir, `${middle}.json`))).toBe(false);
    expect(existsSync(join(dir, `${newest}.json`))).toBe(true);
  });

  it('never removes protected ids but counts them', () => {
    const store = makeStore({ retention: { count: 2, days: 0 } });
    const [oldest, middle, newest] = saveThree(store);

    const removed = store.pruneSessions([oldest]);

    expect(removed).toEqual([middle]);
    expect(store.listSessions().map(s => s.id)).toEqual([newest, oldest]);
  });

  it('removes sessions older than the age cutoff', () => {
    const store = makeStore({ retention: { count: 0, days: 7 } });
    const old = store.saveSession(input({ title: 'old' }));
    advance(8 * 24 * 60);
    const fresh = store.saveSession(input({ title: 'fresh' }));

    expect(store.pruneSessions()).toEqual([old.id]);
    expect(store.listSessions().map(s => s.id)).toEqual([fresh.id]);
  });

  it('does nothing when retention is disabled', () => {
    const store = makeStore();
    saveThree(store);

    expect(store.pruneSessions()).toEqual([]);
    expect(store.listSessions()).toHaveLength(3);
  });
});

describe('normalizeTags', () => {
  it('trims, dedupes and sorts', () => {
    expect(normalizeTags([' b', 'a ', 'b', '  '])).toEqual(['a', 'b']);
  });
});
