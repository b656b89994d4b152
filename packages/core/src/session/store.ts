import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { Logger } from 'pino';
import type { ZodError } from 'zod';
import type { Message, TokenUsage } from '../conversation/types.js';
import { SecurityError } from '../security/errors.js';
import { decryptText, encryptText } from '../security/fernet.js';
import { maskMessages, maskText } from '../security/mask.js';
import { SessionCorruptError, SessionIndexError } from './errors.js';
import { ENCRYPTED_SESSION_FILE_SUFFIX, generateSessionId, sessionFileName } from './ids.js';
import {
  SessionFileSchema,
  SessionIndexSchema,
  SessionMetaSchema,
  fromStoredMessage,
  fromTokenStats,
  toStoredMessage,
  toTokenStats,
  type SessionFile,
  type SessionMeta,
} from './schema.js';

export const INDEX_FILE_NAME = 'index.json';
const SUMMARY_EXCERPT_CHARS = 120;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SessionSecurityOptions {
  maskSensitive: boolean;
  maskPatterns: readonly string[];
  encryptionEnabled: boolean;
  /** Already resolved (environment first, then config). */
  encryptionKey?: string;
}

export interface RetentionOptions {
  /** Keep at most this many sessions; 0 disables the cap. */
  count: number;
  /** Remove sessions not updated for this many days; 0 disables the cutoff. */
  days: number;
}

export interface SessionStoreOptions {
  sessionsDir: string;
  security: SessionSecurityOptions;
  retention: RetentionOptions;
  logger: Logger;
  clock?: () => Date;
}

export interface SaveSessionInput {
  /** Existing id to overwrite; a new one is generated when absent. */
  id?: string;
  title: string;
  model: string;
  messages: readonly Message[];
  tokenStats: TokenUsage;
  tags: readonly string[];
  summary: string;
  basePrompt?: string;
  persona?: string | null;
  /** Skip the info log line (autosave). */
  quiet?: boolean;
}

export interface SessionData {
  meta: SessionMeta;
  messages: Message[];
  tokenStats: TokenUsage;
  summary: string;
  basePrompt?: string;
  persona: string | null;
}

interface RawIndex {
  sessions: unknown[];
}

type IndexEntry = Record<string, unknown>;

function isRecord(value: unknown): value is IndexEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(entry: IndexEntry, key: string): string | undefined {
  const value = entry[key];
  return typeof value === 'string' ? value : undefined;
}

function formatIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function normalizeTags(tags: readonly string[]): string[] {
  return [...new Set(tags.map(tag => tag.trim()).filter(tag => tag))].sort();
}

/**
 * Saved conversations: a JSON index of lightweight metadata plus one file per
 * session, optionally masked and encrypted.
 *
 * Every mutation re-reads the index and rewrites it whole. Writes go through
 * a temporary file and a rename. There is no locking between processes.
 */
export class SessionStore {
  private readonly sessionsDir: string;
  private readonly indexPath: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private security: SessionSecurityOptions;
  private retention: RetentionOptions;

  constructor(options: SessionStoreOptions) {
    this.sessionsDir = options.sessionsDir;
    this.indexPath = join(options.sessionsDir, INDEX_FILE_NAME);
    this.security = { ...options.security };
    this.retention = { ...options.retention };
    this.logger = options.logger.child({ module: 'sessions' });
    this.clock = options.clock ?? (() => new Date());
    mkdirSync(this.sessionsDir, { recursive: true });
  }

  get directory(): string {
    return this.sessionsDir;
  }

  updateOptions(options: { security?: SessionSecurityOptions; retention?: RetentionOptions }): void {
    if (options.security) this.security = { ...options.security };
    if (options.retention) this.retention = { ...options.retention };
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** All valid entries, most recently updated first. */
  listSessions(): SessionMeta[] {
    let index: RawIndex;
    try {
      index = this.readIndex();
    } catch (err) {
      if (err instanceof SessionIndexError) {
        this.logger.error({ err, path: this.indexPath }, 'Session index unreadable; listing nothing');
        return [];
      }
      throw err;
    }

    const sessions: SessionMeta[] = [];
    for (const entry of index.sessions) {
      const parsed = SessionMetaSchema.safeParse(entry);
      if (parsed.success) {
        sessions.push(parsed.data);
      } else {
        const id = isRecord(entry) ? readString(entry, 'id') : undefined;
        this.logger.warn({ id, issues: formatIssues(parsed.error) }, 'Skipping invalid session entry');
      }
    }
    return sessions.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
  }

  getSession(sessionId: string): SessionMeta | undefined {
    return this.listSessions().find(s => s.id === sessionId);
  }

  /** Resolve a 1-based list position, an exact id or a unique id prefix. */
  findSession(ref: string): SessionMeta | undefined {
    const trimmed = ref.trim();
    if (!trimmed) return undefined;

    const sessions = this.listSessions();
    if (/^\d+$/.test(trimmed)) {
      const position = Number(trimmed);
      if (position >= 1 && position <= sessions.length) {
        return sessions[position - 1];
      }
    }

    const exact = sessions.find(s => s.id === trimmed);
    if (exact) return exact;

    const matches = sessions.filter(s => s.id.startsWith(trimmed));
    return matches.length === 1 ? matches[0] : undefined;
  }

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  saveSession(input: SaveSessionInput): SessionMeta {
    const now = this.clock();
    const nowIso = now.toISOString();
    const sessionId = input.id ?? generateSessionId(now);
    const { maskSensitive, maskPatterns, encryptionEnabled, encryptionKey } = this.security;

    let { messages, summary, title, basePrompt } = input;
    if (maskSensitive) {
      messages = maskMessages(messages, maskPatterns);
      summary = maskText(summary, maskPatterns);
      title = maskText(title, maskPatterns);
      basePrompt = basePrompt === undefined ? undefined : maskText(basePrompt, maskPatterns);
    }

    if (encryptionEnabled && !encryptionKey) {
      throw new SecurityError('Encryption is enabled but no encryption key is configured');
    }

    const index = this.readIndex();
    const existing = this.findEntry(index, sessionId);
    const fileName = sessionFileName(sessionId, encryptionEnabled);

    const meta: SessionMeta = {
      id: sessionId,
      title,
      model: input.model,
      created_at: (existing && readString(existing, 'created_at')) ?? nowIso,
      updated_at: nowIso,
      message_count: messages.filter(m => m.role !== 'system').length,
      token_total: input.tokenStats.totalTokens,
      tags: normalizeTags(input.tags),
      encrypted: encryptionEnabled,
      path: fileName,
      summary_excerpt: summary.slice(0, SUMMARY_EXCERPT_CHARS),
    };

    const file: SessionFile = {
      meta,
      messages: messages.map(toStoredMessage),
      token_stats: toTokenStats(input.tokenStats),
      summary,
      base_prompt: basePrompt,
      persona: input.persona ?? null,
    };

    let payload = JSON.stringify(file, null, 2);
    if (encryptionEnabled && encryptionKey) {
      payload = encryptText(payload, encryptionKey, now);
    }

    const filePath = join(this.sessionsDir, fileName);
    try {
      this.writeAtomic(filePath, payload);
    } catch (err) {
      this.logger.error({ err, path: filePath }, 'Failed to write session file');
      throw err;
    }

    // The encryption setting may have changed since the last save.
    const previousFile = existing ? basename(readString(existing, 'path') ?? '') : '';
    if (previousFile && previousFile !== fileName) {
      this.removeFile(join(this.sessionsDir, previousFile));
    }

    this.upsert(index, meta);
    this.writeIndex(index);

    if (!input.quiet) {
      this.logger.info({ id: sessionId, encrypted: encryptionEnabled, messages: meta.message_count }, 'Session saved');
    }
    return meta;
  }

  /**
   * Full session by id, or `null` when the id is unknown or its file is gone.
   * A file that exists but cannot be parsed raises `SessionCorruptError`.
   */
  loadSession(sessionId: string): SessionData | null {
    const entry = this.findEntry(this.readIndex(), sessionId);
    if (!entry) return null;

    const fileName = basename(readString(entry, 'path') ?? '');
    if (!fileName) return null;
    const filePath = join(this.sessionsDir, fileName);
    if (!existsSync(filePath)) {
      this.logger.warn({ id: sessionId, path: filePath }, 'Session file missing');
      return null;
    }

    let raw = readFileSync(filePath, 'utf-8');
    if (entry['encrypted'] === true || fileName.endsWith(ENCRYPTED_SESSION_FILE_SUFFIX)) {
      const key = this.security.encryptionKey;
      if (!key) {
        throw new SecurityError('An encryption key is required to open an encrypted session');
      }
      raw = decryptText(raw, key);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new SessionCorruptError(sessionId, `Session ${sessionId} is not valid JSON`, { cause: err });
    }

    const parsed = SessionFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new SessionCorruptError(sessionId, `Session ${sessionId} is invalid: ${formatIssues(parsed.error)}`);
    }

    // Tag and title edits only touch the index, so its entry wins over the file's copy.
    const indexed = SessionMetaSchema.safeParse(entry);
    return {
      meta: indexed.success ? indexed.data : parsed.data.meta,
      messages: parsed.data.messages.map(fromStoredMessage),
      tokenStats: fromTokenStats(parsed.data.token_stats),
      summary: parsed.data.summary,
      basePrompt: parsed.data.base_prompt,
      persona: parsed.data.persona ?? null,
    };
  }

  deleteSession(sessionId: string): boolean {
    const index = this.readIndex();
    const entry = this.findEntry(index, sessionId);
    if (!entry) return false;

    const fileName = basename(readString(entry, 'path') ?? '');
    if (fileName) {
      this.removeFile(join(this.sessionsDir, fileName));
    }

    index.sessions = index.sessions.filter(item => !(isRecord(item) && item['id'] === sessionId));
    this.writeIndex(index);
    this.logger.info({ id: sessionId }, 'Session deleted');
    return true;
  }

  updateTags(sessionId: string, tags: readonly string[]): boolean {
    return this.updateEntry(sessionId, entry => {
      entry['tags'] = normalizeTags(tags);
    });
  }

  updateTitle(sessionId: string, title: string): boolean {
    const { maskSensitive, maskPatterns } = this.security;
    const stored = maskSensitive ? maskText(title, maskPatterns) : title;
    return this.updateEntry(sessionId, entry => {
      entry['title'] = stored;
    });
  }

  /**
   * Apply the age cutoff, then the count cap. Ids in `keepIds` are never
   * removed but still take up places under the cap. Returns the removed ids.
   */
  pruneSessions(keepIds: readonly string[] = []): string[] {
    const { count, days } = this.retention;
    if (count <= 0 && days <= 0) return [];

    const protectedIds = new Set(keepIds);
    const cutoff = days > 0 ? this.clock().getTime() - days * DAY_MS : undefined;
    const removed: string[] = [];
    const candidates: SessionMeta[] = [];
    let protectedCount = 0;

    for (const session of this.listSessions()) {
      if (protectedIds.has(session.id)) {
        protectedCount++;
        continue;
      }
      const updated = Date.parse(session.updated_at);
      if (cutoff !== undefined && !Number.isNaN(updated) && updated < cutoff) {
        removed.push(session.id);
        continue;
      }
      candidates.push(session);
    }

    if (count > 0) {
      const room = Math.max(0, count - protectedCount);
      removed.push(...candidates.slice(room).map(s => s.id));
    }

    for (const sessionId of removed) {
      this.deleteSession(sessionId);
    }
    if (removed.length > 0) {
      this.logger.info({ removed: removed.length, count, days }, 'Pruned sessions');
    }
    return removed;
  }

  // ---------------------------------------------------------------------------
  // Index and file plumbing
  // ---------------------------------------------------------------------------

  private readIndex(): RawIndex {
    if (!existsSync(this.indexPath)) return { sessions: [] };

    let raw: string;
    try {
      raw = readFileSync(this.indexPath, 'utf-8');
    } catch (err) {
      this.logger.error({ err, path: this.indexPath }, 'Failed to read session index');
      throw err;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new SessionIndexError(this.indexPath, `Session index is not valid JSON: ${this.indexPath}`, { cause: err });
    }

    const parsed = SessionIndexSchema.safeParse(data);
    if (!parsed.success) {
      throw new SessionIndexError(this.indexPath, `Session index is malformed: ${formatIssues(parsed.error)}`);
    }
    return { sessions: parsed.data.sessions };
  }

  private writeIndex(index: RawIndex): void {
    try {
      this.writeAtomic(this.indexPath, JSON.stringify(index, null, 2));
    } catch (err) {
      this.logger.error({ err, path: this.indexPath }, 'Failed to write session index');
      throw err;
    }
  }

  private findEntry(index: RawIndex, sessionId: string): IndexEntry | undefined {
    for (const item of index.sessions) {
      if (isRecord(item) && item['id'] === sessionId) return item;
    }
    return undefined;
  }

  private upsert(index: RawIndex, meta: SessionMeta): void {
    const position = index.sessions.findIndex(item => isRecord(item) && item['id'] === meta.id);
    if (position === -1) {
      index.sessions.push(meta);
    } else {
      index.sessions[position] = meta;
    }
  }

  private updateEntry(sessionId: string, mutate: (entry: IndexEntry) => void): boolean {
    const index = this.readIndex();
    const entry = this.findEntry(index, sessionId);
    if (!entry) return false;

    mutate(entry);
    entry['updated_at'] = this.clock().toISOString();
    this.writeIndex(index);
    return true;
  }

  private writeAtomic(filePath: string, content: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, content, 'utf-8');
      renameSync(tmpPath, filePath);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }

  private removeFile(filePath: string): void {
    try {
      rmSync(filePath, { force: true });
    } catch (err) {
      this.logger.warn({ err, path: filePath }, 'Failed to remove session file');
    }
  }
}
