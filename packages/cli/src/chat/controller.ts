import {
  ContextEngine,
  type SessionStore,
  type ContextEvent,
  type ContextStatus,
  type GenerationBackend,
  type Logger,
  type AssistantReply,
  type SearchHit,
  type SessionMeta,
  type TokenUsage,
} from '@parley/core';
import type { Config } from '../config/index.js';
import type { ProfileResolver } from '../context/index.js';
import { exportConversation, type ExportFormat } from './export.js';
import { createSessionStore } from './store.js';

export const TITLE_MAX_LENGTH = 60;

export interface ChatControllerOptions {
  config: Config;
  sessionsDir: string;
  backend: GenerationBackend;
  resolver: ProfileResolver;
  logger: Logger;
  clock?: () => Date;
  onEvent?: (event: ContextEvent) => void;
  /** Receives autosave failures; without it they propagate from the turn. */
  onAutosaveError?: (error: Error) => void;
}

export interface TurnOptions {
  onDelta?: (delta: string) => void;
  abortSignal?: AbortSignal;
}

export interface DeleteResult {
  meta: SessionMeta;
  wasCurrent: boolean;
}

/** First user line, trimmed and capped; the model name when there is none. */
export function inferTitle(firstUserText: string | undefined, model: string): string {
  const text = firstUserText?.replace(/\s+/g, ' ').trim() ?? '';
  if (!text) return model;
  return text.length > TITLE_MAX_LENGTH ? text.slice(0, TITLE_MAX_LENGTH).trimEnd() : text;
}

/**
 * Binds one ContextEngine to the SessionStore and tracks which saved session
 * the live conversation belongs to.
 */
export class ChatController {
  readonly engine: ContextEngine;
  readonly store: SessionStore;
  private readonly resolver: ProfileResolver;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly onAutosaveError?: (error: Error) => void;
  private config: Config;
  private sessionId: string | undefined;
  private sessionTags: string[] = [];
  private sessionTitle: string | undefined;

  constructor(options: ChatControllerOptions) {
    this.config = options.config;
    this.resolver = options.resolver;
    this.logger = options.logger.child({ module: 'chat' });
    this.clock = options.clock ?? (() => new Date());
    this.onAutosaveError = options.onAutosaveError;

    this.engine = new ContextEngine({
      backend: options.backend,
      prompts: options.resolver,
      logger: options.logger,
      onEvent: options.onEvent,
      settings: {
        tokenBudget: options.config.context.token_budget,
        keepLast: options.config.context.keep_last,
        autosummarize: options.config.context.autosummarize,
        summaryModel: options.config.context.summary_model,
        summaryPrompt: options.config.context.summary_prompt,
      },
    });

    this.store = createSessionStore(options.config, options.sessionsDir, options.logger, options.clock);
  }

  get currentSessionId(): string | undefined {
    return this.sessionId;
  }

  get tags(): readonly string[] {
    return this.sessionTags;
  }

  get title(): string {
    return this.sessionTitle ?? inferTitle(this.firstUserText(), this.engine.model);
  }

  get settings(): Config {
    return this.config;
  }

  get activeProfile(): string | undefined {
    return this.resolver.activeProfile;
  }

  get profiles(): Config['profiles'] {
    return this.resolver.profiles;
  }

  get personas(): string[] {
    return this.resolver.availablePersonas.map(p => p.persona.name);
  }

  start(model: string = this.config.default_model): void {
    this.resetSession();
    this.engine.initConversation(model);
  }

  /** Starts over on the current model, keeping persona and profile. */
  newConversation(): void {
    this.start(this.engine.model || this.config.default_model);
  }

  // ---------------------------------------------------------------------------
  // Turns
  // ---------------------------------------------------------------------------

  async send(text: string, attachments: readonly string[] = [], options: TurnOptions = {}): Promise<AssistantReply | null> {
    const reply = await this.engine.sendUserMessage(text, { ...options, attachments });
    return this.afterReply(reply);
  }

  async retry(options: TurnOptions = {}): Promise<AssistantReply | null> {
    return this.afterReply(await this.engine.regenerate(options));
  }

  async edit(text: string, options: TurnOptions = {}): Promise<AssistantReply | null> {
    return this.afterReply(await this.engine.editLastUserMessage(text, options));
  }

  private afterReply(reply: AssistantReply | null): AssistantReply | null {
    if (!reply) return null;
    this.engine.recordUsage(reply.promptTokens, reply.completionTokens);
    if (this.config.sessions.auto_save) {
      this.autosave();
    }
    return reply;
  }

  private autosave(): void {
    try {
      this.save({ quiet: true });
    } catch (error) {
      if (!this.onAutosaveError || !(error instanceof Error)) throw error;
      this.logger.error({ err: error }, 'Autosave failed');
      this.onAutosaveError(error);
    }
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  save(options: { quiet?: boolean } = {}): SessionMeta {
    const snapshot = this.engine.snapshot();
    const meta = this.store.saveSession({
      id: this.sessionId,
      title: this.title,
      model: snapshot.model,
      messages: snapshot.messages,
      tokenStats: snapshot.usage,
      tags: this.sessionTags,
      summary: snapshot.summary,
      basePrompt: snapshot.basePrompt,
      persona: snapshot.persona,
      quiet: options.quiet,
    });
    this.sessionId = meta.id;

    const removed = this.store.pruneSessions([meta.id]);
    if (removed.length > 0) {
      this.logger.info({ removed: removed.length }, 'Pruned old sessions');
    }
    return meta;
  }

  listSessions(): SessionMeta[] {
    return this.store.listSessions();
  }

  /** Loads by list position, id or unique id prefix. */
  load(ref: string): SessionMeta | undefined {
    const meta = this.store.findSession(ref);
    if (!meta) return undefined;

    const data = this.store.loadSession(meta.id);
    if (!data) return undefined;

    this.engine.restore({
      model: data.meta.model,
      messages: data.messages,
      summary: data.summary,
      usage: data.tokenStats,
      basePrompt: data.basePrompt,
      persona: data.persona,
    });
    this.sessionId = data.meta.id;
    this.sessionTags = [...data.meta.tags];
    this.sessionTitle = data.meta.title;
    this.logger.debug({ sessionId: data.meta.id }, 'Session loaded');
    return data.meta;
  }

  /** Loads the most recently updated session. */
  continueLatest(): SessionMeta | undefined {
    const latest = this.store.listSessions()[0];
    return latest ? this.load(latest.id) : undefined;
  }

  delete(ref: string): DeleteResult | undefined {
    const meta = this.store.findSession(ref);
    if (!meta || !this.store.deleteSession(meta.id)) return undefined;

    const wasCurrent = meta.id === this.sessionId;
    if (wasCurrent) {
      this.sessionId = undefined;
    }
    return { meta, wasCurrent };
  }

  /** Returns false when the tag was already present. */
  addTag(tag: string): boolean {
    const value = tag.trim();
    if (!value || this.sessionTags.includes(value)) return false;
    this.sessionTags = [...this.sessionTags, value].sort();
    this.persistTags();
    return true;
  }

  /** Returns false when the tag was not present. */
  removeTag(tag: string): boolean {
    const value = tag.trim();
    if (!this.sessionTags.includes(value)) return false;
    this.sessionTags = this.sessionTags.filter(t => t !== value);
    this.persistTags();
    return true;
  }

  rename(title: string): void {
    const value = title.trim();
    this.sessionTitle = value || undefined;
    if (this.sessionId && value) {
      this.store.updateTitle(this.sessionId, value);
    }
  }

  private persistTags(): void {
    if (this.sessionId) {
      this.store.updateTags(this.sessionId, this.sessionTags);
    }
  }

  private resetSession(): void {
    this.sessionId = undefined;
    this.sessionTags = [];
    this.sessionTitle = undefined;
  }

  // ---------------------------------------------------------------------------
  // Conversation settings
  // ---------------------------------------------------------------------------

  switchModel(model: string): void {
    this.engine.switchModel(model);
  }

  setPersona(name: string | null): boolean {
    return this.engine.setPersona(name);
  }

  /** Activates a configured profile, or clears it with `undefined`. */
  setProfile(name: string | undefined): boolean {
    if (!this.resolver.setActiveProfile(name)) return false;

    const profile = name ? this.resolver.profiles[name] : undefined;
    if (profile?.model && profile.model !== this.engine.model) {
      this.engine.switchModel(profile.model);
    } else {
      this.engine.applyProfiles();
    }
    return true;
  }

  setTemperature(value: number | undefined): void {
    this.engine.setTemperature(value);
  }

  setRenderMarkdown(enabled: boolean): void {
    this.config = { ...this.config, render_markdown: enabled };
  }

  // ---------------------------------------------------------------------------
  // Queries and utilities
  // ---------------------------------------------------------------------------

  async summarize(): Promise<boolean> {
    return this.engine.maybeSummarize(true);
  }

  search(keyword: string): SearchHit[] {
    return this.engine.searchMessages(keyword);
  }

  contextStatus(): ContextStatus {
    return this.engine.contextStatus();
  }

  tokenStats(): TokenUsage {
    return this.engine.tokenUsage;
  }

  export(format: ExportFormat): string {
    const path = exportConversation({
      exportDir: this.config.export_dir,
      format,
      title: this.title,
      model: this.engine.model,
      messages: this.engine.messages,
      now: this.clock(),
      security: {
        maskSensitive: this.config.security.mask_sensitive,
        maskPatterns: this.config.security.mask_patterns,
        encryptExports: this.config.security.encrypt_exports,
        encryptionKey: this.config.security.encryption_key,
      },
    });
    this.logger.info({ format, path }, 'Conversation exported');
    return path;
  }

  private firstUserText(): string | undefined {
    return this.engine.messages.find(m => m.role === 'user')?.content.text;
  }
}
