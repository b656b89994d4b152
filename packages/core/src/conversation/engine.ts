import type { Logger } from 'pino';
import type { GenerationBackend } from '../router/backend.js';
import { estimateMessagesTokens, estimateTokens } from '../router/token-estimator.js';
import { DEFAULT_SUMMARY_PROMPT } from '../compaction/prompts.js';
import { requestSummary, splitMessagesForSummary } from '../compaction/compactor.js';
import type { Message, MessageRole, TokenUsage } from './types.js';
import {
  SUMMARY_MARKER,
  cloneMessages,
  conversationMessages,
  createMessage,
  extractBasePrompt,
  extractSummary,
  isSummaryMessage,
  withText,
} from './messages.js';

export interface ContextSettings {
  /** Estimated-token threshold that triggers automatic summarization; 0 disables it. */
  tokenBudget: number;
  keepLast: number;
  autosummarize: boolean;
  /** Model used for summaries; the active model when unset. */
  summaryModel?: string;
  summaryPrompt: string;
}

export interface ResolvedProfile {
  name?: string;
  prompt: string;
  temperature?: number;
}

/** Source of the prompt fragments the engine composes into the system message. */
export interface PromptResolver {
  modelPrompt(model: string): string;
  resolveProfile(model: string): ResolvedProfile;
  /** Prompt for a persona, or `undefined` when the persona does not exist. */
  personaPrompt(name: string): string | undefined;
}

export type ContextEvent =
  | { type: 'summarize:start'; messages: number }
  | { type: 'summarize:done'; summaryTokens: number; kept: number }
  | { type: 'summarize:failed'; reason: string }
  | { type: 'generate:failed'; error: string };

export interface ContextEngineOptions {
  backend: GenerationBackend;
  settings: ContextSettings;
  prompts: PromptResolver;
  logger: Logger;
  onEvent?: (event: ContextEvent) => void;
}

export interface SendOptions {
  attachments?: readonly string[];
  onDelta?: (delta: string) => void;
  abortSignal?: AbortSignal;
}

export interface AssistantReply {
  text: string;
  promptTokens: number;
  completionTokens: number;
  /** True when the reply was cut short and holds partial text. */
  aborted: boolean;
}

export interface ConversationSnapshot {
  model: string;
  messages: Message[];
  summary: string;
  usage: TokenUsage;
  basePrompt?: string;
  persona: string | null;
}

export interface SearchHit {
  /** Position among non-system messages, 0-based. */
  index: number;
  role: MessageRole;
  snippet: string;
}

export interface ContextStatus {
  estimatedTokens: number;
  tokenBudget: number;
  summaryTokens: number;
  autosummarize: boolean;
  keepLast: number;
  summaryModel?: string;
}

const SEARCH_CONTEXT_CHARS = 40;

function emptyUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

/**
 * Owns the live transcript: the base system message, the rolling summary
 * message and the user/assistant turns.
 *
 * The base system message, when present, comes first; the summary message
 * always sits immediately after it (or at index 0 without one).
 */
export class ContextEngine {
  private readonly backend: GenerationBackend;
  private readonly prompts: PromptResolver;
  private readonly logger: Logger;
  private readonly onEvent?: (event: ContextEvent) => void;
  private settings: ContextSettings;

  private transcript: Message[] = [];
  private rollingSummary = '';
  private basePrompt = '';
  private profilePrompt = '';
  private profile: string | undefined;
  private currentPersona: string | null = null;
  private currentTemperature: number | undefined;
  private currentModel = '';
  private usage: TokenUsage = emptyUsage();

  constructor(options: ContextEngineOptions) {
    this.backend = options.backend;
    this.settings = { ...options.settings };
    this.prompts = options.prompts;
    this.logger = options.logger.child({ module: 'context' });
    this.onEvent = options.onEvent;
  }

  get messages(): readonly Message[] {
    return this.transcript;
  }

  get summary(): string {
    return this.rollingSummary;
  }

  get model(): string {
    return this.currentModel;
  }

  get persona(): string | null {
    return this.currentPersona;
  }

  get profileName(): string | undefined {
    return this.profile;
  }

  get temperature(): number | undefined {
    return this.currentTemperature;
  }

  get tokenUsage(): TokenUsage {
    return { ...this.usage };
  }

  get contextSettings(): ContextSettings {
    return { ...this.settings };
  }

  updateSettings(settings: Partial<ContextSettings>): void {
    this.settings = { ...this.settings, ...settings };
  }

  // ---------------------------------------------------------------------------
  // System prompt composition
  // ---------------------------------------------------------------------------

  /** Reset the conversation for `model`; the transcript holds at most the system message. */
  initConversation(model: string): Message[] {
    this.rollingSummary = '';
    this.usage = emptyUsage();
    this.currentModel = model;
    this.resolveProfile();
    this.basePrompt = this.prompts.modelPrompt(model);

    const combined = this.buildSystemPrompt();
    this.transcript = combined ? [createMessage('system', combined)] : [];
    this.logger.debug({ model, profile: this.profile, persona: this.currentPersona }, 'Conversation initialised');
    return cloneMessages(this.transcript);
  }

  buildSystemPrompt(): string {
    const personaPrompt = this.currentPersona ? this.prompts.personaPrompt(this.currentPersona) ?? '' : '';
    return [this.basePrompt, this.profilePrompt, personaPrompt].filter(part => part).join('\n\n');
  }

  updateSystemMessage(): void {
    const combined = this.buildSystemPrompt();
    const baseIdx = this.findBaseIndex(this.transcript);

    if (combined) {
      if (baseIdx === -1) {
        this.transcript.unshift(createMessage('system', combined));
      } else if (this.transcript[baseIdx].content.text !== combined) {
        this.transcript[baseIdx] = createMessage('system', combined);
      }
    } else if (baseIdx !== -1) {
      this.transcript.splice(baseIdx, 1);
    }

    this.updateSummaryMessage();
  }

  updateSummaryMessage(): void {
    const rest = this.transcript.filter(m => !this.isSummary(m));

    if (!this.rollingSummary) {
      this.transcript = rest;
      return;
    }

    // Positions are taken after the old summary is gone.
    const baseIdx = this.findBaseIndex(rest);
    rest.splice(baseIdx === -1 ? 0 : baseIdx + 1, 0, createMessage('system', `${SUMMARY_MARKER}\n${this.rollingSummary}`));
    this.transcript = rest;
  }

  // A configured prompt may itself start with the summary marker; the current
  // system prompt is never taken for the summary.
  private isSummary(message: Message): boolean {
    return isSummaryMessage(message) && message.content.text !== this.buildSystemPrompt();
  }

  private findBaseIndex(messages: readonly Message[]): number {
    return messages.findIndex(m => m.role === 'system' && !this.isSummary(m));
  }

  // ---------------------------------------------------------------------------
  // Profiles, personas, model
  // ---------------------------------------------------------------------------

  applyProfiles(): void {
    this.resolveProfile();
    this.updateSystemMessage();
  }

  /** Returns false for personas the resolver does not know. */
  setPersona(name: string | null): boolean {
    if (name !== null && this.prompts.personaPrompt(name) === undefined) {
      return false;
    }
    this.currentPersona = name;
    this.updateSystemMessage();
    return true;
  }

  setTemperature(value: number | undefined): void {
    this.currentTemperature = value;
  }

  /** Change model, keeping the transcript and recomposing the system prompt. */
  switchModel(model: string): void {
    this.currentModel = model;
    this.basePrompt = this.prompts.modelPrompt(model);
    this.applyProfiles();
    this.logger.info({ model, profile: this.profile }, 'Model switched');
  }

  private resolveProfile(): void {
    const resolved = this.prompts.resolveProfile(this.currentModel);
    this.profilePrompt = resolved.prompt;
    this.profile = resolved.name;
    this.currentTemperature = resolved.temperature;
  }

  // ---------------------------------------------------------------------------
  // Summarization
  // ---------------------------------------------------------------------------

  estimateContextTokens(): number {
    return estimateMessagesTokens(this.transcript);
  }

  async maybeSummarize(force = false): Promise<boolean> {
    if (!force) {
      if (!this.settings.autosummarize || this.settings.tokenBudget <= 0) return false;
      if (this.estimateContextTokens() <= this.settings.tokenBudget) return false;
    }
    return this.summarize();
  }

  private async summarize(): Promise<boolean> {
    const { toSummarize, keep } = splitMessagesForSummary(this.transcript, this.settings.keepLast);
    if (toSummarize.length === 0) return false;

    this.emit({ type: 'summarize:start', messages: toSummarize.length });
    const outcome = await requestSummary({
      backend: this.backend,
      model: this.settings.summaryModel || this.currentModel,
      instruction: this.settings.summaryPrompt || DEFAULT_SUMMARY_PROMPT,
      messages: toSummarize,
      previousSummary: this.rollingSummary,
      logger: this.logger,
    });

    if (!outcome.ok) {
      this.emit({ type: 'summarize:failed', reason: outcome.reason });
      return false;
    }

    this.rollingSummary = outcome.summary;
    this.transcript = keep;
    this.updateSystemMessage();
    this.logger.info({ folded: toSummarize.length, kept: keep.length }, 'Conversation summarized');
    this.emit({ type: 'summarize:done', summaryTokens: estimateTokens(outcome.summary), kept: keep.length });
    return true;
  }

  // ---------------------------------------------------------------------------
  // Turns
  // ---------------------------------------------------------------------------

  async sendUserMessage(text: string, options: SendOptions = {}): Promise<AssistantReply | null> {
    this.transcript.push(createMessage('user', text, options.attachments));
    await this.maybeSummarize(false);
    return this.generate(options);
  }

  /** Drop a trailing assistant reply and ask again. */
  async regenerate(options: Omit<SendOptions, 'attachments'> = {}): Promise<AssistantReply | null> {
    const last = this.transcript[this.transcript.length - 1];
    if (last?.role === 'assistant') {
      this.transcript.pop();
    }
    if (this.transcript[this.transcript.length - 1]?.role !== 'user') {
      return null;
    }
    return this.generate(options);
  }

  /** Replace the last user message's text, drop what followed it and ask again. */
  async editLastUserMessage(text: string, options: Omit<SendOptions, 'attachments'> = {}): Promise<AssistantReply | null> {
    const idx = this.lastIndexOfRole('user');
    if (idx === -1) return null;

    const current = this.transcript[idx];
    if (current.content.text === text) return null;

    this.transcript = this.transcript.slice(0, idx);
    this.transcript.push(withText(current, text));
    return this.generate(options);
  }

  recordUsage(promptTokens: number, completionTokens: number): void {
    const prompt = Math.max(0, Math.trunc(promptTokens));
    const completion = Math.max(0, Math.trunc(completionTokens));
    this.usage = {
      promptTokens: this.usage.promptTokens + prompt,
      completionTokens: this.usage.completionTokens + completion,
      totalTokens: this.usage.totalTokens + prompt + completion,
    };
  }

  private async generate(options: Omit<SendOptions, 'attachments'>): Promise<AssistantReply | null> {
    if (!this.currentModel) {
      this.logger.error('No model selected');
      this.emit({ type: 'generate:failed', error: 'No model selected' });
      return null;
    }

    let partial = '';
    try {
      const result = await this.backend.stream(
        {
          model: this.currentModel,
          messages: cloneMessages(this.transcript),
          temperature: this.currentTemperature,
          abortSignal: options.abortSignal,
        },
        delta => {
          partial += delta;
          options.onDelta?.(delta);
        },
      );

      const text = result.text || partial;
      if (!text) {
        this.logger.warn({ model: this.currentModel }, 'Empty reply');
        return null;
      }
      this.transcript.push(createMessage('assistant', text));
      return {
        text,
        promptTokens: result.promptTokens,
        completionTokens: result.completionTokens,
        aborted: options.abortSignal?.aborted ?? false,
      };
    } catch (err) {
      if (options.abortSignal?.aborted) {
        this.logger.info({ model: this.currentModel, chars: partial.length }, 'Generation cancelled');
        if (!partial) return null;
        this.transcript.push(createMessage('assistant', partial));
        return { text: partial, promptTokens: 0, completionTokens: 0, aborted: true };
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error({ err, model: this.currentModel }, 'Generation failed');
      this.emit({ type: 'generate:failed', error: message });
      return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Snapshots
  // ---------------------------------------------------------------------------

  snapshot(): ConversationSnapshot {
    return {
      model: this.currentModel,
      messages: cloneMessages(this.transcript),
      summary: this.rollingSummary,
      usage: { ...this.usage },
      basePrompt: this.basePrompt,
      persona: this.currentPersona,
    };
  }

  restore(snapshot: ConversationSnapshot): void {
    this.currentModel = snapshot.model;
    this.transcript = cloneMessages(snapshot.messages);
    this.usage = { ...snapshot.usage };

    const persona = snapshot.persona;
    if (persona !== null && this.prompts.personaPrompt(persona) === undefined) {
      this.logger.warn({ persona }, 'Unknown persona in snapshot; ignoring');
      this.currentPersona = null;
    } else {
      this.currentPersona = persona;
    }

    this.resolveProfile();

    if (snapshot.basePrompt !== undefined) {
      this.basePrompt = snapshot.basePrompt;
    } else {
      // The stored system message already contains any persona or profile text.
      const existing = extractBasePrompt(snapshot.messages);
      this.basePrompt =
        existing && this.currentPersona === null && !this.profilePrompt
          ? existing
          : this.prompts.modelPrompt(this.currentModel);
    }

    this.rollingSummary = snapshot.summary || extractSummary(this.transcript.filter(m => this.isSummary(m)));
    this.updateSystemMessage();
    this.logger.debug({ model: this.currentModel, messages: this.transcript.length }, 'Conversation restored');
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  searchMessages(keyword: string): SearchHit[] {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];

    const hits: SearchHit[] = [];
    conversationMessages(this.transcript).forEach((msg, index) => {
      const text = msg.content.text;
      const pos = text.toLowerCase().indexOf(needle);
      if (pos === -1) return;

      const start = Math.max(0, pos - SEARCH_CONTEXT_CHARS);
      const end = Math.min(text.length, pos + needle.length + SEARCH_CONTEXT_CHARS);
      const snippet = `${start > 0 ? '...' : ''}${text.slice(start, end)}${end < text.length ? '...' : ''}`;
      hits.push({ index, role: msg.role, snippet: snippet.replace(/\s+/g, ' ') });
    });
    return hits;
  }

  contextStatus(): ContextStatus {
    return {
      estimatedTokens: this.estimateContextTokens(),
      tokenBudget: this.settings.tokenBudget,
      summaryTokens: estimateTokens(this.rollingSummary),
      autosummarize: this.settings.autosummarize,
      keepLast: this.settings.keepLast,
      summaryModel: this.settings.summaryModel,
    };
  }

  lastUserText(): string | undefined {
    const idx = this.lastIndexOfRole('user');
    return idx === -1 ? undefined : this.transcript[idx].content.text;
  }

  lastAssistantText(): string | undefined {
    const idx = this.lastIndexOfRole('assistant');
    return idx === -1 ? undefined : this.transcript[idx].content.text;
  }

  private lastIndexOfRole(role: MessageRole): number {
    for (let i = this.transcript.length - 1; i >= 0; i--) {
      if (this.transcript[i].role === role) return i;
    }
    return -1;
  }

  private emit(event: ContextEvent): void {
    this.onEvent?.(event);
  }
}
