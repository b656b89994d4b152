export {
  type ProviderConfig,
  DEFAULT_HOST,
  normalizeHost,
  ProviderRegistry,
} from './providers.js';

export {
  type LLMCallOptions,
  type LLMResponse,
  type LLMStreamResult,
  toModelMessages,
  callLLM,
  streamLLM,
} from './llm.js';

export {
  type GenerationRequest,
  type GenerationResult,
  type GenerationBackend,
  AiSdkBackend,
} from './backend.js';

export {
  ATTACHMENT_TOKEN_ESTIMATE,
  estimateTokens,
  estimateMessageTokens,
  estimateMessagesTokens,
} from './token-estimator.js';
