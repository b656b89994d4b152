export { DEFAULT_SUMMARY_PROMPT, ATTACHMENT_PLACEHOLDER, buildSummaryDigest } from './prompts.js';
export {
  DEFAULT_SUMMARY_KEEP,
  type SummarySplit,
  type SummaryRequest,
  type SummaryOutcome,
  splitMessagesForSummary,
  requestSummary,
} from './compactor.js';
