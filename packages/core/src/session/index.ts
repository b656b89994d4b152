export { SessionCorruptError, SessionIndexError } from './errors.js';
export {
  SESSION_FILE_SUFFIX,
  ENCRYPTED_SESSION_FILE_SUFFIX,
  formatTimestamp,
  generateSessionId,
  sessionFileName,
} from './ids.js';
export {
  type StoredMessage,
  type TokenStats,
  type SessionMeta,
  type SessionFile,
  StoredMessageSchema,
  TokenStatsSchema,
  SessionMetaSchema,
  SessionFileSchema,
  SessionIndexSchema,
  toStoredMessage,
  fromStoredMessage,
  toTokenStats,
  fromTokenStats,
} from './schema.js';
export {
  type SessionSecurityOptions,
  type RetentionOptions,
  type SessionStoreOptions,
  type SaveSessionInput,
  type SessionData,
  INDEX_FILE_NAME,
  normalizeTags,
  SessionStore,
} from './store.js';
