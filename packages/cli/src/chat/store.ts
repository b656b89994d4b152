import { SessionStore, type Logger } from '@parley/core';
import type { Config } from '../config/index.js';

/** A SessionStore configured from the `security` and `sessions` config sections. */
export function createSessionStore(
  config: Config,
  sessionsDir: string,
  logger: Logger,
  clock?: () => Date,
): SessionStore {
  return new SessionStore({
    sessionsDir,
    logger,
    clock,
    security: {
      maskSensitive: config.security.mask_sensitive,
      maskPatterns: config.security.mask_patterns,
      encryptionEnabled: config.security.encryption_enabled,
      encryptionKey: config.security.encryption_key,
    },
    retention: {
      count: config.sessions.retention_count,
      days: config.sessions.retention_days,
    },
  });
}
