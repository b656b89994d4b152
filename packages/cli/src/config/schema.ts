import { z } from 'zod';
import { DEFAULT_MASK_PATTERNS, DEFAULT_SUMMARY_PROMPT, DEFAULT_HOST } from '@parley/core';

const envVarPattern = /^(env:|\\?\$\{?)/;

const envVarSchema = z.string().refine(
  (val) => envVarPattern.test(val),
  { message: 'Must start with env:, $, or ${' }
).brand('envVar');

export type EnvVar = z.infer<typeof envVarSchema>;

const encryptionKeySchema = z.union([
  envVarSchema,
  z.string().min(1),
]);

const profileSchema = z.object({
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  system_prompt: z.string().optional(),
  description: z.string().optional(),
  auto_apply: z.boolean().optional(),
}).strict();

const contextSchema = z.object({
  token_budget: z.number().int().nonnegative().optional(),
  keep_last: z.number().int().min(1).optional(),
  autosummarize: z.boolean().optional(),
  summary_model: z.string().min(1).optional(),
  summary_prompt: z.string().min(1).optional(),
}).strict();

const sessionsSchema = z.object({
  retention_count: z.number().int().nonnegative().optional(),
  retention_days: z.number().int().nonnegative().optional(),
  auto_save: z.boolean().optional(),
}).strict();

const securitySchema = z.object({
  mask_sensitive: z.boolean().optional(),
  mask_patterns: z.array(z.string()).optional(),
  encryption_enabled: z.boolean().optional(),
  encryption_key: encryptionKeySchema.optional(),
  encrypt_exports: z.boolean().optional(),
}).strict();

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const loggingSchema = z.object({
  level: logLevelSchema.optional(),
}).strict();

const ConfigSchema = z.object({
  host: z.string().min(1).optional(),
  default_model: z.string().min(1).optional(),
  render_markdown: z.boolean().optional(),
  context: contextSchema.optional(),
  profiles: z.record(z.string(), profileSchema).optional(),
  model_profiles: z.record(z.string(), profileSchema).optional(),
  active_profile: z.string().min(1).optional(),
  sessions: sessionsSchema.optional(),
  security: securitySchema.optional(),
  export_dir: z.string().min(1).optional(),
  logging: loggingSchema.optional(),
}).strict();

export type RawConfig = z.infer<typeof ConfigSchema>;
export type RawProfile = z.infer<typeof profileSchema>;

export interface ProfileConfig {
  model?: string;
  temperature?: number;
  system_prompt?: string;
  description: string;
  auto_apply: boolean;
}

export interface ContextConfig {
  token_budget: number;
  keep_last: number;
  autosummarize: boolean;
  summary_model?: string;
  summary_prompt: string;
}

export interface SessionsConfig {
  retention_count: number;
  retention_days: number;
  auto_save: boolean;
}

export interface SecurityConfig {
  mask_sensitive: boolean;
  mask_patterns: string[];
  encryption_enabled: boolean;
  encryption_key?: string;
  encrypt_exports: boolean;
}

export interface Config {
  host: string;
  default_model: string;
  render_markdown: boolean;
  context: ContextConfig;
  profiles: Record<string, ProfileConfig>;
  model_profiles: Record<string, ProfileConfig>;
  active_profile?: string;
  sessions: SessionsConfig;
  security: SecurityConfig;
  export_dir: string;
  logging: {
    level: z.infer<typeof logLevelSchema>;
  };
}

export const ConfigDefaults: Config = {
  host: DEFAULT_HOST,
  default_model: 'llama3.1',
  render_markdown: true,
  context: {
    token_budget: 8192,
    keep_last: 6,
    autosummarize: true,
    summary_prompt: DEFAULT_SUMMARY_PROMPT,
  },
  profiles: {},
  model_profiles: {},
  sessions: {
    retention_count: 200,
    retention_days: 0,
    auto_save: false,
  },
  security: {
    mask_sensitive: false,
    mask_patterns: [...DEFAULT_MASK_PATTERNS],
    encryption_enabled: false,
    encrypt_exports: false,
  },
  export_dir: '~/parley-chats',
  logging: {
    level: 'info',
  },
};

export { ConfigSchema };
