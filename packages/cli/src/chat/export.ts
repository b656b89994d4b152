import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  ATTACHMENT_PLACEHOLDER,
  SecurityError,
  conversationMessages,
  encryptText,
  formatTimestamp,
  maskMessages,
  maskText,
  type Message,
} from '@parley/core';
import { expandTilde } from '../paths.js';

export const EXPORT_FORMATS = ['md', 'json', 'txt'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const ENCRYPTED_EXPORT_SUFFIX = '.enc';

const ROLE_LABELS: Record<Message['role'], string> = {
  system: 'System',
  user: 'User',
  assistant: 'Assistant',
};

export interface ExportSecurity {
  maskSensitive: boolean;
  maskPatterns: readonly string[];
  encryptExports: boolean;
  encryptionKey?: string;
}

export interface ExportRequest {
  exportDir: string;
  format: ExportFormat;
  title: string;
  model: string;
  messages: readonly Message[];
  security: ExportSecurity;
  now?: Date;
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 40)
    .replace(/-+$/, '');
  return slug || 'chat';
}

function bodyOf(message: Message): string {
  if (message.content.type === 'attachments') {
    const placeholders = message.content.attachments.map(() => ATTACHMENT_PLACEHOLDER);
    return [message.content.text, ...placeholders].filter(part => part).join('\n');
  }
  return message.content.text;
}

export interface RenderInput {
  title: string;
  model: string;
  messages: readonly Message[];
  exportedAt: Date;
}

/** Renders user and assistant turns; system messages are left out. */
export function renderExport(format: ExportFormat, input: RenderInput): string {
  const turns = conversationMessages(input.messages);
  const exportedAt = input.exportedAt.toISOString();

  switch (format) {
    case 'json':
      return JSON.stringify(
        {
          title: input.title,
          model: input.model,
          exported_at: exportedAt,
          messages: turns.map(m => ({ role: m.role, content: bodyOf(m) })),
        },
        null,
        2,
      ) + '\n';
    case 'md': {
      const lines = [`# ${input.title}`, '', `Model: ${input.model}  `, `Exported: ${exportedAt}`, ''];
      for (const m of turns) {
        lines.push(`## ${ROLE_LABELS[m.role]}`, '', bodyOf(m), '');
      }
      return lines.join('\n');
    }
    case 'txt': {
      const lines = [input.title, `Model: ${input.model}`, `Exported: ${exportedAt}`, ''];
      for (const m of turns) {
        lines.push(`${ROLE_LABELS[m.role]}: ${bodyOf(m)}`, '');
      }
      return lines.join('\n');
    }
  }
}

/** Writes the export and returns its path. */
export function exportConversation(request: ExportRequest): string {
  const now = request.now ?? new Date();
  const { security } = request;

  if (security.encryptExports && !security.encryptionKey) {
    throw new SecurityError('Encrypted exports need an encryption key (set security.encryption_key or PARLEY_KEY)');
  }

  const masked = security.maskSensitive;
  const title = masked ? maskText(request.title, security.maskPatterns) : request.title;
  const messages = masked ? maskMessages(request.messages, security.maskPatterns) : request.messages;

  let content = renderExport(request.format, { title, model: request.model, messages, exportedAt: now });
  let fileName = `${formatTimestamp(now)}_${slugify(title)}.${request.format}`;

  if (security.encryptExports && security.encryptionKey) {
    content = encryptText(content, security.encryptionKey, now);
    fileName += ENCRYPTED_EXPORT_SUFFIX;
  }

  const dir = resolve(expandTilde(request.exportDir));
  mkdirSync(dir, { recursive: true });
  const filePath = resolve(dir, fileName);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}
