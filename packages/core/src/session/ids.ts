import { randomBytes } from 'node:crypto';

export const SESSION_FILE_SUFFIX = '.json';
export const ENCRYPTED_SESSION_FILE_SUFFIX = '.json.enc';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYYMMDD_HHMMSS` in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/** Time-ordered id with a random suffix, e.g. `20240102_030405_a1b2c3`. */
export function generateSessionId(date: Date = new Date()): string {
  return `${formatTimestamp(date)}_${randomBytes(3).toString('hex')}`;
}

export function sessionFileName(sessionId: string, encrypted: boolean): string {
  return `${sessionId}${encrypted ? ENCRYPTED_SESSION_FILE_SUFFIX : SESSION_FILE_SUFFIX}`;
}
