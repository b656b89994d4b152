import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'node:crypto';
import { SecurityError } from './errors.js';

/**
 * Fernet tokens (version 0x80): urlsafe-base64 of
 * version | timestamp (u64 BE, seconds) | IV (16) | AES-128-CBC ciphertext | HMAC-SHA256 (32).
 * Keys are 32 bytes in urlsafe base64; the first half signs, the second encrypts.
 */

const TOKEN_VERSION = 0x80;
const KEY_BYTES = 32;
const IV_BYTES = 16;
const HMAC_BYTES = 32;
const BLOCK_BYTES = 16;
const HEADER_BYTES = 1 + 8 + IV_BYTES;

const URLSAFE_BASE64 = /^[A-Za-z0-9_-]+={0,2}$/;

export const ENCRYPTION_KEY_ENV = 'PARLEY_KEY';

interface KeyParts {
  signingKey: Buffer;
  encryptionKey: Buffer;
}

function encodeUrlSafe(data: Buffer): string {
  return data.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

function decodeUrlSafe(text: string): Buffer | null {
  if (!URLSAFE_BASE64.test(text)) return null;
  return Buffer.from(text.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
}

function splitKey(key: string): KeyParts {
  const raw = decodeUrlSafe(key.trim());
  if (!raw || raw.length !== KEY_BYTES) {
    throw new SecurityError('Invalid encryption key');
  }
  return {
    signingKey: raw.subarray(0, KEY_BYTES / 2),
    encryptionKey: raw.subarray(KEY_BYTES / 2),
  };
}

export function generateKey(): string {
  return encodeUrlSafe(randomBytes(KEY_BYTES));
}

export function isValidKey(key: string): boolean {
  try {
    splitKey(key);
    return true;
  } catch {
    return false;
  }
}

export function encryptText(plainText: string, key: string, now: Date = new Date()): string {
  const { signingKey, encryptionKey } = splitKey(key);
  const iv = randomBytes(IV_BYTES);

  const cipher = createCipheriv('aes-128-cbc', encryptionKey, iv);
  const ciphertext = Buffer.concat([cipher.update(plainText, 'utf8'), cipher.final()]);

  const header = Buffer.alloc(9);
  header.writeUInt8(TOKEN_VERSION, 0);
  header.writeBigUInt64BE(BigInt(Math.floor(now.getTime() / 1000)), 1);

  const body = Buffer.concat([header, iv, ciphertext]);
  const mac = createHmac('sha256', signingKey).update(body).digest();
  return encodeUrlSafe(Buffer.concat([body, mac]));
}

export function decryptText(token: string, key: string): string {
  const { signingKey, encryptionKey } = splitKey(key);
  const data = decodeUrlSafe(token.trim());

  if (
    !data ||
    data.length < HEADER_BYTES + BLOCK_BYTES + HMAC_BYTES ||
    data[0] !== TOKEN_VERSION
  ) {
    throw new SecurityError('Decryption failed');
  }

  const body = data.subarray(0, data.length - HMAC_BYTES);
  const mac = data.subarray(data.length - HMAC_BYTES);
  const expected = createHmac('sha256', signingKey).update(body).digest();
  if (!timingSafeEqual(mac, expected)) {
    throw new SecurityError('Decryption failed');
  }

  const iv = body.subarray(9, HEADER_BYTES);
  const ciphertext = body.subarray(HEADER_BYTES);
  if (ciphertext.length % BLOCK_BYTES !== 0) {
    throw new SecurityError('Decryption failed');
  }

  try {
    const decipher = createDecipheriv('aes-128-cbc', encryptionKey, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
  } catch (error) {
    throw new SecurityError('Decryption failed', { cause: error });
  }
}

/**
 * The environment key wins over the configured one. Blank values count as unset.
 */
export function resolveEncryptionKey(
  configured: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const fromEnv = env[ENCRYPTION_KEY_ENV]?.trim();
  if (fromEnv) return fromEnv;
  const fromConfig = configured?.trim();
  return fromConfig ? fromConfig : undefined;
}
