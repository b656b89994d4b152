export { SecurityError } from './errors.js';
export {
  ENCRYPTION_KEY_ENV,
  generateKey,
  isValidKey,
  encryptText,
  decryptText,
  resolveEncryptionKey,
} from './fernet.js';
export {
  REDACTION_TOKEN,
  DEFAULT_MASK_PATTERNS,
  compileMaskPattern,
  maskText,
  maskMessages,
} from './mask.js';
