/**
 * Raised for key and encryption problems: a missing or malformed key,
 * an undecryptable payload, or an unusable mask pattern. Callers must
 * surface it rather than fall back to writing plaintext.
 */
export class SecurityError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SecurityError';
  }
}
