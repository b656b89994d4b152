/** A session explicitly asked for exists but its file cannot be read back. */
export class SessionCorruptError extends Error {
  constructor(
    public readonly sessionId: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'SessionCorruptError';
  }
}

/** The session index exists but is not a valid index document. */
export class SessionIndexError extends Error {
  constructor(
    public readonly indexPath: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'SessionIndexError';
  }
}
