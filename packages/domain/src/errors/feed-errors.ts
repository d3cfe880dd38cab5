/** Transport failure on the live feed: open, read or send. Recoverable by reconnecting. */
export class FeedConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FeedConnectionError';
  }
}

/** The raw log could not be opened for reading. Fatal for an offline pass. */
export class RawLogUnavailableError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`raw log '${path}' cannot be opened for reading`, options);
    this.name = 'RawLogUnavailableError';
  }
}
