export type FeedFrame =
  | { readonly kind: 'text'; readonly data: string }
  | { readonly kind: 'binary' }
  | { readonly kind: 'ping' }
  | { readonly kind: 'pong' }
  | { readonly kind: 'close'; readonly code?: number };

/**
 * One open streaming session. `frames()` ends after yielding a close frame
 * and throws FeedConnectionError on a read failure.
 */
export interface FeedConnection {
  send(text: string): Promise<void>;
  frames(): AsyncIterable<FeedFrame>;
  close(): void;
}

export interface FeedConnectorPort {
  /** Rejects with FeedConnectionError when the endpoint cannot be reached. */
  connect(url: string): Promise<FeedConnection>;
}
