/**
 * External trigger whose firing makes the multiplexer reload a resource and
 * push its full content to every open peer.
 */
export interface ContentSource {
  readonly name: string;

  /**
   * Register the change callback and start watching.
   */
  subscribe(cb: () => void): void;

  /**
   * Read the current content.
   */
  load(): Promise<Buffer>;

  /**
   * Stop watching.
   */
  close(): Promise<void>;
}
