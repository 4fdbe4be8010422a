/**
 * Generic server-side byte-stream transport.
 *
 * This abstracts the platform's TCP stack. The multiplexer owns everything
 * above raw bytes: handshake, framing and routing.
 */

export interface ServerTransport<Conn = unknown> {
  /**
   * Start listening.
   */
  listen(host: string, port: number): Promise<void>;

  /**
   * Bound address once listening, null before.
   */
  address(): { host: string; port: number } | null;

  /**
   * Close the listener and all active connections.
   */
  close(): Promise<void>;

  /**
   * Register a callback invoked for each accepted connection.
   */
  onConnection(cb: (conn: Conn) => void): void;

  /**
   * Register a callback invoked for each chunk read from a connection.
   */
  onData(cb: (conn: Conn, chunk: Uint8Array) => void): void;

  /**
   * Register a callback invoked once when a connection reaches end-of-stream
   * or fails. `err` is set for failures.
   */
  onDisconnection(cb: (conn: Conn, err?: Error) => void): void;

  /**
   * Write bytes to a connection.
   *
   * @throws ConnectionError if the connection can no longer be written
   */
  write(conn: Conn, bytes: Uint8Array): void;

  /**
   * Close a connection. Safe to call more than once.
   */
  closeConnection(conn: Conn): void;
}
