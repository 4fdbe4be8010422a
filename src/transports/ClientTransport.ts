/**
 * Generic client-side byte-stream transport.
 *
 * The transport provides a single TCP connection used by the client.
 */

export interface ClientTransport {
  /**
   * Whether currently connected.
   */
  readonly connected: boolean;

  /**
   * Open the connection.
   */
  connect(host: string, port: number): Promise<void>;

  /**
   * Close the connection. There is no reconnect.
   */
  close(): void;

  /**
   * Write bytes.
   *
   * @throws ConnectionError if not connected
   */
  write(bytes: Uint8Array): void;

  /**
   * Register lifecycle callbacks.
   */
  onData(cb: (chunk: Uint8Array) => void): void;
  onClose(cb: (err?: Error) => void): void;
}
