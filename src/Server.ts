/**
 * WebSocketServer - responder side.
 *
 * Creates and manages the server transport and the multiplexer.
 */

import { EventEmitter } from 'node:events';
import createDebug from 'debug';
import { resolveServerConfig } from './config.ts';
import type { ServerConfig } from './config.ts';
import { toError } from './errors.ts';
import { Multiplexer } from './mux/Multiplexer.ts';
import { NetServerTransport } from './transports/NetServerTransport.ts';
import type { ServerTransport } from './transports/ServerTransport.ts';
import type { Peer, ServerOptions } from './types.ts';
import type { Frame, Opcode } from './wire.ts';

const debug = createDebug('handwire:server');

/**
 * Events emitted by WebSocketServer
 */
export interface WebSocketServerEvents {
  open: [peer: Peer];
  close: [peer: Peer];
  message: [peer: Peer, frame: Frame];
  reload: [sourceName: string, content: Buffer];
}

export class WebSocketServer extends EventEmitter {
  private _config: ServerConfig;
  private _transport: ServerTransport;
  private _mux: Multiplexer<unknown>;
  private _closed = false;

  // Ready state
  private _readyPromise: Promise<void>;

  constructor(options: ServerOptions = {}) {
    super();
    this._config = resolveServerConfig(options);
    this._transport = options.serverTransport ?? new NetServerTransport();

    this._mux = new Multiplexer<unknown>(this._transport, {
      policy: this._config.policy,
      maxHandshakeBytes: this._config.maxHandshakeBytes,
      ...(options.sources ? { sources: options.sources } : {}),
      ...(options.httpFallback ? { httpFallback: options.httpFallback } : {}),
      hooks: {
        onOpen: (peer) => this.emit('open', peer),
        onClose: (peer) => this.emit('close', peer),
        onMessage: (peer, frame) => this.emit('message', peer, frame),
        onReload: (source, content) => this.emit('reload', source.name, content),
      },
    });

    this._readyPromise = this._listen();
    // Callers observe failures through ready().
    this._readyPromise.catch(() => undefined);
  }

  /**
   * Wait for the server to be listening.
   */
  ready(): Promise<void> {
    return this._readyPromise;
  }

  /**
   * Bound address once listening.
   */
  get address(): { host: string; port: number } | null {
    return this._transport.address();
  }

  get clientCount(): number {
    return this._mux.clientCount;
  }

  get peers(): Peer[] {
    return this._mux.peers;
  }

  get policyName(): string {
    return this._mux.policy.name;
  }

  /**
   * Send one frame to every open peer.
   *
   * @returns number of peers written successfully
   */
  broadcastText(text: string): number {
    return this._mux.broadcast(text);
  }

  broadcast(payload: Uint8Array | string, opcode?: Opcode): number {
    return this._mux.broadcast(payload, opcode === undefined ? {} : { opcode });
  }

  /**
   * Resolves once every event received so far has been processed.
   */
  settled(): Promise<void> {
    return this._mux.whenIdle();
  }

  /**
   * Send a CLOSE frame to every peer, then shut down.
   */
  async quit(): Promise<void> {
    if (this._closed) return;
    debug('Quitting (%d peers)', this._mux.clientCount);
    this._mux.quit();
    await this.close();
  }

  /**
   * Close every connection, stop watching sources and stop listening.
   */
  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    debug('Closing server');
    await this._readyPromise.catch(() => undefined);
    await this._mux.close();
    await this._transport.close();
    debug('Server closed');
  }

  private async _listen(): Promise<void> {
    const { host, port } = this._config;
    try {
      await this._transport.listen(host, port);
    } catch (err) {
      const error = toError(err);
      debug('Listen failed: %s', error.message);
      throw error;
    }
    debug('Server listening on %s:%d (policy=%s)', host, this.address?.port ?? port, this._config.policy.name);
  }
}
