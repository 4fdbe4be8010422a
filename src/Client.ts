/**
 * WebSocketClient - initiator side.
 *
 * Opens one connection, performs the opening handshake and exchanges frames.
 * There is no reconnect and no retry: a failed handshake or a lost connection
 * is final for this instance.
 */

import { randomBytes } from 'node:crypto';
import { EventEmitter } from 'node:events';
import createDebug from 'debug';
import { encodeChatPayload } from './chat.ts';
import type { ChatPayload } from './chat.ts';
import { resolveClientConfig } from './config.ts';
import type { ClientConfig } from './config.ts';
import { ConnectionError, HandshakeError } from './errors.ts';
import { buildHandshakeRequest, findHeaderEnd, generateKey, verifyHandshakeResponse } from './handshake.ts';
import { NetClientTransport } from './transports/NetClientTransport.ts';
import type { ClientTransport } from './transports/ClientTransport.ts';
import type { ClientOptions, ConnectionState } from './types.ts';
import { FrameReader, Opcode, buildFrame } from './wire.ts';
import type { Frame } from './wire.ts';

const debug = createDebug('handwire:client');

const EMPTY = Buffer.alloc(0);

/**
 * Events emitted by WebSocketClient
 */
export interface WebSocketClientEvents {
  message: [frame: Frame];
  close: [err?: Error];
}

type ClientState = 'idle' | ConnectionState;

interface PendingHandshake {
  resolve: (head: { response: string; rest: Buffer }) => void;
  reject: (err: Error) => void;
}

export class WebSocketClient extends EventEmitter {
  private _config: ClientConfig;
  private _transport: ClientTransport;
  private _key: string;
  private _state: ClientState = 'idle';
  private _head: Buffer = EMPTY;
  private _reader = new FrameReader();
  private _pending: PendingHandshake | null = null;

  constructor(options: ClientOptions = {}) {
    super();
    this._config = resolveClientConfig(options);
    this._key = this._config.key ?? generateKey();
    this._transport = options.clientTransport ?? new NetClientTransport();

    this._transport.onData((chunk) => this._handleData(chunk));
    this._transport.onClose((err) => this._handleClose(err));
  }

  get state(): ClientState {
    return this._state;
  }

  /**
   * The handshake nonce sent with the upgrade request.
   */
  get key(): string {
    return this._key;
  }

  /**
   * Connect and complete the opening handshake.
   *
   * @throws ConnectionError if the connection cannot be opened
   * @throws HandshakeError if the response is not a valid 101 for our key
   */
  async connect(): Promise<void> {
    if (this._state !== 'idle') {
      throw new ConnectionError(`Cannot connect from state ${this._state}`);
    }
    const { host, port, path } = this._config;
    this._state = 'connecting';

    try {
      await this._transport.connect(host, port);
    } catch (err) {
      this._state = 'closed';
      throw err;
    }

    const response = new Promise<{ response: string; rest: Buffer }>((resolve, reject) => {
      this._pending = { resolve, reject };
    });

    let head: { response: string; rest: Buffer };
    try {
      this._transport.write(Buffer.from(buildHandshakeRequest({ host, port, path, key: this._key }), 'latin1'));
      head = await response;
      verifyHandshakeResponse(head.response, this._key);
    } catch (err) {
      this._pending = null;
      this._state = 'closed';
      this._transport.close();
      throw err;
    }

    this._state = 'open';
    debug('Handshake complete with %s:%d%s', host, port, path);
    if (head.rest.length > 0) this._consume(head.rest);
  }

  sendText(text: string): void {
    this._send(text, Opcode.TEXT);
  }

  sendBinary(bytes: Uint8Array): void {
    this._send(bytes, Opcode.BINARY);
  }

  /**
   * Send a chat envelope in one TEXT frame.
   */
  sendChat(payload: ChatPayload): void {
    this._send(encodeChatPayload(payload), Opcode.TEXT);
  }

  ping(payload: Uint8Array | string = EMPTY): void {
    this._send(payload, Opcode.PING);
  }

  /**
   * Send a CLOSE frame (when open) and close the connection.
   */
  close(): void {
    if (this._state === 'closed' || this._state === 'idle') {
      this._state = 'closed';
      return;
    }
    if (this._state === 'open') {
      this._state = 'closing';
      try {
        this._transport.write(this._frame(EMPTY, Opcode.CLOSE));
      } catch (err) {
        debug('close frame not sent: %o', err);
      }
    }
    this._finish();
  }

  private _send(payload: Uint8Array | string, opcode: Opcode): void {
    if (this._state !== 'open') {
      throw new ConnectionError(`Cannot send, connection is ${this._state}`);
    }
    this._transport.write(this._frame(payload, opcode));
  }

  private _frame(payload: Uint8Array | string, opcode: Opcode): Buffer {
    return this._config.mask ? buildFrame(payload, opcode, { maskKey: randomBytes(4) }) : buildFrame(payload, opcode);
  }

  private _handleData(chunk: Uint8Array): void {
    if (this._state === 'connecting') {
      this._head = Buffer.concat([this._head, chunk]);
      const end = findHeaderEnd(this._head);
      if (end === -1 || !this._pending) return;
      const pending = this._pending;
      this._pending = null;
      const response = this._head.subarray(0, end).toString('latin1');
      const rest = Buffer.from(this._head.subarray(end));
      this._head = EMPTY;
      pending.resolve({ response, rest });
      return;
    }
    if (this._state === 'open' || this._state === 'closing') {
      this._consume(chunk);
    }
  }

  private _consume(chunk: Uint8Array): void {
    for (const frame of this._reader.push(chunk)) {
      switch (frame.type) {
        case 'text':
        case 'binary':
          this.emit('message', frame);
          break;
        case 'ping':
          if (this._state === 'open') this._transport.write(this._frame(frame.payload, Opcode.PONG));
          break;
        case 'close':
          debug('Server sent close');
          this._finish();
          return;
        default:
          debug('Ignoring %s frame', frame.type);
      }
      if (this._state === 'closed') return;
    }
  }

  private _handleClose(err?: Error): void {
    if (this._pending) {
      const pending = this._pending;
      this._pending = null;
      pending.reject(new HandshakeError(`connection closed before a response${err ? `: ${err.message}` : ''}`));
      return;
    }
    if (this._state === 'closed') return;
    debug('Connection lost%s', err ? `: ${err.message}` : '');
    this._state = 'closed';
    this.emit('close', err);
  }

  private _finish(): void {
    if (this._state === 'closed') return;
    this._state = 'closed';
    this._transport.close();
    this.emit('close');
  }
}
