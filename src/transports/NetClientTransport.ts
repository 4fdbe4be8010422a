/**
 * Client transport using a `node:net` socket.
 *
 * One connection, no reconnect. The client handles the handshake and framing;
 * this transport only moves raw bytes.
 */

import net from 'node:net';
import type { Socket } from 'node:net';
import createDebug from 'debug';
import { ConnectionError } from '../errors.ts';
import type { ClientTransport } from './ClientTransport.ts';

const debug = createDebug('handwire:net-client-transport');

type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export class NetClientTransport implements ClientTransport {
  private _socket: Socket | null = null;
  private _state: ConnectionState = 'disconnected';
  private _closeReported = false;

  private _onData: ((chunk: Uint8Array) => void)[] = [];
  private _onClose: ((err?: Error) => void)[] = [];

  get connected(): boolean {
    return this._state === 'connected';
  }

  onData(cb: (chunk: Uint8Array) => void): void {
    this._onData.push(cb);
  }
  onClose(cb: (err?: Error) => void): void {
    this._onClose.push(cb);
  }

  connect(host: string, port: number): Promise<void> {
    if (this._state !== 'disconnected') {
      return Promise.reject(new ConnectionError(`Already ${this._state}`));
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      this._state = 'connecting';
      this._closeReported = false;
      debug('Connecting to %s:%d', host, port);

      const socket = net.connect({ host, port });
      this._socket = socket;

      socket.once('connect', () => {
        this._state = 'connected';
        settled = true;
        debug('Connected to %s:%d', host, port);
        resolve();
      });

      socket.on('data', (chunk: Buffer) => {
        for (const cb of this._onData) cb(chunk);
      });

      socket.on('error', (err) => {
        debug('Socket error on %s:%d: %o', host, port, err);
        if (!settled) {
          settled = true;
          this._state = 'disconnected';
          this._socket = null;
          reject(new ConnectionError(`Could not connect to ${host}:${port}: ${err.message}`));
          return;
        }
        this._reportClose(err);
      });

      socket.on('end', () => this._reportClose());
      socket.on('close', () => {
        if (settled) this._reportClose();
      });
    });
  }

  write(bytes: Uint8Array): void {
    if (!this._socket || this._state !== 'connected') {
      throw new ConnectionError('Cannot write, not connected');
    }
    this._socket.write(bytes);
  }

  close(): void {
    if (this._socket) {
      this._socket.end();
      this._socket = null;
    }
    this._state = 'disconnected';
  }

  private _reportClose(err?: Error): void {
    this._state = 'disconnected';
    if (this._closeReported) return;
    this._closeReported = true;
    debug('Disconnected');
    for (const cb of this._onClose) cb(err);
  }
}
