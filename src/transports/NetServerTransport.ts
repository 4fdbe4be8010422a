/**
 * `node:net` server transport implementation.
 */

import net from 'node:net';
import type { Socket } from 'node:net';
import createDebug from 'debug';
import { ConnectionError } from '../errors.ts';
import type { ServerTransport } from './ServerTransport.ts';

const debug = createDebug('handwire:net-server-transport');

export class NetServerTransport implements ServerTransport<Socket> {
  private _server: net.Server;
  private _listening = false;

  private _connections = new Set<Socket>();
  private _reported = new WeakSet<Socket>();

  private _onConnection: ((conn: Socket) => void) | null = null;
  private _onData: ((conn: Socket, chunk: Uint8Array) => void) | null = null;
  private _onDisconnection: ((conn: Socket, err?: Error) => void) | null = null;

  constructor() {
    this._server = net.createServer((socket) => this._accept(socket));
  }

  onConnection(cb: (conn: Socket) => void): void {
    this._onConnection = cb;
  }

  onData(cb: (conn: Socket, chunk: Uint8Array) => void): void {
    this._onData = cb;
  }

  onDisconnection(cb: (conn: Socket, err?: Error) => void): void {
    this._onDisconnection = cb;
  }

  write(conn: Socket, bytes: Uint8Array): void {
    if (conn.destroyed || !conn.writable) {
      throw new ConnectionError(`Socket ${conn.remoteAddress ?? '?'}:${conn.remotePort ?? '?'} is not writable`);
    }
    conn.write(bytes);
  }

  closeConnection(conn: Socket): void {
    if (conn.destroyed) return;
    if (conn.writable) {
      conn.end();
    } else {
      conn.destroy();
    }
  }

  listen(host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this._server.removeListener('listening', onListening);
        reject(new Error(`Failed to listen on ${host}:${port}: ${err.message}`));
      };
      const onListening = () => {
        this._server.removeListener('error', onError);
        this._listening = true;
        this._server.on('error', (err) => debug('server error: %o', err));
        debug('listening on %s:%d', host, this.address()?.port ?? port);
        resolve();
      };
      this._server.once('error', onError);
      this._server.once('listening', onListening);
      this._server.listen(port, host);
    });
  }

  address(): { host: string; port: number } | null {
    if (!this._listening) return null;
    const addr = this._server.address();
    if (!addr || typeof addr === 'string') return null;
    return { host: addr.address, port: addr.port };
  }

  close(): Promise<void> {
    for (const socket of this._connections) {
      // Let an ending socket flush its last frame first.
      if (socket.writableEnded && !socket.writableFinished) {
        socket.once('finish', () => socket.destroy());
      } else {
        socket.destroy();
      }
    }
    this._connections.clear();

    if (!this._listening) return Promise.resolve();
    this._listening = false;

    return new Promise((resolve) => {
      this._server.close((err) => {
        if (err) debug('close error: %o', err);
        debug('closed');
        resolve();
      });
    });
  }

  private _accept(socket: Socket): void {
    this._connections.add(socket);
    debug('accepted %s:%d', socket.remoteAddress, socket.remotePort);

    socket.on('data', (chunk: Buffer) => {
      this._onData?.(socket, chunk);
    });
    socket.on('end', () => this._report(socket));
    socket.on('error', (err) => this._report(socket, err));
    socket.on('close', () => this._report(socket));

    this._onConnection?.(socket);
  }

  private _report(socket: Socket, err?: Error): void {
    this._connections.delete(socket);
    if (this._reported.has(socket)) return;
    this._reported.add(socket);
    this._onDisconnection?.(socket, err);
  }
}
