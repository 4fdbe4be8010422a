/**
 * Test utilities: in-process transports and frame helpers.
 */

import { ConnectionError } from '../src/errors.ts';
import type { ClientTransport } from '../src/transports/ClientTransport.ts';
import type { ServerTransport } from '../src/transports/ServerTransport.ts';
import type { ContentSource } from '../src/sources/ContentSource.ts';
import { FrameReader, Opcode, buildFrame } from '../src/wire.ts';
import type { Frame } from '../src/wire.ts';

/** RFC 6455 section 1.3 sample nonce and its accept token. */
export const SAMPLE_KEY = 'dGhlIHNhbXBsZSBub25jZQ==';
export const SAMPLE_ACCEPT = 's3pPLMBiTxaQ9kYGzzhZRbK+xOo=';

export const SAMPLE_RESPONSE =
  'HTTP/1.1 101 Switching Protocols\r\n' +
  'Upgrade: websocket\r\n' +
  'Connection: Upgrade\r\n' +
  `Sec-WebSocket-Accept: ${SAMPLE_ACCEPT}\r\n\r\n`;

const TEST_MASK = Uint8Array.from([0x11, 0x22, 0x33, 0x44]);

export function upgradeRequest(key = SAMPLE_KEY): string {
  return (
    'GET /chat HTTP/1.1\r\n' +
    'Host: server.example.com\r\n' +
    'Upgrade: websocket\r\n' +
    'Connection: Upgrade\r\n' +
    `Sec-WebSocket-Key: ${key}\r\n` +
    'Sec-WebSocket-Version: 13\r\n\r\n'
  );
}

/**
 * A masked frame as a client would send it.
 */
export function clientFrame(payload: Uint8Array | string, opcode: Opcode = Opcode.TEXT): Buffer {
  return buildFrame(payload, opcode, { maskKey: TEST_MASK });
}

/**
 * One server-side connection.
 */
export class MemoryConnection {
  readonly id: number;
  /** Every chunk the server wrote, in order. */
  readonly written: Buffer[] = [];
  /** Every chunk the peer sent, in order. */
  readonly received: Buffer[] = [];
  closed = false;
  /** When set, server writes throw. */
  failWrites = false;
  client: MemoryClientTransport | null = null;

  constructor(id: number) {
    this.id = id;
  }

  /**
   * Frames written by the server after (and excluding) any HTTP response.
   */
  frames(): Frame[] {
    const reader = new FrameReader();
    return this.written
      .filter((chunk) => !chunk.toString('latin1').startsWith('HTTP/'))
      .flatMap((chunk) => reader.push(chunk));
  }

  /**
   * Frames the peer sent after its handshake request.
   */
  sentFrames(): Frame[] {
    const reader = new FrameReader();
    return this.received
      .filter((chunk) => !chunk.toString('latin1').startsWith('GET '))
      .flatMap((chunk) => reader.push(chunk));
  }

  text(): string[] {
    return this.frames()
      .filter((frame) => frame.type === 'text')
      .map((frame) => frame.payload.toString('utf8'));
  }
}

/**
 * Server transport driven by the test: `dial`, `deliver` and `hangup` play the
 * part of remote peers.
 */
export class MemoryServerTransport implements ServerTransport<MemoryConnection> {
  readonly connections: MemoryConnection[] = [];
  private _address: { host: string; port: number } | null = null;
  private _nextId = 1;
  private _failListen: Error | null = null;

  private _onConnection: ((conn: MemoryConnection) => void) | null = null;
  private _onData: ((conn: MemoryConnection, chunk: Uint8Array) => void) | null = null;
  private _onDisconnection: ((conn: MemoryConnection, err?: Error) => void) | null = null;

  get listening(): boolean {
    return this._address !== null;
  }

  /**
   * Make the next `listen` fail.
   */
  failListen(err: Error): void {
    this._failListen = err;
  }

  listen(host: string, port: number): Promise<void> {
    if (this._failListen) return Promise.reject(this._failListen);
    this._address = { host, port: port === 0 ? 40000 : port };
    return Promise.resolve();
  }

  address(): { host: string; port: number } | null {
    return this._address;
  }

  close(): Promise<void> {
    this._address = null;
    for (const conn of this.connections) this.closeConnection(conn);
    return Promise.resolve();
  }

  onConnection(cb: (conn: MemoryConnection) => void): void {
    this._onConnection = cb;
  }

  onData(cb: (conn: MemoryConnection, chunk: Uint8Array) => void): void {
    this._onData = cb;
  }

  onDisconnection(cb: (conn: MemoryConnection, err?: Error) => void): void {
    this._onDisconnection = cb;
  }

  write(conn: MemoryConnection, bytes: Uint8Array): void {
    if (conn.closed || conn.failWrites) {
      throw new ConnectionError(`connection ${conn.id} is not writable`);
    }
    const chunk = Buffer.from(bytes);
    conn.written.push(chunk);
    conn.client?.receive(chunk);
  }

  closeConnection(conn: MemoryConnection): void {
    if (conn.closed) return;
    conn.closed = true;
    conn.client?.remoteClosed();
  }

  // --- remote side ---

  dial(): MemoryConnection {
    const conn = new MemoryConnection(this._nextId++);
    this.connections.push(conn);
    this._onConnection?.(conn);
    return conn;
  }

  deliver(conn: MemoryConnection, bytes: Uint8Array | string): void {
    const chunk = typeof bytes === 'string' ? Buffer.from(bytes, 'latin1') : Buffer.from(bytes);
    conn.received.push(chunk);
    this._onData?.(conn, chunk);
  }

  hangup(conn: MemoryConnection, err?: Error): void {
    if (conn.closed) return;
    conn.closed = true;
    this._onDisconnection?.(conn, err);
  }
}

/**
 * Client transport wired to a MemoryServerTransport.
 */
export class MemoryClientTransport implements ClientTransport {
  private _conn: MemoryConnection | null = null;
  private _onData: ((chunk: Uint8Array) => void)[] = [];
  private _onClose: ((err?: Error) => void)[] = [];

  constructor(private _server: MemoryServerTransport) {}

  get connected(): boolean {
    return this._conn !== null && !this._conn.closed;
  }

  get connection(): MemoryConnection | null {
    return this._conn;
  }

  connect(host: string, port: number): Promise<void> {
    const address = this._server.address();
    if (!address || address.port !== port) {
      return Promise.reject(new ConnectionError(`Could not connect to ${host}:${port}`));
    }
    const conn = this._server.dial();
    conn.client = this;
    this._conn = conn;
    return Promise.resolve();
  }

  close(): void {
    if (!this._conn || this._conn.closed) return;
    this._server.hangup(this._conn);
    this._emitClose();
  }

  write(bytes: Uint8Array): void {
    if (!this._conn || this._conn.closed) {
      throw new ConnectionError('not connected');
    }
    this._server.deliver(this._conn, bytes);
  }

  onData(cb: (chunk: Uint8Array) => void): void {
    this._onData.push(cb);
  }

  onClose(cb: (err?: Error) => void): void {
    this._onClose.push(cb);
  }

  receive(chunk: Buffer): void {
    for (const cb of this._onData) cb(chunk);
  }

  remoteClosed(): void {
    this._emitClose();
  }

  private _emitClose(): void {
    for (const cb of this._onClose) cb();
  }
}

/**
 * Client transport that answers the first write with a canned response.
 */
export class ScriptedClientTransport implements ClientTransport {
  connected = false;
  readonly writes: Buffer[] = [];
  private _onData: ((chunk: Uint8Array) => void)[] = [];
  private _onClose: ((err?: Error) => void)[] = [];

  constructor(private _reply: (request: string) => string | null) {}

  connect(): Promise<void> {
    this.connected = true;
    return Promise.resolve();
  }

  close(): void {
    if (!this.connected) return;
    this.connected = false;
    for (const cb of this._onClose) cb();
  }

  write(bytes: Uint8Array): void {
    if (!this.connected) throw new ConnectionError('not connected');
    const chunk = Buffer.from(bytes);
    this.writes.push(chunk);
    if (this.writes.length !== 1) return;
    const reply = this._reply(chunk.toString('latin1'));
    queueMicrotask(() => {
      if (reply === null) {
        this.close();
        return;
      }
      for (const cb of this._onData) cb(Buffer.from(reply, 'latin1'));
    });
  }

  onData(cb: (chunk: Uint8Array) => void): void {
    this._onData.push(cb);
  }

  onClose(cb: (err?: Error) => void): void {
    this._onClose.push(cb);
  }
}

/**
 * Content source fired by the test.
 */
export class FakeSource implements ContentSource {
  readonly name: string;
  content: Buffer;
  failLoads = false;
  closed = false;
  private _listeners: (() => void)[] = [];

  constructor(name: string, content: string) {
    this.name = name;
    this.content = Buffer.from(content, 'utf8');
  }

  subscribe(cb: () => void): void {
    this._listeners.push(cb);
  }

  load(): Promise<Buffer> {
    if (this.failLoads) return Promise.reject(new Error(`cannot read ${this.name}`));
    return Promise.resolve(this.content);
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  fire(content?: string): void {
    if (content !== undefined) this.content = Buffer.from(content, 'utf8');
    for (const cb of this._listeners) cb();
  }
}

/**
 * Promise-based delay.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll until `predicate` holds.
 *
 * @param timeout - Timeout in milliseconds (default: 2000)
 */
export async function waitUntil(predicate: () => boolean, timeout = 2000): Promise<void> {
  const deadline = Date.now() + timeout;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('Timeout waiting for condition');
    await delay(5);
  }
}
