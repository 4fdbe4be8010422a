/**
 * Server-side connection multiplexer.
 *
 * Transport callbacks only record readiness. A single loop iteration, never
 * overlapping another, then services everything that became ready in a fixed
 * order:
 *
 * 1. listener: connecting peers whose request head has arrived are handshaken
 *    and registered (or closed);
 * 2. triggers: fired content sources are reloaded and broadcast;
 * 3. connections: peers registered before this iteration began have their
 *    buffered bytes decoded and dispatched, or are dropped on end-of-stream.
 *
 * Every failure is local to one peer; the loop itself never fails.
 */

import createDebug from 'debug';
import { toError } from '../errors.ts';
import { acceptHandshake, findHeaderEnd, isUpgradeRequest } from '../handshake.ts';
import type { AcceptedHandshake } from '../handshake.ts';
import { ClientRegistry } from '../registry.ts';
import { FrameReader, Opcode, buildFrame } from '../wire.ts';
import type { Frame } from '../wire.ts';
import type { ContentSource } from '../sources/ContentSource.ts';
import type { ServerTransport } from '../transports/ServerTransport.ts';
import type {
  BroadcastPolicy,
  ConnectionState,
  HttpFallback,
  MultiplexerHooks,
  MultiplexerOptions,
  Peer,
  PolicyContext,
} from '../types.ts';

const debug = createDebug('handwire:mux');

const DEFAULT_MAX_HANDSHAKE_BYTES = 8192;
const EMPTY = Buffer.alloc(0);

interface PeerRecord<Conn> extends Peer {
  readonly id: number;
  state: ConnectionState;
  readonly conn: Conn;
  /** Request head accumulated while connecting. */
  head: Buffer;
  /** Chunks read since the last iteration. */
  inbox: Buffer[];
  ended: boolean;
  error: Error | null;
  readonly reader: FrameReader;
}

export class Multiplexer<Conn> {
  private _transport: ServerTransport<Conn>;
  private _policy: BroadcastPolicy;
  private _sources: ContentSource[];
  private _hooks: MultiplexerHooks;
  private _httpFallback: HttpFallback | null;
  private _maxHandshakeBytes: number;
  private _context: PolicyContext;

  private _registry = new ClientRegistry<PeerRecord<Conn>>();
  private _records = new Map<Conn, PeerRecord<Conn>>();
  private _byId = new Map<number, PeerRecord<Conn>>();
  private _nextId = 1;
  private _firedSources = new Set<ContentSource>();

  // Loop state
  private _scheduled = false;
  private _running = false;
  private _dirty = false;
  private _stopped = false;
  private _idleWaiters: (() => void)[] = [];

  constructor(transport: ServerTransport<Conn>, options: MultiplexerOptions) {
    this._transport = transport;
    this._policy = options.policy;
    this._sources = options.sources ?? [];
    this._hooks = options.hooks ?? {};
    this._httpFallback = options.httpFallback ?? null;
    this._maxHandshakeBytes = options.maxHandshakeBytes ?? DEFAULT_MAX_HANDSHAKE_BYTES;

    this._context = {
      peers: this._registry,
      send: (peer, payload, opcode = Opcode.TEXT) => {
        const record = this._byId.get(peer.id);
        if (!record) return false;
        return this._sendTo(record, buildFrame(payload, opcode));
      },
      broadcast: (payload, opts) => this.broadcast(payload, opts),
    };

    this._transport.onConnection((conn) => {
      const record: PeerRecord<Conn> = {
        id: this._nextId++,
        state: 'connecting',
        conn,
        head: EMPTY,
        inbox: [],
        ended: false,
        error: null,
        reader: new FrameReader(),
      };
      this._records.set(conn, record);
      this._byId.set(record.id, record);
      debug('peer %d connecting', record.id);
    });

    this._transport.onData((conn, chunk) => {
      const record = this._records.get(conn);
      if (!record) return;
      record.inbox.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      this._schedule();
    });

    this._transport.onDisconnection((conn, err) => {
      const record = this._records.get(conn);
      if (!record) return;
      record.ended = true;
      record.error = err ?? null;
      this._schedule();
    });

    for (const source of this._sources) {
      source.subscribe(() => {
        this._firedSources.add(source);
        this._schedule();
      });
    }
  }

  /**
   * Number of open (handshaken) peers.
   */
  get clientCount(): number {
    return this._registry.size;
  }

  /**
   * Open peers in registry order.
   */
  get peers(): Peer[] {
    return this._registry.snapshot();
  }

  get policy(): BroadcastPolicy {
    return this._policy;
  }

  /**
   * Send one frame to every open peer (except `options.except`).
   * Send-and-forget: a failed write drops that peer and delivery continues.
   *
   * @returns number of peers written successfully
   * @throws FrameTooLargeError if the payload does not fit one frame
   */
  broadcast(payload: Uint8Array | string, options: { opcode?: Opcode; except?: Peer } = {}): number {
    const frame = buildFrame(payload, options.opcode ?? Opcode.TEXT);
    let delivered = 0;
    for (const record of this._registry) {
      if (record === options.except) continue;
      if (this._sendTo(record, frame)) delivered++;
    }
    return delivered;
  }

  /**
   * Send a CLOSE frame to every open peer, then close every connection.
   */
  quit(): void {
    const frame = buildFrame(EMPTY, Opcode.CLOSE);
    for (const record of this._registry) {
      record.state = 'closing';
      this._sendTo(record, frame);
    }
    for (const record of [...this._records.values()]) {
      this._drop(record, 'shutdown');
    }
  }

  /**
   * Stop the loop, drop every connection and stop watching sources.
   */
  async close(): Promise<void> {
    this._stopped = true;
    for (const record of [...this._records.values()]) {
      this._drop(record, 'shutdown');
    }
    this._firedSources.clear();
    await Promise.all(this._sources.map((source) => source.close()));
    this._notifyIdle();
  }

  /**
   * Resolves once no iteration is scheduled or running.
   */
  whenIdle(): Promise<void> {
    if (!this._scheduled && !this._running) return Promise.resolve();
    return new Promise((resolve) => this._idleWaiters.push(resolve));
  }

  private _schedule(): void {
    if (this._stopped) return;
    if (this._running) {
      this._dirty = true;
      return;
    }
    if (this._scheduled) return;
    this._scheduled = true;
    setImmediate(() => {
      this._scheduled = false;
      this._runIteration().catch((err) => debug('iteration failed: %o', err));
    });
  }

  private async _runIteration(): Promise<void> {
    this._running = true;
    try {
      const registered = this._registry.snapshot();
      this._acceptPhase();
      await this._triggerPhase();
      this._readPhase(registered);
    } finally {
      this._running = false;
      if (this._dirty && !this._stopped) {
        this._dirty = false;
        this._schedule();
      } else {
        this._dirty = false;
        this._notifyIdle();
      }
    }
  }

  private _notifyIdle(): void {
    const waiters = this._idleWaiters;
    this._idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  // --- listener phase ---

  private _acceptPhase(): void {
    for (const record of this._records.values()) {
      if (record.state !== 'connecting') continue;
      if (record.inbox.length === 0 && !record.ended) continue;
      this._accept(record);
    }
  }

  private _accept(record: PeerRecord<Conn>): void {
    if (record.inbox.length > 0) {
      record.head = Buffer.concat([record.head, ...record.inbox]);
      record.inbox = [];
    }
    if (record.ended) {
      this._drop(record, 'ended before handshake');
      return;
    }

    const end = findHeaderEnd(record.head);
    if (end === -1) {
      if (record.head.length >= this._maxHandshakeBytes) {
        this._drop(record, `request head exceeds ${this._maxHandshakeBytes} bytes`);
      }
      return;
    }

    const request = record.head.subarray(0, end).toString('latin1');
    const rest = record.head.subarray(end);
    record.head = EMPTY;

    if (this._httpFallback && !isUpgradeRequest(request)) {
      this._serveFallback(record, request, this._httpFallback);
      return;
    }

    let accepted: AcceptedHandshake;
    try {
      accepted = acceptHandshake(request);
    } catch (err) {
      this._drop(record, toError(err).message);
      return;
    }

    try {
      this._transport.write(record.conn, Buffer.from(accepted.response, 'latin1'));
    } catch (err) {
      this._drop(record, `handshake write failed: ${toError(err).message}`);
      return;
    }

    record.state = 'open';
    this._registry.add(record);
    debug('peer %d open (total=%d)', record.id, this._registry.size);
    this._hooks.onOpen?.(record);

    if (rest.length > 0) {
      // Frames sent right behind the request; read next iteration.
      record.inbox.push(Buffer.from(rest));
      this._schedule();
    }
  }

  private _serveFallback(record: PeerRecord<Conn>, request: string, fallback: HttpFallback): void {
    try {
      const response = fallback(request);
      this._transport.write(record.conn, typeof response === 'string' ? Buffer.from(response, 'utf8') : response);
      debug('peer %d served plain HTTP', record.id);
    } catch (err) {
      debug('peer %d fallback failed: %o', record.id, err);
    }
    this._drop(record, 'plain HTTP request');
  }

  // --- trigger phase ---

  private async _triggerPhase(): Promise<void> {
    if (this._firedSources.size === 0) return;
    const fired = [...this._firedSources];
    this._firedSources.clear();

    for (const source of fired) {
      let content: Buffer;
      try {
        content = await source.load();
      } catch (err) {
        debug('reload of %s failed: %o', source.name, err);
        continue;
      }
      if (this._stopped) return;
      this._hooks.onReload?.(source, content);

      try {
        const delivered = this.broadcast(content);
        debug('pushed %d bytes from %s to %d peers', content.length, source.name, delivered);
      } catch (err) {
        debug('cannot push %s: %s', source.name, toError(err).message);
      }
    }
  }

  // --- connection phase ---

  private _readPhase(registered: PeerRecord<Conn>[]): void {
    for (const record of registered) {
      if (record.state !== 'open') continue;
      if (record.inbox.length === 0 && !record.ended) continue;
      this._read(record);
    }
  }

  private _read(record: PeerRecord<Conn>): void {
    const chunks = record.inbox;
    record.inbox = [];

    for (const chunk of chunks) {
      const dropped = record.reader.dropped;
      const frames = record.reader.push(chunk);
      if (record.reader.dropped !== dropped) {
        debug('peer %d sent an unsupported 64-bit length frame, input discarded', record.id);
      }
      for (const frame of frames) {
        this._dispatch(record, frame);
        if (record.state !== 'open') return;
      }
    }

    if (record.ended) {
      this._drop(record, record.error ? `read error: ${record.error.message}` : 'end of stream');
    }
  }

  private _dispatch(record: PeerRecord<Conn>, frame: Frame): void {
    switch (frame.type) {
      case 'text':
      case 'binary':
        if (frame.payload.length === 0) return;
        this._hooks.onMessage?.(record, frame);
        try {
          this._policy.onMessage(this._context, record, frame);
        } catch (err) {
          debug('policy %s failed on peer %d: %o', this._policy.name, record.id, err);
        }
        return;
      case 'close':
        record.state = 'closing';
        // Echo the status code, if any.
        this._sendTo(record, buildFrame(frame.payload.subarray(0, 2), Opcode.CLOSE));
        this._drop(record, 'close frame');
        return;
      case 'ping':
        this._sendTo(record, buildFrame(frame.payload, Opcode.PONG));
        return;
      case 'pong':
        return;
      case 'continuation':
      case 'unknown':
        debug('peer %d: ignoring %s frame (opcode %d)', record.id, frame.type, frame.opcode);
        return;
    }
  }

  // --- shared ---

  private _sendTo(record: PeerRecord<Conn>, frame: Uint8Array): boolean {
    if (record.state === 'closed') return false;
    try {
      this._transport.write(record.conn, frame);
      return true;
    } catch (err) {
      this._drop(record, `write failed: ${toError(err).message}`);
      return false;
    }
  }

  private _drop(record: PeerRecord<Conn>, reason: string): void {
    if (record.state === 'closed') return;
    const wasOpen = this._registry.delete(record);
    record.state = 'closed';
    record.inbox = [];
    record.head = EMPTY;
    this._records.delete(record.conn);
    this._byId.delete(record.id);

    try {
      this._transport.closeConnection(record.conn);
    } catch (err) {
      debug('closing peer %d failed: %o', record.id, err);
    }

    debug('peer %d closed: %s (total=%d)', record.id, reason, this._registry.size);
    if (wasOpen) this._hooks.onClose?.(record);
  }
}
