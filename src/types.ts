/**
 * Core type definitions for the protocol library.
 */

import type { Frame, Opcode } from './wire.ts';
import type { ContentSource } from './sources/ContentSource.ts';
import type { ClientTransport } from './transports/ClientTransport.ts';
import type { ServerTransport } from './transports/ServerTransport.ts';

/**
 * JSON Schema definition (subset used for option validation)
 */
export interface JSONSchema {
  type?: string | string[];
  properties?: Record<string, JSONSchema>;
  additionalProperties?: boolean | JSONSchema;
  items?: JSONSchema;
  required?: string[];
  enum?: unknown[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
  pattern?: string;
}

/**
 * Lifecycle of one connection. `closed` is terminal.
 */
export type ConnectionState = 'connecting' | 'open' | 'closing' | 'closed';

/**
 * A connection as seen by policies and hooks.
 */
export interface Peer {
  readonly id: number;
  readonly state: ConnectionState;
}

/**
 * Operations a policy may perform while handling one message.
 */
export interface PolicyContext {
  /** Open peers in registry order. */
  readonly peers: Iterable<Peer>;
  /**
   * Send one frame. A failed write drops that peer and returns false.
   */
  send(peer: Peer, payload: Uint8Array | string, opcode?: Opcode): boolean;
  /**
   * Send one frame to every open peer except `except`.
   *
   * @returns number of peers written successfully
   */
  broadcast(payload: Uint8Array | string, options?: { opcode?: Opcode; except?: Peer }): number;
}

/**
 * What the multiplexer does with a data frame (TEXT or BINARY, non-empty).
 */
export interface BroadcastPolicy {
  readonly name: string;
  onMessage(ctx: PolicyContext, from: Peer, frame: Frame): void;
}

export type PolicyName = 'log' | 'echo' | 'chat';

/**
 * Lifecycle callbacks surfaced by the multiplexer.
 */
export interface MultiplexerHooks {
  onOpen?(peer: Peer): void;
  onClose?(peer: Peer): void;
  onMessage?(peer: Peer, frame: Frame): void;
  onReload?(source: ContentSource, content: Buffer): void;
}

/**
 * Response for plain (non-upgrade) HTTP requests.
 */
export type HttpFallback = (request: string) => string | Uint8Array;

export interface MultiplexerOptions {
  policy: BroadcastPolicy;
  sources?: ContentSource[];
  hooks?: MultiplexerHooks;
  httpFallback?: HttpFallback;
  /** Upper bound on a handshake request head. */
  maxHandshakeBytes?: number;
}

export interface ServerOptions {
  /** Bind address (default: 0.0.0.0) */
  host?: string;
  /** Listening port, 0 for any free port (default: 8080) */
  port?: number;
  /** Built-in policy name or a custom policy (default: 'chat') */
  policy?: PolicyName | BroadcastPolicy;
  /** Upper bound on a handshake request head (default: 8192) */
  maxHandshakeBytes?: number;
  /** Sources whose changes are pushed to every peer */
  sources?: ContentSource[];
  /** Page for non-upgrade HTTP requests; without it they fail the handshake */
  httpFallback?: HttpFallback;
  /** Transport override (default: node:net) */
  serverTransport?: ServerTransport;
}

export interface ClientOptions {
  /** Server host (default: 127.0.0.1) */
  host?: string;
  /** Server port (default: 8080) */
  port?: number;
  /** Request path (default: /) */
  path?: string;
  /** Handshake nonce (default: 16 random bytes) */
  key?: string;
  /** Mask outgoing frames (default: true) */
  mask?: boolean;
  /** Transport override (default: node:net) */
  clientTransport?: ClientTransport;
}
