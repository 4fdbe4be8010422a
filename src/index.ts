/**
 * handwire: a hand-built WebSocket (RFC 6455 subset) server and client on raw
 * TCP, with its own SHA-1, Base64, framing and a single-threaded multiplexer.
 *
 * ## Public API
 * - `WebSocketServer`: listens, upgrades peers and runs a broadcast policy
 * - `WebSocketClient`: connects, handshakes and exchanges frames
 * - `FileMonitor`: pushes a file's content to every viewer on change
 *
 * ## Example (chat relay)
 * ```ts
 * import { WebSocketServer, WebSocketClient } from 'handwire';
 *
 * const server = new WebSocketServer({ host: '127.0.0.1', port: 8080, policy: 'chat' });
 * await server.ready();
 *
 * const alice = new WebSocketClient({ port: 8080 });
 * const bob = new WebSocketClient({ port: 8080 });
 * await alice.connect();
 * await bob.connect();
 *
 * bob.on('message', (frame) => console.log(frame.payload.toString()));
 * alice.sendChat({ username: 'alice', message: 'hi' }); // bob prints "[alice] hi"
 * ```
 *
 * ## Example (custom policy)
 * ```ts
 * import { WebSocketServer } from 'handwire';
 * import type { BroadcastPolicy } from 'handwire';
 *
 * const shout: BroadcastPolicy = {
 *   name: 'shout',
 *   onMessage: (ctx, _from, frame) => {
 *     ctx.broadcast(frame.payload.toString('utf8').toUpperCase());
 *   },
 * };
 * const server = new WebSocketServer({ port: 8080, policy: shout });
 * ```
 *
 * @packageDocumentation
 */

export { WebSocketServer } from './Server.ts';
export { WebSocketClient } from './Client.ts';
export { FileMonitor } from './FileMonitor.ts';
export { Multiplexer } from './mux/Multiplexer.ts';
export { chatPolicy, echoPolicy, logPolicy, policyByName } from './mux/policies.ts';
export { NetServerTransport } from './transports/NetServerTransport.ts';
export { NetClientTransport } from './transports/NetClientTransport.ts';
export { FileContentSource } from './sources/FileContentSource.ts';
export { Sha1, sha1 } from './sha1.ts';
export { encodeBase64, decodeBase64 } from './base64.ts';
export { MAX_PAYLOAD_LENGTH, Opcode, FrameReader, buildFrame, parseFrame } from './wire.ts';
export {
  MAGIC_GUID,
  acceptHandshake,
  buildHandshakeRequest,
  buildHandshakeResponse,
  computeAcceptToken,
  generateKey,
  isUpgradeRequest,
  verifyHandshakeResponse,
} from './handshake.ts';
export { decodeChatPayload, encodeChatPayload, formatChatLine } from './chat.ts';
export { renderMonitorPage } from './page.ts';
export {
  ErrorCode,
  ValidationError,
  HandshakeError,
  FrameTooLargeError,
  MalformedPayloadError,
  EncodingError,
  ConnectionError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';

export type { WebSocketServerEvents } from './Server.ts';
export type { WebSocketClientEvents } from './Client.ts';
export type { FileMonitorOptions } from './FileMonitor.ts';
export type { Frame, FrameType, ParseResult, BuildFrameOptions } from './wire.ts';
export type { AcceptedHandshake, HandshakeRequestOptions } from './handshake.ts';
export type { ChatPayload } from './chat.ts';
export type { ErrorCodeType } from './errors.ts';
export type { ClientTransport } from './transports/ClientTransport.ts';
export type { ServerTransport } from './transports/ServerTransport.ts';
export type { ContentSource } from './sources/ContentSource.ts';
export type {
  BroadcastPolicy,
  ClientOptions,
  ConnectionState,
  HttpFallback,
  JSONSchema,
  MultiplexerHooks,
  MultiplexerOptions,
  Peer,
  PolicyContext,
  PolicyName,
  ServerOptions,
} from './types.ts';
