/**
 * Opening handshake (RFC 6455 section 4).
 *
 * The responder derives `Sec-WebSocket-Accept` from the request's
 * `Sec-WebSocket-Key`; the initiator recomputes it and compares byte for byte.
 */

import { randomBytes } from 'node:crypto';
import { encodeBase64 } from './base64.ts';
import { HandshakeError } from './errors.ts';
import { sha1 } from './sha1.ts';

export const MAGIC_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

const HEADER_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');
const SWITCHING_PROTOCOLS = '101 Switching Protocols';

export interface AcceptedHandshake {
  key: string;
  acceptToken: string;
  /** The complete 101 response to write back. */
  response: string;
}

export interface HandshakeRequestOptions {
  host: string;
  port: number;
  path: string;
  key: string;
}

/**
 * Find a header value in a raw HTTP head.
 *
 * The name is matched case-sensitively at the start of a line, up to the first
 * colon. Surrounding whitespace and the trailing CR/LF are trimmed. Returns
 * null when the header is missing or empty.
 */
export function extractHeaderValue(head: string, name: string): string | null {
  for (const line of head.split('\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    if (line.slice(0, colon).trim() !== name) continue;
    const value = line.slice(colon + 1).replace(/^[ \t]+/, '').replace(/[ \t\r\n]+$/, '');
    return value.length > 0 ? value : null;
  }
  return null;
}

/**
 * Offset just past the blank line ending an HTTP head, or -1 if not received yet.
 */
export function findHeaderEnd(bytes: Uint8Array): number {
  const idx = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).indexOf(HEADER_TERMINATOR);
  return idx === -1 ? -1 : idx + HEADER_TERMINATOR.length;
}

export function computeAcceptToken(key: string): string {
  return encodeBase64(sha1(key + MAGIC_GUID));
}

/**
 * Random 16-byte nonce, Base64 encoded.
 */
export function generateKey(): string {
  return encodeBase64(randomBytes(16));
}

/**
 * True when the head carries an `Upgrade: websocket` header line.
 */
export function isUpgradeRequest(head: string): boolean {
  return extractHeaderValue(head, 'Upgrade')?.toLowerCase() === 'websocket';
}

export function buildHandshakeResponse(acceptToken: string): string {
  return (
    'HTTP/1.1 101 Switching Protocols\r\n' +
    'Upgrade: websocket\r\n' +
    'Connection: Upgrade\r\n' +
    `Sec-WebSocket-Accept: ${acceptToken}\r\n\r\n`
  );
}

/**
 * Responder side: derive the accept token for a request head.
 *
 * @throws HandshakeError if `Sec-WebSocket-Key` is absent
 */
export function acceptHandshake(request: string): AcceptedHandshake {
  const key = extractHeaderValue(request, 'Sec-WebSocket-Key');
  if (!key) {
    throw new HandshakeError('Sec-WebSocket-Key header not found');
  }
  const acceptToken = computeAcceptToken(key);
  return { key, acceptToken, response: buildHandshakeResponse(acceptToken) };
}

/**
 * Initiator side: the upgrade request for `key`.
 */
export function buildHandshakeRequest(options: HandshakeRequestOptions): string {
  return (
    `GET ${options.path} HTTP/1.1\r\n` +
    `Host: ${options.host}:${options.port}\r\n` +
    'Upgrade: websocket\r\n' +
    'Connection: Upgrade\r\n' +
    `Sec-WebSocket-Key: ${options.key}\r\n` +
    'Sec-WebSocket-Version: 13\r\n\r\n'
  );
}

/**
 * Initiator side: check the responder's reply against our key.
 *
 * @returns the verified accept token
 * @throws HandshakeError on a non-101 status or an accept token mismatch
 */
export function verifyHandshakeResponse(response: string, key: string): string {
  const statusLine = response.split('\r\n', 1)[0] ?? '';
  if (!statusLine.includes(SWITCHING_PROTOCOLS)) {
    throw new HandshakeError(`unexpected status line ${JSON.stringify(statusLine)}`);
  }

  const expected = computeAcceptToken(key);
  const received = extractHeaderValue(response, 'Sec-WebSocket-Accept');
  if (received !== expected) {
    throw new HandshakeError(`accept token mismatch (expected ${expected}, received ${String(received)})`);
  }
  return expected;
}
