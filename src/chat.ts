/**
 * Chat envelope carried inside a TEXT frame:
 * `[u32 BE usernameLength][username][message]`.
 */

import { MalformedPayloadError } from './errors.ts';

const LENGTH_PREFIX = 4;

export interface ChatPayload {
  username: string;
  message: string;
}

export function encodeChatPayload(payload: ChatPayload): Buffer {
  const username = Buffer.from(payload.username, 'utf8');
  const message = Buffer.from(payload.message, 'utf8');
  const out = Buffer.alloc(LENGTH_PREFIX + username.length + message.length);
  out.writeUInt32BE(username.length, 0);
  username.copy(out, LENGTH_PREFIX);
  message.copy(out, LENGTH_PREFIX + username.length);
  return out;
}

/**
 * @throws MalformedPayloadError when the length prefix is missing or points
 * past the end of the payload
 */
export function decodeChatPayload(payload: Uint8Array): ChatPayload {
  if (payload.length < LENGTH_PREFIX) {
    throw new MalformedPayloadError(`Chat payload of ${payload.length} bytes has no length prefix`);
  }
  const bytes = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
  const usernameLength = bytes.readUInt32BE(0);
  if (usernameLength > bytes.length - LENGTH_PREFIX) {
    throw new MalformedPayloadError(
      `Username length ${usernameLength} exceeds the ${bytes.length - LENGTH_PREFIX} bytes available`
    );
  }
  const end = LENGTH_PREFIX + usernameLength;
  return {
    username: bytes.toString('utf8', LENGTH_PREFIX, end),
    message: bytes.toString('utf8', end),
  };
}

/**
 * The line relayed to other peers.
 */
export function formatChatLine(payload: ChatPayload): string {
  return `[${payload.username}] ${payload.message}`;
}
