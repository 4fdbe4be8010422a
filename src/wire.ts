/**
 * WebSocket framing (RFC 6455 section 5), single-fragment subset.
 *
 * ```
 * byte 0: FIN(1) RSV(3) OPCODE(4)
 * byte 1: MASK(1) LEN7(7)
 * LEN7 = 126 -> 2-byte big-endian length follows
 * LEN7 = 127 -> 8-byte length (unsupported)
 * MASK = 1   -> 4-byte mask key follows the length
 * payload
 * ```
 */

import { FrameTooLargeError } from './errors.ts';

export const Opcode = {
  CONTINUATION: 0x0,
  TEXT: 0x1,
  BINARY: 0x2,
  CLOSE: 0x8,
  PING: 0x9,
  PONG: 0xa,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

export type FrameType = 'continuation' | 'text' | 'binary' | 'close' | 'ping' | 'pong' | 'unknown';

/** Largest payload expressible without the 64-bit length form. */
export const MAX_PAYLOAD_LENGTH = 0xffff;

const FIN_BIT = 0x80;
const MASK_BIT = 0x80;
const LEN16_MARKER = 126;
const LEN64_MARKER = 127;

const FRAME_TYPES: Record<number, FrameType> = {
  [Opcode.CONTINUATION]: 'continuation',
  [Opcode.TEXT]: 'text',
  [Opcode.BINARY]: 'binary',
  [Opcode.CLOSE]: 'close',
  [Opcode.PING]: 'ping',
  [Opcode.PONG]: 'pong',
};

export interface Frame {
  fin: boolean;
  /** Raw 4-bit opcode as it appeared on the wire. */
  opcode: number;
  type: FrameType;
  masked: boolean;
  payload: Buffer;
}

export type ParseFailure = 'incomplete' | 'unsupported-length';

export type ParseResult =
  | { ok: true; frame: Frame; bytesConsumed: number }
  | { ok: false; reason: ParseFailure };

export interface BuildFrameOptions {
  /** 4-byte key; when given the frame is masked (client-to-server direction). */
  maskKey?: Uint8Array;
}

export function frameType(opcode: number): FrameType {
  return FRAME_TYPES[opcode] ?? 'unknown';
}

/**
 * Build a single final frame.
 *
 * @throws FrameTooLargeError if the payload exceeds 65535 bytes
 */
export function buildFrame(
  payload: Uint8Array | string,
  opcode: Opcode = Opcode.TEXT,
  options: BuildFrameOptions = {}
): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  const length = body.length;
  if (length > MAX_PAYLOAD_LENGTH) {
    throw new FrameTooLargeError(length);
  }

  const maskKey = options.maskKey;
  if (maskKey && maskKey.length !== 4) {
    throw new RangeError(`Mask key must be 4 bytes, got ${maskKey.length}`);
  }

  const lengthBytes = length < LEN16_MARKER ? 0 : 2;
  const headerLength = 2 + lengthBytes + (maskKey ? 4 : 0);
  const frame = Buffer.alloc(headerLength + length);

  frame[0] = FIN_BIT | opcode;
  if (lengthBytes === 0) {
    frame[1] = length;
  } else {
    frame[1] = LEN16_MARKER;
    frame.writeUInt16BE(length, 2);
  }

  if (maskKey) {
    frame[1] = (frame[1] ?? 0) | MASK_BIT;
    frame.set(maskKey, 2 + lengthBytes);
    for (let i = 0; i < length; i++) {
      frame[headerLength + i] = (body[i] ?? 0) ^ (maskKey[i % 4] ?? 0);
    }
  } else {
    frame.set(body, headerLength);
  }

  return frame;
}

/**
 * Parse one frame from the start of `buffer`.
 *
 * Never reads past `buffer.length`: every field is bounds-checked before it is
 * touched, and a short buffer yields `{ ok: false, reason: 'incomplete' }`.
 */
export function parseFrame(buffer: Uint8Array): ParseResult {
  if (buffer.length < 2) return { ok: false, reason: 'incomplete' };

  const byte0 = buffer[0] ?? 0;
  const byte1 = buffer[1] ?? 0;
  const masked = (byte1 & MASK_BIT) !== 0;
  let length = byte1 & 0x7f;
  let pos = 2;

  if (length === LEN64_MARKER) {
    return { ok: false, reason: 'unsupported-length' };
  }
  if (length === LEN16_MARKER) {
    if (buffer.length < pos + 2) return { ok: false, reason: 'incomplete' };
    length = ((buffer[2] ?? 0) << 8) | (buffer[3] ?? 0);
    pos += 2;
  }

  let maskKey: Uint8Array | null = null;
  if (masked) {
    if (buffer.length < pos + 4) return { ok: false, reason: 'incomplete' };
    maskKey = buffer.subarray(pos, pos + 4);
    pos += 4;
  }

  if (buffer.length < pos + length) return { ok: false, reason: 'incomplete' };

  const payload = Buffer.alloc(length);
  if (maskKey) {
    for (let i = 0; i < length; i++) {
      payload[i] = (buffer[pos + i] ?? 0) ^ (maskKey[i % 4] ?? 0);
    }
  } else {
    payload.set(buffer.subarray(pos, pos + length));
  }

  const opcode = byte0 & 0x0f;
  return {
    ok: true,
    frame: {
      fin: (byte0 & FIN_BIT) !== 0,
      opcode,
      type: frameType(opcode),
      masked,
      payload,
    },
    bytesConsumed: pos + length,
  };
}

/**
 * Reassembles frames that arrive split across (or packed into) reads.
 */
export class FrameReader {
  private _pending: Buffer = Buffer.alloc(0);
  private _dropped = 0;

  /** Bytes waiting for the rest of their frame. */
  get buffered(): number {
    return this._pending.length;
  }

  /** Number of times buffered input was discarded as unsupported. */
  get dropped(): number {
    return this._dropped;
  }

  /**
   * Append a chunk and return every frame that is now complete.
   */
  push(chunk: Uint8Array): Frame[] {
    this._pending = this._pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this._pending, chunk]);

    const frames: Frame[] = [];
    while (this._pending.length > 0) {
      const result = parseFrame(this._pending);
      if (!result.ok) {
        if (result.reason === 'unsupported-length') {
          this._pending = Buffer.alloc(0);
          this._dropped++;
        }
        break;
      }
      frames.push(result.frame);
      this._pending = this._pending.subarray(result.bytesConsumed);
    }
    return frames;
  }
}
