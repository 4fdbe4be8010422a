/**
 * Streaming SHA-1.
 *
 * Only used to derive the handshake accept token, but it is a complete digest:
 * data may be fed in chunks of any size and `digest()` performs the padding.
 */

const BLOCK_SIZE = 64;

const INITIAL_STATE = [0x67452301, 0xefcdab89, 0x98badcfe, 0x10325476, 0xc3d2e1f0] as const;

const encoder = new TextEncoder();

function rotl(value: number, bits: number): number {
  return (value << bits) | (value >>> (32 - bits));
}

export class Sha1 {
  private _state = Uint32Array.from(INITIAL_STATE);
  private _block = new Uint8Array(BLOCK_SIZE);
  private _blockLength = 0;
  private _totalBytes = 0;
  private _words = new Uint32Array(80);
  private _finalized = false;

  /**
   * Feed more input. Strings are hashed as UTF-8.
   */
  update(data: Uint8Array | string): this {
    if (this._finalized) {
      throw new Error('Sha1: update() called after digest()');
    }
    const bytes = typeof data === 'string' ? encoder.encode(data) : data;
    this._totalBytes += bytes.length;
    this._absorb(bytes);
    return this;
  }

  /**
   * Pad, process the final block(s) and return the 20-byte digest.
   */
  digest(): Buffer {
    if (this._finalized) {
      throw new Error('Sha1: digest() already called');
    }

    const bitLength = this._totalBytes * 8;
    // 0x80 + zeros up to 56 mod 64, then the 64-bit big-endian bit count.
    const padLength = ((BLOCK_SIZE + 56 - ((this._totalBytes + 1) % BLOCK_SIZE)) % BLOCK_SIZE) + 1;
    const tail = new Uint8Array(padLength + 8);
    tail[0] = 0x80;
    const view = new DataView(tail.buffer);
    view.setUint32(padLength, Math.floor(bitLength / 0x100000000));
    view.setUint32(padLength + 4, bitLength >>> 0);
    this._absorb(tail);
    this._finalized = true;

    const out = Buffer.alloc(20);
    for (let i = 0; i < 5; i++) {
      out.writeUInt32BE(this._state[i] ?? 0, i * 4);
    }
    return out;
  }

  private _absorb(bytes: Uint8Array): void {
    let offset = 0;

    if (this._blockLength > 0) {
      const take = Math.min(BLOCK_SIZE - this._blockLength, bytes.length);
      this._block.set(bytes.subarray(0, take), this._blockLength);
      this._blockLength += take;
      offset = take;
      if (this._blockLength < BLOCK_SIZE) return;
      this._compress(this._block, 0);
      this._blockLength = 0;
    }

    while (offset + BLOCK_SIZE <= bytes.length) {
      this._compress(bytes, offset);
      offset += BLOCK_SIZE;
    }

    if (offset < bytes.length) {
      this._block.set(bytes.subarray(offset), 0);
      this._blockLength = bytes.length - offset;
    }
  }

  private _compress(block: Uint8Array, offset: number): void {
    const w = this._words;
    for (let i = 0; i < 16; i++) {
      const p = offset + i * 4;
      w[i] =
        ((block[p] ?? 0) << 24) |
        ((block[p + 1] ?? 0) << 16) |
        ((block[p + 2] ?? 0) << 8) |
        (block[p + 3] ?? 0);
    }
    for (let i = 16; i < 80; i++) {
      w[i] = rotl((w[i - 3] ?? 0) ^ (w[i - 8] ?? 0) ^ (w[i - 14] ?? 0) ^ (w[i - 16] ?? 0), 1);
    }

    const s = this._state;
    let a = s[0] ?? 0;
    let b = s[1] ?? 0;
    let c = s[2] ?? 0;
    let d = s[3] ?? 0;
    let e = s[4] ?? 0;

    for (let i = 0; i < 80; i++) {
      let f: number;
      let k: number;
      if (i < 20) {
        f = (b & c) | (~b & d);
        k = 0x5a827999;
      } else if (i < 40) {
        f = b ^ c ^ d;
        k = 0x6ed9eba1;
      } else if (i < 60) {
        f = (b & c) | (b & d) | (c & d);
        k = 0x8f1bbcdc;
      } else {
        f = b ^ c ^ d;
        k = 0xca62c1d6;
      }
      const temp = (rotl(a, 5) + f + e + k + (w[i] ?? 0)) | 0;
      e = d;
      d = c;
      c = rotl(b, 30);
      b = a;
      a = temp;
    }

    // Uint32Array stores modulo 2^32.
    s[0] = (s[0] ?? 0) + a;
    s[1] = (s[1] ?? 0) + b;
    s[2] = (s[2] ?? 0) + c;
    s[3] = (s[3] ?? 0) + d;
    s[4] = (s[4] ?? 0) + e;
  }
}

/**
 * One-shot SHA-1 of bytes or a UTF-8 string.
 */
export function sha1(data: Uint8Array | string): Buffer {
  return new Sha1().update(data).digest();
}
