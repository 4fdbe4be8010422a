/**
 * Base64 (RFC 4648, standard alphabet, `=` padding).
 */

import { EncodingError } from './errors.ts';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/';

const LOOKUP = new Map<string, number>([...ALPHABET].map((ch, i) => [ch, i]));

function charAt(index: number): string {
  return ALPHABET.charAt(index & 0x3f);
}

export function encodeBase64(input: Uint8Array): string {
  let out = '';
  let i = 0;

  for (; i + 3 <= input.length; i += 3) {
    const n = ((input[i] ?? 0) << 16) | ((input[i + 1] ?? 0) << 8) | (input[i + 2] ?? 0);
    out += charAt(n >> 18) + charAt(n >> 12) + charAt(n >> 6) + charAt(n);
  }

  const rest = input.length - i;
  if (rest === 1) {
    const n = (input[i] ?? 0) << 16;
    out += charAt(n >> 18) + charAt(n >> 12) + '==';
  } else if (rest === 2) {
    const n = ((input[i] ?? 0) << 16) | ((input[i + 1] ?? 0) << 8);
    out += charAt(n >> 18) + charAt(n >> 12) + charAt(n >> 6) + '=';
  }

  return out;
}

/**
 * Decode padded Base64 text.
 *
 * @throws EncodingError on bad length, foreign characters or misplaced padding
 */
export function decodeBase64(text: string): Buffer {
  if (text.length % 4 !== 0) {
    throw new EncodingError(`Base64 length ${text.length} is not a multiple of 4`);
  }

  let padding = 0;
  if (text.endsWith('==')) padding = 2;
  else if (text.endsWith('=')) padding = 1;

  const out = Buffer.alloc((text.length / 4) * 3 - padding);
  let written = 0;

  for (let i = 0; i < text.length; i += 4) {
    const last = i + 4 === text.length;
    let n = 0;
    for (let j = 0; j < 4; j++) {
      const ch = text.charAt(i + j);
      if (ch === '=' && last && j >= 4 - padding) {
        n <<= 6;
        continue;
      }
      const value = LOOKUP.get(ch);
      if (value === undefined) {
        throw new EncodingError(`Invalid Base64 character ${JSON.stringify(ch)} at offset ${i + j}`);
      }
      n = (n << 6) | value;
    }

    const bytes = [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
    for (const byte of bytes) {
      if (written >= out.length) break;
      out[written++] = byte;
    }
  }

  return out;
}
