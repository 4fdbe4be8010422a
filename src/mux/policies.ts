/**
 * Built-in broadcast policies.
 *
 * The multiplexer runs one loop for every server variant; the policy decides
 * what an inbound data frame turns into.
 */

import createDebug from 'debug';
import { decodeChatPayload, formatChatLine } from '../chat.ts';
import { getErrorCode } from '../errors.ts';
import { Opcode } from '../wire.ts';
import type { BroadcastPolicy, PolicyName } from '../types.ts';

const debug = createDebug('handwire:policy');

/**
 * Receive only. Messages reach the `onMessage` hook and nothing is sent.
 */
export function logPolicy(): BroadcastPolicy {
  return {
    name: 'log',
    onMessage: (_ctx, from, frame) => {
      debug('[peer %d] %s', from.id, frame.payload.toString('utf8'));
    },
  };
}

/**
 * Send each message back to its sender with the same opcode.
 */
export function echoPolicy(): BroadcastPolicy {
  return {
    name: 'echo',
    onMessage: (ctx, from, frame) => {
      const opcode = frame.type === 'binary' ? Opcode.BINARY : Opcode.TEXT;
      ctx.send(from, frame.payload, opcode);
    },
  };
}

/**
 * Decode a chat envelope from a TEXT frame and relay `[username] message` to
 * every other peer. Binary frames and malformed envelopes are logged and
 * dropped; the sender stays connected.
 */
export function chatPolicy(): BroadcastPolicy {
  return {
    name: 'chat',
    onMessage: (ctx, from, frame) => {
      if (frame.type !== 'text') {
        debug('dropping %s frame from peer %d', frame.type, from.id);
        return;
      }
      let line: string;
      try {
        line = formatChatLine(decodeChatPayload(frame.payload));
      } catch (err) {
        if (getErrorCode(err) !== 'MALFORMED_PAYLOAD') throw err;
        debug('dropping message from peer %d: %s', from.id, err instanceof Error ? err.message : String(err));
        return;
      }
      const delivered = ctx.broadcast(line, { except: from });
      debug('relayed %j from peer %d to %d peers', line, from.id, delivered);
    },
  };
}

export function policyByName(name: PolicyName): BroadcastPolicy {
  switch (name) {
    case 'log':
      return logPolicy();
    case 'echo':
      return echoPolicy();
    case 'chat':
      return chatPolicy();
  }
}
