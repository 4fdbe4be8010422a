/**
 * WebSocketClient tests against an in-memory server.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { WebSocketClient } from '../src/Client.ts';
import { WebSocketServer } from '../src/Server.ts';
import { Opcode } from '../src/wire.ts';
import type { Frame } from '../src/wire.ts';
import {
  MemoryClientTransport,
  MemoryServerTransport,
  SAMPLE_KEY,
  SAMPLE_RESPONSE,
  ScriptedClientTransport,
} from './helpers.ts';

const PORT = 9100;

describe('WebSocketClient', () => {
  let transport: MemoryServerTransport;
  let server: WebSocketServer;

  function createClient(options: { mask?: boolean; key?: string } = {}): WebSocketClient {
    return new WebSocketClient({ port: PORT, clientTransport: new MemoryClientTransport(transport), ...options });
  }

  function collect(client: WebSocketClient): string[] {
    const received: string[] = [];
    client.on('message', (frame: Frame) => received.push(frame.payload.toString('utf8')));
    return received;
  }

  beforeEach(async () => {
    transport = new MemoryServerTransport();
    server = new WebSocketServer({ port: PORT, policy: 'chat', serverTransport: transport });
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  it('should complete the handshake', async () => {
    const client = createClient({ key: SAMPLE_KEY });
    await client.connect();

    assert.strictEqual(client.state, 'open');
    assert.strictEqual(client.key, SAMPLE_KEY);
    assert.strictEqual(transport.connections[0]?.written[0]?.toString('latin1'), SAMPLE_RESPONSE);
    await server.settled();
    assert.strictEqual(server.clientCount, 1);
    client.close();
  });

  it('should relay chat messages between two clients', async () => {
    const alice = createClient();
    const bob = createClient();
    await alice.connect();
    await bob.connect();
    const aliceInbox = collect(alice);
    const bobInbox = collect(bob);

    alice.sendChat({ username: 'alice', message: 'hi' });
    await server.settled();
    bob.sendChat({ username: 'bob', message: 'hello alice' });
    await server.settled();

    assert.deepStrictEqual(bobInbox, ['[alice] hi']);
    assert.deepStrictEqual(aliceInbox, ['[bob] hello alice']);
    alice.close();
    bob.close();
  });

  it('should mask frames by default', async () => {
    const client = createClient();
    await client.connect();
    client.sendText('masked');

    const frames = transport.connections[0]?.sentFrames() ?? [];
    assert.strictEqual(frames.length, 1);
    assert.strictEqual(frames[0]?.masked, true);
    assert.strictEqual(frames[0]?.payload.toString(), 'masked');
    client.close();
  });

  it('should send unmasked frames when masking is off', async () => {
    const client = createClient({ mask: false });
    await client.connect();
    client.sendBinary(Uint8Array.of(9, 8, 7));

    const frames = transport.connections[0]?.sentFrames() ?? [];
    assert.strictEqual(frames[0]?.masked, false);
    assert.strictEqual(frames[0]?.type, 'binary');
    assert.deepStrictEqual(frames[0]?.payload, Buffer.from([9, 8, 7]));
    client.close();
  });

  it('should answer a server ping with a pong', async () => {
    const client = createClient();
    await client.connect();
    await server.settled();
    server.broadcast('beat', Opcode.PING);

    const frames = transport.connections[0]?.sentFrames() ?? [];
    assert.strictEqual(frames[0]?.type, 'pong');
    assert.strictEqual(frames[0]?.payload.toString(), 'beat');
    client.close();
  });

  it('should get a pong for its ping', async () => {
    const client = createClient();
    const received = collect(client);
    await client.connect();
    client.ping('anyone?');
    await server.settled();

    const sent = transport.connections[0]?.sentFrames() ?? [];
    assert.strictEqual(sent[0]?.type, 'ping');
    assert.strictEqual(sent[0]?.masked, true);
    const frames = transport.connections[0]?.frames() ?? [];
    assert.strictEqual(frames[0]?.type, 'pong');
    assert.strictEqual(frames[0]?.payload.toString(), 'anyone?');
    assert.deepStrictEqual(received, []);
    client.close();
  });

  it('should close when the server quits', async () => {
    const client = createClient();
    await client.connect();
    await server.settled();

    const closes: (Error | undefined)[] = [];
    client.on('close', (err?: Error) => closes.push(err));
    await server.quit();

    assert.strictEqual(client.state, 'closed');
    assert.deepStrictEqual(closes, [undefined]);
  });

  it('should send a CLOSE frame on close and leave the server', async () => {
    const client = createClient();
    await client.connect();
    await server.settled();
    client.close();

    const frames = transport.connections[0]?.sentFrames() ?? [];
    assert.strictEqual(frames.at(-1)?.type, 'close');
    assert.strictEqual(client.state, 'closed');
    await server.settled();
    assert.strictEqual(server.clientCount, 0);
  });

  it('should refuse to send before connecting', () => {
    const client = createClient();
    assert.throws(() => client.sendText('too soon'), {
      code: 'CONNECTION_FAILED',
      message: 'Cannot send, connection is idle',
    });
  });

  it('should refuse a second connect', async () => {
    const client = createClient();
    await client.connect();
    await assert.rejects(client.connect(), { code: 'CONNECTION_FAILED' });
    client.close();
  });

  it('should fail to connect when nothing listens on the port', async () => {
    const client = new WebSocketClient({ port: PORT + 1, clientTransport: new MemoryClientTransport(transport) });
    await assert.rejects(client.connect(), { code: 'CONNECTION_FAILED' });
    assert.strictEqual(client.state, 'closed');
  });
});

describe('WebSocketClient handshake failures', () => {
  it('should reject a non-101 response', async () => {
    const transport = new ScriptedClientTransport(() => 'HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\n\r\n');
    const client = new WebSocketClient({ key: SAMPLE_KEY, clientTransport: transport });

    await assert.rejects(client.connect(), {
      code: 'HANDSHAKE_FAILED',
      message: 'Handshake failed: unexpected status line "HTTP/1.1 404 Not Found"',
    });
    assert.strictEqual(client.state, 'closed');
    assert.strictEqual(transport.connected, false);
  });

  it('should reject an accept token for another key', async () => {
    const transport = new ScriptedClientTransport(() => SAMPLE_RESPONSE);
    const client = new WebSocketClient({ key: 'b3RoZXIga2V5IG5vbmNlIQ==', clientTransport: transport });

    await assert.rejects(client.connect(), /accept token mismatch/);
    assert.strictEqual(client.state, 'closed');
  });

  it('should send the upgrade request for its key and path', async () => {
    const transport = new ScriptedClientTransport(() => SAMPLE_RESPONSE);
    const client = new WebSocketClient({
      host: 'example.test',
      port: 9000,
      path: '/chat',
      key: SAMPLE_KEY,
      clientTransport: transport,
    });
    await client.connect();

    assert.strictEqual(
      transport.writes[0]?.toString('latin1'),
      'GET /chat HTTP/1.1\r\n' +
        'Host: example.test:9000\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Key: ${SAMPLE_KEY}\r\n` +
        'Sec-WebSocket-Version: 13\r\n\r\n'
    );
    client.close();
  });

  it('should deliver a frame that arrives with the response', async () => {
    const transport = new ScriptedClientTransport(
      () => SAMPLE_RESPONSE + Buffer.from([0x81, 0x03, 0x79, 0x6f, 0x21]).toString('latin1')
    );
    const client = new WebSocketClient({ key: SAMPLE_KEY, clientTransport: transport });
    const received: string[] = [];
    client.on('message', (frame: Frame) => received.push(frame.payload.toString()));

    await client.connect();
    assert.deepStrictEqual(received, ['yo!']);
    client.close();
  });

  it('should fail when the connection closes before a response', async () => {
    const transport = new ScriptedClientTransport(() => null);
    const client = new WebSocketClient({ clientTransport: transport });

    await assert.rejects(client.connect(), {
      code: 'HANDSHAKE_FAILED',
      message: 'Handshake failed: connection closed before a response',
    });
    assert.strictEqual(client.state, 'closed');
  });
});
