#!/usr/bin/env -S node --import tsx
/**
 * handwire command line.
 *
 *   handwire serve [--policy chat|echo|log] [--host 0.0.0.0] [--port 8080]
 *   handwire chat <username> [--server 127.0.0.1:8080]
 *   handwire monitor <file> [--host 0.0.0.0] [--port 8080]
 *
 * Console lines are sent as messages; `/quit` closes the connection(s) and
 * exits.
 */

import { createInterface } from 'node:readline';
import { pathToFileURL } from 'node:url';
import yargsParser from 'yargs-parser';
import { WebSocketClient } from './Client.ts';
import { FileMonitor } from './FileMonitor.ts';
import { WebSocketServer } from './Server.ts';
import { decodeChatPayload, formatChatLine } from './chat.ts';
import { POLICY_NAMES } from './config.ts';
import { getErrorCode, toError } from './errors.ts';
import { parseHostPort } from './helpers.ts';
import type { Peer, PolicyName } from './types.ts';
import type { Frame } from './wire.ts';

export const QUIT_COMMAND = '/quit';

export type Command =
  | { kind: 'serve'; policy: PolicyName; host?: string; port?: number }
  | { kind: 'chat'; username: string; host: string; port: number }
  | { kind: 'monitor'; file: string; host?: string; port?: number }
  | { kind: 'help' };

export const USAGE = `Usage:
  handwire serve [--policy chat|echo|log] [--host HOST] [--port PORT]
  handwire chat <username> [--server HOST:PORT]
  handwire monitor <file> [--host HOST] [--port PORT]`;

function isPolicyName(value: string): value is PolicyName {
  return POLICY_NAMES.some((name) => name === value);
}

function optionalString(value: unknown, flag: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') throw new Error(`--${flag} needs a value`);
  return value;
}

function optionalPort(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) throw new Error('--port must be an integer');
  return value;
}

/**
 * Turn command-line arguments (without the node and script paths) into a
 * command.
 *
 * @throws Error describing the first bad argument
 */
export function parseCommand(args: string[]): Command {
  const argv = yargsParser(args, {
    string: ['policy', 'host', 'server'],
    number: ['port'],
    boolean: ['help'],
    alias: { help: ['h'] },
  });
  const positional = argv._.map(String);
  const name = positional[0];

  if (argv.help === true || name === undefined || name === 'help') return { kind: 'help' };

  const host = optionalString(argv.host, 'host');
  const port = optionalPort(argv.port);

  switch (name) {
    case 'serve': {
      const policy = optionalString(argv.policy, 'policy') ?? 'chat';
      if (!isPolicyName(policy)) {
        throw new Error(`Unknown policy "${policy}", expected one of ${POLICY_NAMES.join(', ')}`);
      }
      return {
        kind: 'serve',
        policy,
        ...(host !== undefined ? { host } : {}),
        ...(port !== undefined ? { port } : {}),
      };
    }
    case 'chat': {
      const username = positional[1];
      if (!username) throw new Error('chat needs a username');
      const server = parseHostPort(optionalString(argv.server, 'server') ?? '127.0.0.1:8080');
      return { kind: 'chat', username, host: server.host, port: server.port };
    }
    case 'monitor': {
      const file = positional[1];
      if (!file) throw new Error('monitor needs a file');
      return {
        kind: 'monitor',
        file,
        ...(host !== undefined ? { host } : {}),
        ...(port !== undefined ? { port } : {}),
      };
    }
    default:
      throw new Error(`Unknown command "${name}"`);
  }
}

/**
 * Call `onLine` for each console line until `/quit` or end of input, then
 * `onQuit` once. A line that cannot be sent is reported and reading goes on.
 */
export function readConsole(
  input: NodeJS.ReadableStream,
  onLine: (line: string) => void,
  onQuit: () => Promise<void>
): void {
  const rl = createInterface({ input });
  let quitting = false;
  const quit = () => {
    if (quitting) return;
    quitting = true;
    rl.close();
    onQuit().catch((err: unknown) => {
      console.error(`Shutdown failed: ${toError(err).message}`);
      process.exitCode = 1;
    });
  };
  rl.on('line', (line) => {
    if (line.trim() === QUIT_COMMAND) {
      quit();
      return;
    }
    try {
      onLine(line);
    } catch (err) {
      const code = getErrorCode(err);
      console.error(`Cannot send: ${code ? `${code}: ` : ''}${toError(err).message}`);
    }
  });
  rl.on('close', quit);
}

function describeMessage(policy: PolicyName, payload: Buffer): string {
  if (policy !== 'chat') return payload.toString('utf8');
  try {
    return formatChatLine(decodeChatPayload(payload));
  } catch (err) {
    if (getErrorCode(err) !== 'MALFORMED_PAYLOAD') throw err;
    return `(malformed) ${payload.toString('utf8')}`;
  }
}

async function serve(command: Extract<Command, { kind: 'serve' }>): Promise<void> {
  const server = new WebSocketServer({
    policy: command.policy,
    ...(command.host !== undefined ? { host: command.host } : {}),
    ...(command.port !== undefined ? { port: command.port } : {}),
  });
  await server.ready();
  const address = server.address;
  console.log(`Listening on ${address?.host}:${address?.port} (policy ${server.policyName})`);

  server.on('open', (peer: Peer) => console.log(`Peer ${peer.id} connected`));
  server.on('close', (peer: Peer) => console.log(`Peer ${peer.id} disconnected`));
  server.on('message', (peer: Peer, frame: Frame) => {
    console.log(`Peer ${peer.id}: ${describeMessage(command.policy, frame.payload)}`);
  });

  readConsole(
    process.stdin,
    (line) => {
      const delivered = server.broadcastText(line);
      if (delivered === 0) console.log('No peers connected');
    },
    () => server.quit()
  );
}

async function chat(command: Extract<Command, { kind: 'chat' }>): Promise<void> {
  const client = new WebSocketClient({ host: command.host, port: command.port });
  await client.connect();
  console.log(`Connected to ${command.host}:${command.port} as ${command.username}`);

  client.on('message', (frame: Frame) => {
    if (frame.type === 'text') console.log(frame.payload.toString('utf8'));
  });
  client.on('close', (err?: Error) => {
    console.log(err ? `Connection lost: ${err.message}` : 'Connection closed');
    process.stdin.destroy();
  });

  readConsole(
    process.stdin,
    (line) => client.sendChat({ username: command.username, message: line }),
    async () => client.close()
  );
}

async function monitor(command: Extract<Command, { kind: 'monitor' }>): Promise<void> {
  const fileMonitor = new FileMonitor(command.file, {
    ...(command.host !== undefined ? { host: command.host } : {}),
    ...(command.port !== undefined ? { port: command.port } : {}),
  });
  const server = await fileMonitor.start();
  const address = server.address;
  console.log(`Monitoring ${command.file} on http://${address?.host}:${address?.port}/`);
  readConsole(process.stdin, () => undefined, () => fileMonitor.stop());
}

export async function main(args: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(args);
  } catch (err) {
    console.error(toError(err).message);
    console.error(USAGE);
    return 2;
  }

  try {
    switch (command.kind) {
      case 'help':
        console.log(USAGE);
        return 0;
      case 'serve':
        await serve(command);
        return 0;
      case 'chat':
        await chat(command);
        return 0;
      case 'monitor':
        await monitor(command);
        return 0;
    }
  } catch (err) {
    const error = toError(err);
    const code = getErrorCode(err);
    console.error(code ? `${code}: ${error.message}` : error.message);
    return 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      if (code !== 0) process.exit(code);
    },
    (err: unknown) => {
      console.error(toError(err).message);
      process.exit(1);
    }
  );
}
