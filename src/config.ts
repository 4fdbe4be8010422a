/**
 * Option defaults and validation for the server and client facades.
 */

import { ValidationError } from './errors.ts';
import { policyByName } from './mux/policies.ts';
import { compileSchema } from './validation.ts';
import type { BroadcastPolicy, ClientOptions, JSONSchema, PolicyName, ServerOptions } from './types.ts';

export const DEFAULT_PORT = 8080;
export const DEFAULT_SERVER_HOST = '0.0.0.0';
export const DEFAULT_CLIENT_HOST = '127.0.0.1';
export const DEFAULT_MAX_HANDSHAKE_BYTES = 8192;

export const POLICY_NAMES: readonly PolicyName[] = ['log', 'echo', 'chat'];

export interface ServerConfig {
  host: string;
  port: number;
  maxHandshakeBytes: number;
  policy: BroadcastPolicy;
}

export interface ClientConfig {
  host: string;
  port: number;
  path: string;
  mask: boolean;
  key: string | null;
}

interface ServerScalars {
  host: string;
  port: number;
  maxHandshakeBytes: number;
  policy?: PolicyName;
}

const serverSchema: JSONSchema = {
  type: 'object',
  required: ['host', 'port', 'maxHandshakeBytes'],
  properties: {
    host: { type: 'string', minLength: 1 },
    port: { type: 'integer', minimum: 0, maximum: 65535 },
    maxHandshakeBytes: { type: 'integer', minimum: 64 },
    policy: { type: 'string', enum: [...POLICY_NAMES] },
  },
};

const clientSchema: JSONSchema = {
  type: 'object',
  required: ['host', 'port', 'path', 'mask'],
  properties: {
    host: { type: 'string', minLength: 1 },
    port: { type: 'integer', minimum: 1, maximum: 65535 },
    path: { type: 'string', pattern: '^/' },
    mask: { type: 'boolean' },
    key: { type: 'string', minLength: 1 },
  },
};

const serverValidator = compileSchema<ServerScalars>(serverSchema);
const clientValidator = compileSchema<Omit<ClientConfig, 'key'> & { key?: string }>(clientSchema);

function isPolicy(value: unknown): value is BroadcastPolicy {
  return (
    typeof value === 'object' &&
    value !== null &&
    'onMessage' in value &&
    typeof value.onMessage === 'function' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

/**
 * Apply defaults to server options and validate them.
 *
 * @throws ValidationError naming the offending option
 */
export function resolveServerConfig(options: ServerOptions = {}): ServerConfig {
  const policy = options.policy ?? 'chat';
  const scalars = serverValidator.validate({
    host: options.host ?? DEFAULT_SERVER_HOST,
    port: options.port ?? DEFAULT_PORT,
    maxHandshakeBytes: options.maxHandshakeBytes ?? DEFAULT_MAX_HANDSHAKE_BYTES,
    ...(typeof policy === 'string' ? { policy } : {}),
  });

  let resolved: BroadcastPolicy;
  if (scalars.policy) {
    resolved = policyByName(scalars.policy);
  } else if (isPolicy(policy)) {
    resolved = policy;
  } else {
    throw new ValidationError('/policy: must be a policy name or an object with name and onMessage');
  }

  return {
    host: scalars.host,
    port: scalars.port,
    maxHandshakeBytes: scalars.maxHandshakeBytes,
    policy: resolved,
  };
}

/**
 * Apply defaults to client options and validate them.
 *
 * @throws ValidationError naming the offending option
 */
export function resolveClientConfig(options: ClientOptions = {}): ClientConfig {
  const config = clientValidator.validate({
    host: options.host ?? DEFAULT_CLIENT_HOST,
    port: options.port ?? DEFAULT_PORT,
    path: options.path ?? '/',
    mask: options.mask ?? true,
    ...(options.key !== undefined ? { key: options.key } : {}),
  });
  return {
    host: config.host,
    port: config.port,
    path: config.path,
    mask: config.mask,
    key: config.key ?? null,
  };
}
