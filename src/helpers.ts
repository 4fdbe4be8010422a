/**
 * Utility functions.
 */

/**
 * Parse host and port from an address string.
 * Accepts formats: "host:port", "0.0.0.0:3000", "localhost:3000"
 */
export function parseHostPort(address: string): { host: string; port: number } {
  const parts = address.split(':');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`Invalid address format: ${address}. Expected "host:port"`);
  }
  const host = parts[0];
  const port = Number(parts[1]);
  if (!Number.isInteger(port)) {
    throw new Error(`Invalid port in address: ${address}`);
  }
  return { host, port };
}
