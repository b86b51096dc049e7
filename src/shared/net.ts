const DEFAULT_HOST = "127.0.0.1";

/**
 * Parse a backend address (e.g. "127.0.0.1:9100" or "9100") into host and port.
 * Returns null when the port is missing or out of range.
 */
export function parseHostPort(address: string): { host: string; port: number } | null {
  const value = address.trim();
  if (!value) return null;
  const colon = value.lastIndexOf(":");
  const host = colon === -1 ? DEFAULT_HOST : value.slice(0, colon).trim() || DEFAULT_HOST;
  const portText = colon === -1 ? value : value.slice(colon + 1);
  if (!/^\d+$/.test(portText)) return null;
  const port = parseInt(portText, 10);
  if (port <= 0 || port > 65535) return null;
  return { host, port };
}
