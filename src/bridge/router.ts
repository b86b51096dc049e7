import { parseHostPort } from "../shared/net.js";

/** Route to backend based on specifier. */
export type BackendSpec =
  | { type: "exec"; command: string; args: string[] }
  | { type: "tcp"; host: string; port: number };

/**
 * `exec:<command> [args...]` spawns a child process (arguments split on whitespace);
 * `tcp:<host:port>` connects to a socket.
 */
export function parseBackendSpec(spec: string): BackendSpec | null {
  const s = spec.trim();
  if (s.startsWith("exec:")) {
    const [command, ...args] = s.slice(5).trim().split(/\s+/).filter(Boolean);
    return command ? { type: "exec", command, args } : null;
  }
  if (s.startsWith("tcp:")) {
    const address = parseHostPort(s.slice(4));
    return address ? { type: "tcp", ...address } : null;
  }
  return null;
}
