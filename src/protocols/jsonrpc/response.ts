import type { JsonRpcFailure, JsonRpcId, JsonRpcSuccess } from "./types.js";

/**
 * Build a JSON-RPC 2.0 error response.
 * @param id - Request id (or null when it could not be read).
 * @param code - JSON-RPC error code (e.g. -32700, -32601, -32603).
 */
export function jsonRpcError(id: JsonRpcId | null, code: number, message: string): JsonRpcFailure {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

export function jsonRpcResult(id: JsonRpcId, result: unknown): JsonRpcSuccess {
  return { jsonrpc: "2.0", id, result };
}
