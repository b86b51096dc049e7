import type { JsonRpcId } from "../protocols/jsonrpc/types.js";

/**
 * Backend correlation id derived from the client request id, e.g. `stdio-tc-7`.
 * Only used for tracing on the backend side; not required to be unique.
 */
export function correlationId(prefix: string, id: JsonRpcId): string {
  return `stdio-${prefix}-${String(id)}`;
}
