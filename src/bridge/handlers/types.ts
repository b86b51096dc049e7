import type { Logger } from "pino";
import type { JsonRpcId } from "../../protocols/jsonrpc/types.js";
import type { BridgeBackend } from "../backends/base.js";

/** What the dispatcher hands to every method handler. */
export interface HandlerContext {
  readonly backend: BridgeBackend;
  readonly logger: Logger;
}

/**
 * One JSON-RPC method. Resolves with the `result` payload; throws a
 * BridgeRpcError to answer with a specific error code.
 */
export type MethodHandler = (id: JsonRpcId, params: unknown, ctx: HandlerContext) => unknown;

export type HandlerTable = Readonly<Record<string, MethodHandler>>;
