import { NOTIFICATION_PREFIX } from "../shared/constants.js";
import { BridgeRpcError, errorMessage } from "../shared/errors.js";
import { jsonRpcError, jsonRpcResult } from "../protocols/jsonrpc/response.js";
import { JSON_RPC_ERROR, type JsonRpcRequest, type JsonRpcResponse } from "../protocols/jsonrpc/types.js";
import { DEFAULT_HANDLERS, type HandlerContext, type HandlerTable, type MethodHandler } from "./handlers/index.js";

export type Route =
  | { kind: "handler"; handler: MethodHandler }
  | { kind: "notification" }
  | { kind: "unknown" };

/**
 * Method table built once at startup. Exact matches win over the
 * `notifications/` prefix; everything else is unknown.
 */
export class Dispatcher {
  private readonly table: ReadonlyMap<string, MethodHandler>;

  constructor(
    private readonly ctx: HandlerContext,
    extraHandlers: HandlerTable = {}
  ) {
    this.table = new Map([...Object.entries(DEFAULT_HANDLERS), ...Object.entries(extraHandlers)]);
  }

  route(method: string): Route {
    const handler = this.table.get(method);
    if (handler) return { kind: "handler", handler };
    if (method.startsWith(NOTIFICATION_PREFIX)) return { kind: "notification" };
    return { kind: "unknown" };
  }

  /** Returns undefined when nothing should be written back. Never throws. */
  async dispatch(request: JsonRpcRequest): Promise<JsonRpcResponse | undefined> {
    const { id, method } = request;
    const route = this.route(method);

    if (route.kind === "notification" || id === undefined) {
      this.ctx.logger.debug(`notification: ${method}`);
      return undefined;
    }

    if (route.kind === "unknown") {
      return jsonRpcError(id, JSON_RPC_ERROR.METHOD_NOT_FOUND, `method not found: ${method}`);
    }

    try {
      const result: unknown = await route.handler(id, request.params, this.ctx);
      // `result` must be present on the wire, so an empty handler answers null.
      return jsonRpcResult(id, result === undefined ? null : result);
    } catch (err) {
      if (err instanceof BridgeRpcError) {
        this.ctx.logger.debug({ id, method, code: err.code }, err.message);
        return jsonRpcError(id, err.code, err.message);
      }
      this.ctx.logger.error({ id, method, err }, "Handler failed");
      return jsonRpcError(id, JSON_RPC_ERROR.INTERNAL_ERROR, `internal error: ${errorMessage(err)}`);
    }
  }
}
