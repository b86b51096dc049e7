import type {
  BackendRequest,
  BackendResponse,
  BackendResponseCase,
  BackendResponseValue,
} from "../../protocols/backend/types.js";
import { responseValue } from "../../protocols/backend/types.js";
import { BridgeRpcError, errorMessage } from "../../shared/errors.js";
import type { HandlerContext } from "./types.js";

/**
 * Single round trip to the backend. Transport failures and replies of the
 * wrong case both surface as InternalError.
 */
export async function callBackend<C extends BackendResponseCase>(
  ctx: HandlerContext,
  operation: string,
  request: BackendRequest,
  expected: C
): Promise<BackendResponseValue<C>> {
  let response: BackendResponse;
  try {
    response = await ctx.backend.send(request);
  } catch (err) {
    ctx.logger.warn({ requestId: request.requestId, err }, `backend ${operation} failed`);
    throw BridgeRpcError.internal(`backend ${operation} failed: ${errorMessage(err)}`);
  }
  const value = responseValue(response, expected);
  if (value === undefined) {
    ctx.logger.warn(
      { requestId: request.requestId, got: response.response?.case ?? "none", expected },
      "unexpected backend reply"
    );
    throw BridgeRpcError.internal("unexpected response type from backend");
  }
  return value;
}
