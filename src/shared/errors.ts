import { getLogger } from "./logging.js";
import { JSON_RPC_ERROR, type JsonRpcErrorCode } from "../protocols/jsonrpc/types.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  BACKEND_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

/**
 * Thrown inside a method handler to produce a JSON-RPC error envelope with a
 * specific code. The dispatcher turns it into a response; it never reaches the loop.
 */
export class BridgeRpcError extends Error {
  constructor(
    readonly code: JsonRpcErrorCode,
    message: string
  ) {
    super(message);
    this.name = "BridgeRpcError";
  }

  static invalidParams(message: string): BridgeRpcError {
    return new BridgeRpcError(JSON_RPC_ERROR.INVALID_PARAMS, message);
  }

  static internal(message: string): BridgeRpcError {
    return new BridgeRpcError(JSON_RPC_ERROR.INTERNAL_ERROR, message);
  }
}

/** Thrown when the backend process or socket cannot be reached at startup. */
export class BackendStartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BackendStartError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
