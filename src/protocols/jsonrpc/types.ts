import { type } from "arktype";

export const JsonRpcIdSchema = type("string | number");
export type JsonRpcId = typeof JsonRpcIdSchema.infer;

/** Inbound envelope. A missing `id` marks a notification. */
export const JsonRpcRequestSchema = type({
  jsonrpc: "'2.0'",
  "id?": JsonRpcIdSchema,
  method: "string",
  "params?": "unknown",
});

export type JsonRpcRequest = typeof JsonRpcRequestSchema.infer;

/** Reserved JSON-RPC 2.0 error codes used by the bridge. */
export const JSON_RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

export type JsonRpcErrorCode = (typeof JSON_RPC_ERROR)[keyof typeof JSON_RPC_ERROR];

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;
