/**
 * JSON-RPC codec for newline-delimited JSON (stdio).
 */

import { type } from "arktype";
import { errorMessage } from "../../shared/errors.js";
import { jsonRpcError } from "./response.js";
import {
  JSON_RPC_ERROR,
  JsonRpcRequestSchema,
  type JsonRpcFailure,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "./types.js";

/**
 * `syntax`: the line is not JSON at all.
 * `shape`: the line is JSON but not a request envelope. `method` is kept when
 * it can still be read, so notification lines stay silent.
 */
export interface ParseFailure {
  kind: "syntax" | "shape";
  method?: string;
  message: string;
}

export type ParsedLine =
  | { ok: true; request: JsonRpcRequest }
  | { ok: false; failure: ParseFailure };

export class SerializationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SerializationError";
  }
}

function recoverMethod(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("method" in data)) return undefined;
  return typeof data.method === "string" ? data.method : undefined;
}

/** Parse one trimmed, non-empty input line. */
export function parseRequestLine(line: string): ParsedLine {
  let data: unknown;
  try {
    data = JSON.parse(line) as unknown;
  } catch (err) {
    return { ok: false, failure: { kind: "syntax", message: `parse error: ${errorMessage(err)}` } };
  }
  const out = JsonRpcRequestSchema(data);
  if (out instanceof type.errors) {
    return {
      ok: false,
      failure: { kind: "shape", method: recoverMethod(data), message: `parse error: ${out.summary}` },
    };
  }
  return { ok: true, request: out };
}

/** Any line that cannot be read as a request is a framing error; its id is unknown. */
export function parseFailureResponse(failure: ParseFailure): JsonRpcFailure {
  return jsonRpcError(null, JSON_RPC_ERROR.PARSE_ERROR, failure.message);
}

/** Serialize a response as exactly one `\n`-terminated line. */
export function serializeResponse(response: JsonRpcResponse): string {
  let body: string;
  try {
    body = JSON.stringify(response);
  } catch (err) {
    throw new SerializationError(`marshal response: ${errorMessage(err)}`);
  }
  return body + "\n";
}
