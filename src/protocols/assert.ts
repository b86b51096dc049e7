import { type, type ArkErrors } from "arktype";
import { BridgeRpcError } from "../shared/errors.js";

/**
 * Validates request params against a schema. Absent or null params are checked
 * as an empty object. Throws an InvalidParams BridgeRpcError on mismatch.
 */
export function assertParams<T>(
  schema: (value: unknown) => T,
  params: unknown,
  context = "params"
): Exclude<T, ArkErrors> {
  const out = schema(params ?? {});
  if (out instanceof type.errors) {
    throw BridgeRpcError.invalidParams(`invalid ${context}: ${out.summary}`);
  }
  return out as Exclude<T, ArkErrors>;
}
