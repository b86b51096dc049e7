import type { Struct } from "../../protocols/backend/types.js";
import { ToolCallParamsSchema, type McpToolDefinition, type McpToolResult } from "../../protocols/mcp/types.js";
import { assertParams } from "../../protocols/assert.js";
import { CALLER_ID } from "../../shared/constants.js";
import { BridgeRpcError } from "../../shared/errors.js";
import { correlationId } from "../../shared/ids.js";
import { toolDefinitionToMcp, toolResponseToMcp } from "../../translator/mcp.js";
import { ConversionError, nativeToStruct } from "../../translator/value.js";
import { callBackend } from "./backend.js";
import type { MethodHandler } from "./types.js";

export const listTools: MethodHandler = async (id, _params, ctx): Promise<{ tools: McpToolDefinition[] }> => {
  const reply = await callBackend(
    ctx,
    "list_tools",
    { requestId: correlationId("lt", id), request: { case: "listTools", value: {} } },
    "listTools"
  );
  return { tools: reply.tools.map(toolDefinitionToMcp) };
};

function toStructArguments(args: Record<string, unknown>): Struct {
  try {
    return nativeToStruct(args, "arguments");
  } catch (err) {
    if (err instanceof ConversionError) {
      throw BridgeRpcError.invalidParams(`invalid arguments: ${err.message}`);
    }
    throw err;
  }
}

export const callTool: MethodHandler = async (id, params, ctx): Promise<McpToolResult> => {
  const valid = assertParams(ToolCallParamsSchema, params);
  if (!valid.name) {
    throw BridgeRpcError.invalidParams("missing required parameter: name");
  }
  // Converted before the backend is contacted so bad input never leaves the bridge.
  const args = valid.arguments ? toStructArguments(valid.arguments) : undefined;

  const reply = await callBackend(
    ctx,
    "tool_call",
    {
      requestId: correlationId("tc", id),
      request: {
        case: "toolCall",
        value: { toolName: valid.name, arguments: args, callerPlugin: CALLER_ID },
      },
    },
    "toolCall"
  );
  return toolResponseToMcp(reply);
};
