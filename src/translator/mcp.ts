/**
 * Shapes backend replies into MCP result objects.
 */

import type {
  PromptDefinition,
  PromptGetResponse,
  Struct,
  ToolDefinition,
  ToolResponse,
} from "../protocols/backend/types.js";
import type {
  McpPromptDefinition,
  McpPromptResult,
  McpToolDefinition,
  McpToolResult,
} from "../protocols/mcp/types.js";
import { structToNative } from "./value.js";

export function toolDefinitionToMcp(def: ToolDefinition): McpToolDefinition {
  return {
    name: def.name,
    description: def.description,
    inputSchema: structToNative(def.inputSchema),
  };
}

/**
 * Tools usually return `{ text: "..." }`; that string is used as-is. Any other
 * result is rendered as compact JSON.
 */
function resultText(result: Struct | undefined): string {
  if (result === undefined) return "";
  const text = result.fields["text"];
  if (text !== undefined) {
    return text.kind === "string" ? text.value : "";
  }
  return JSON.stringify(structToNative(result));
}

export function toolResponseToMcp(resp: ToolResponse): McpToolResult {
  if (!resp.success) {
    const message = resp.errorMessage ? resp.errorMessage : `tool error: ${resp.errorCode ?? ""}`;
    return { content: [{ type: "text", text: message }], isError: true };
  }
  return { content: [{ type: "text", text: resultText(resp.result) }], isError: false };
}

export function promptDefinitionToMcp(def: PromptDefinition): McpPromptDefinition {
  return {
    name: def.name,
    description: def.description,
    arguments: def.arguments.map((arg) => ({
      name: arg.name,
      description: arg.description,
      required: arg.required,
    })),
  };
}

export function promptGetResponseToMcp(resp: PromptGetResponse): McpPromptResult {
  return {
    description: resp.description,
    messages: resp.messages.map((msg) => ({
      role: msg.role,
      content: { type: msg.content?.type ?? "text", text: msg.content?.text ?? "" },
    })),
  };
}
