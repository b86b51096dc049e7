import { type } from "arktype";
import type { NativeObject } from "../../translator/value.js";

export const ToolCallParamsSchema = type({
  "name?": "string",
  "arguments?": type("Record<string, unknown>").or("null"),
  "_meta?": "Record<string, unknown>",
});

export const PromptGetParamsSchema = type({
  "name?": "string",
  "arguments?": type("Record<string, string>").or("null"),
  "_meta?": "Record<string, unknown>",
});

export type ToolCallParams = typeof ToolCallParamsSchema.infer;
export type PromptGetParams = typeof PromptGetParamsSchema.infer;

export interface McpServerCapabilities {
  tools?: Record<string, never>;
  prompts?: Record<string, never>;
}

export interface McpInitializeResult {
  protocolVersion: string;
  capabilities: McpServerCapabilities;
  serverInfo: { name: string; version: string };
}

export interface McpContent {
  type: string;
  text: string;
}

export interface McpToolDefinition {
  name: string;
  description: string;
  inputSchema?: NativeObject;
}

/** Tool-level outcome. A failed tool is still a successful JSON-RPC result with `isError: true`. */
export interface McpToolResult {
  content: [McpContent];
  isError: boolean;
}

export interface McpPromptArgument {
  name: string;
  description: string;
  required: boolean;
}

export interface McpPromptDefinition {
  name: string;
  description: string;
  arguments: McpPromptArgument[];
}

export interface McpPromptMessage {
  role: string;
  content: McpContent;
}

export interface McpPromptResult {
  description: string;
  messages: McpPromptMessage[];
}
