import { PROTOCOL_VERSION, SERVER_NAME, VERSION } from "../../shared/constants.js";
import type { McpInitializeResult } from "../../protocols/mcp/types.js";
import type { MethodHandler } from "./types.js";

/** Handshake. Answered locally; client params are accepted without validation. */
export const initialize: MethodHandler = (): McpInitializeResult => ({
  protocolVersion: PROTOCOL_VERSION,
  capabilities: { tools: {}, prompts: {} },
  serverInfo: { name: SERVER_NAME, version: VERSION },
});

export const ping: MethodHandler = () => ({});
