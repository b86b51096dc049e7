import { initialize, ping } from "./lifecycle.js";
import { getPrompt, listPrompts } from "./prompts.js";
import { callTool, listTools } from "./tools.js";
import type { HandlerTable } from "./types.js";

export type { HandlerContext, HandlerTable, MethodHandler } from "./types.js";

/** Methods answered by the bridge out of the box. */
export const DEFAULT_HANDLERS: HandlerTable = {
  initialize,
  ping,
  "tools/list": listTools,
  "tools/call": callTool,
  "prompts/list": listPrompts,
  "prompts/get": getPrompt,
};
