import { PromptGetParamsSchema, type McpPromptDefinition, type McpPromptResult } from "../../protocols/mcp/types.js";
import { assertParams } from "../../protocols/assert.js";
import { BridgeRpcError } from "../../shared/errors.js";
import { correlationId } from "../../shared/ids.js";
import { promptDefinitionToMcp, promptGetResponseToMcp } from "../../translator/mcp.js";
import { callBackend } from "./backend.js";
import type { MethodHandler } from "./types.js";

export const listPrompts: MethodHandler = async (id, _params, ctx): Promise<{ prompts: McpPromptDefinition[] }> => {
  const reply = await callBackend(
    ctx,
    "list_prompts",
    { requestId: correlationId("lp", id), request: { case: "listPrompts", value: {} } },
    "listPrompts"
  );
  return { prompts: reply.prompts.map(promptDefinitionToMcp) };
};

export const getPrompt: MethodHandler = async (id, params, ctx): Promise<McpPromptResult> => {
  const valid = assertParams(PromptGetParamsSchema, params);
  if (!valid.name) {
    throw BridgeRpcError.invalidParams("missing required parameter: name");
  }
  const reply = await callBackend(
    ctx,
    "prompt_get",
    {
      requestId: correlationId("pg", id),
      request: { case: "promptGet", value: { promptName: valid.name, arguments: valid.arguments ?? {} } },
    },
    "promptGet"
  );
  return promptGetResponseToMcp(reply);
};
