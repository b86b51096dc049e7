/**
 * Line wire format for backend messages, following the proto3 JSON mapping:
 * the one-of case is a top-level key and struct payloads are plain JSON objects.
 *
 *   {"requestId":"stdio-tc-3","toolCall":{"toolName":"x","arguments":{...},"callerPlugin":"transport.stdio"}}
 *   {"requestId":"stdio-tc-3","toolCall":{"success":true,"result":{"text":"done"}}}
 */

import { type } from "arktype";
import { errorMessage } from "../../shared/errors.js";
import { nativeToStruct, structToNative } from "../../translator/value.js";
import type { BackendRequest, BackendResponse, BackendResponseBody, Struct } from "./types.js";

const JsonObjectOrNull = type("Record<string, unknown>").or("null");

const ToolDefinitionWire = type({
  name: "string",
  "description?": "string",
  "inputSchema?": JsonObjectOrNull,
});

const ToolResponseWire = type({
  "success?": "boolean",
  "result?": JsonObjectOrNull,
  "errorCode?": "string",
  "errorMessage?": "string",
});

const PromptArgumentWire = type({
  name: "string",
  "description?": "string",
  "required?": "boolean",
});

const PromptDefinitionWire = type({
  name: "string",
  "description?": "string",
  "arguments?": PromptArgumentWire.array(),
});

const PromptMessageWire = type({
  "role?": "string",
  "content?": { "type?": "string", "text?": "string" },
});

export const BackendResponseWire = type({
  requestId: "string",
  "listTools?": { "tools?": ToolDefinitionWire.array() },
  "toolCall?": ToolResponseWire,
  "listPrompts?": { "prompts?": PromptDefinitionWire.array() },
  "promptGet?": { "description?": "string", "messages?": PromptMessageWire.array() },
  "error?": { "code?": "string", message: "string" },
});

type BackendResponseWireShape = typeof BackendResponseWire.infer;

/** `requestId` is set when the line named one, so the waiting call can fail fast. */
export class WireDecodeError extends Error {
  constructor(
    message: string,
    readonly requestId?: string
  ) {
    super(message);
    this.name = "WireDecodeError";
  }
}

function optionalStruct(value: Record<string, unknown> | null | undefined, path: string): Struct | undefined {
  return value == null ? undefined : nativeToStruct(value, path);
}

export function encodeRequest(req: BackendRequest): string {
  const body = req.request;
  switch (body.case) {
    case "listTools":
    case "listPrompts":
      return JSON.stringify({ requestId: req.requestId, [body.case]: {} });
    case "toolCall":
      return JSON.stringify({
        requestId: req.requestId,
        toolCall: {
          toolName: body.value.toolName,
          arguments: structToNative(body.value.arguments),
          callerPlugin: body.value.callerPlugin,
        },
      });
    case "promptGet":
      return JSON.stringify({
        requestId: req.requestId,
        promptGet: { promptName: body.value.promptName, arguments: body.value.arguments },
      });
  }
}

function decodeBody(wire: BackendResponseWireShape): BackendResponseBody | undefined {
  if (wire.listTools) {
    return {
      case: "listTools",
      value: {
        tools: (wire.listTools.tools ?? []).map((tool, i) => ({
          name: tool.name,
          description: tool.description ?? "",
          inputSchema: optionalStruct(tool.inputSchema, `listTools.tools[${i}].inputSchema`),
        })),
      },
    };
  }
  if (wire.toolCall) {
    return {
      case: "toolCall",
      value: {
        success: wire.toolCall.success ?? false,
        result: optionalStruct(wire.toolCall.result, "toolCall.result"),
        errorCode: wire.toolCall.errorCode,
        errorMessage: wire.toolCall.errorMessage,
      },
    };
  }
  if (wire.listPrompts) {
    return {
      case: "listPrompts",
      value: {
        prompts: (wire.listPrompts.prompts ?? []).map((prompt) => ({
          name: prompt.name,
          description: prompt.description ?? "",
          arguments: (prompt.arguments ?? []).map((arg) => ({
            name: arg.name,
            description: arg.description ?? "",
            required: arg.required ?? false,
          })),
        })),
      },
    };
  }
  if (wire.promptGet) {
    return {
      case: "promptGet",
      value: {
        description: wire.promptGet.description ?? "",
        messages: (wire.promptGet.messages ?? []).map((msg) => ({
          role: msg.role ?? "",
          content: msg.content
            ? { type: msg.content.type ?? "text", text: msg.content.text ?? "" }
            : undefined,
        })),
      },
    };
  }
  if (wire.error) {
    return { case: "error", value: { code: wire.error.code ?? "", message: wire.error.message } };
  }
  return undefined;
}

function recoverRequestId(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("requestId" in data)) return undefined;
  return typeof data.requestId === "string" ? data.requestId : undefined;
}

/** Decode one backend reply line. Throws WireDecodeError when the line is not a reply. */
export function decodeResponse(line: string): BackendResponse {
  let data: unknown;
  try {
    data = JSON.parse(line) as unknown;
  } catch (err) {
    throw new WireDecodeError(`backend reply is not JSON: ${errorMessage(err)}`);
  }
  const wire = BackendResponseWire(data);
  if (wire instanceof type.errors) {
    throw new WireDecodeError(`invalid backend reply: ${wire.summary}`, recoverRequestId(data));
  }
  try {
    return { requestId: wire.requestId, response: decodeBody(wire) };
  } catch (err) {
    throw new WireDecodeError(`invalid backend reply: ${errorMessage(err)}`, wire.requestId);
  }
}
