/**
 * Backend message model. Payload values use a schema-typed union (the
 * structured-value model); requests and responses are one-of envelopes
 * discriminated by `case`.
 */

export type StructValue =
  | { kind: "null" }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "struct"; value: Struct }
  | { kind: "list"; value: StructValue[] };

export interface Struct {
  fields: Record<string, StructValue>;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema?: Struct;
}

export interface ListToolsResponse {
  tools: ToolDefinition[];
}

export interface ToolRequest {
  toolName: string;
  arguments?: Struct;
  /** Identifies the component that originated the call, for backend-side auditing. */
  callerPlugin: string;
}

export interface ToolResponse {
  success: boolean;
  result?: Struct;
  errorCode?: string;
  errorMessage?: string;
}

export interface PromptArgument {
  name: string;
  description: string;
  required: boolean;
}

export interface PromptDefinition {
  name: string;
  description: string;
  arguments: PromptArgument[];
}

export interface ListPromptsResponse {
  prompts: PromptDefinition[];
}

export interface PromptGetRequest {
  promptName: string;
  arguments: Record<string, string>;
}

export interface PromptMessage {
  role: string;
  content?: { type: string; text: string };
}

export interface PromptGetResponse {
  description: string;
  messages: PromptMessage[];
}

export interface BackendErrorReply {
  code: string;
  message: string;
}

export type BackendRequestBody =
  | { case: "listTools"; value: Record<string, never> }
  | { case: "toolCall"; value: ToolRequest }
  | { case: "listPrompts"; value: Record<string, never> }
  | { case: "promptGet"; value: PromptGetRequest };

export interface BackendRequest {
  requestId: string;
  request: BackendRequestBody;
}

export type BackendResponseBody =
  | { case: "listTools"; value: ListToolsResponse }
  | { case: "toolCall"; value: ToolResponse }
  | { case: "listPrompts"; value: ListPromptsResponse }
  | { case: "promptGet"; value: PromptGetResponse }
  | { case: "error"; value: BackendErrorReply };

export type BackendResponseCase = BackendResponseBody["case"];

/** Payload type of each reply case. */
export type BackendResponseValue<C extends BackendResponseCase> = {
  [B in BackendResponseBody as B["case"]]: B["value"];
}[C];

export interface BackendResponse {
  requestId: string;
  response?: BackendResponseBody;
}

function hasCase<C extends BackendResponseCase>(
  body: BackendResponseBody,
  expected: C
): body is Extract<BackendResponseBody, { case: C }> & { value: BackendResponseValue<C> } {
  return body.case === expected;
}

/** Payload of the expected reply case, or undefined when the backend answered with another one. */
export function responseValue<C extends BackendResponseCase>(
  response: BackendResponse,
  expected: C
): BackendResponseValue<C> | undefined {
  const body = response.response;
  if (body === undefined || !hasCase(body, expected)) return undefined;
  return body.value;
}
