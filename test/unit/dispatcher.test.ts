import { describe, it, expect, vi } from "vitest";
import { Dispatcher } from "../../src/bridge/dispatcher.js";
import type { HandlerTable } from "../../src/bridge/handlers/index.js";
import { BridgeRpcError } from "../../src/shared/errors.js";
import { FakeBackend, silentLogger } from "./helpers.js";

function createDispatcher(extra: HandlerTable = {}) {
  return new Dispatcher({ backend: new FakeBackend(), logger: silentLogger }, extra);
}

describe("Dispatcher", () => {
  it("routes the built-in methods to handlers", () => {
    const dispatcher = createDispatcher();
    for (const method of ["initialize", "ping", "tools/list", "tools/call", "prompts/list", "prompts/get"]) {
      expect(dispatcher.route(method).kind).toBe("handler");
    }
  });

  it("routes exact names before the notification prefix", () => {
    const handler = vi.fn();
    const dispatcher = createDispatcher({ "notifications/custom": handler });
    expect(dispatcher.route("notifications/custom")).toEqual({ kind: "handler", handler });
    expect(dispatcher.route("notifications/progress")).toEqual({ kind: "notification" });
    expect(dispatcher.route("sampling/createMessage")).toEqual({ kind: "unknown" });
  });

  it("does not run handlers for requests without an id", async () => {
    const handler = vi.fn(() => ({}));
    const dispatcher = createDispatcher({ custom: handler });
    await expect(dispatcher.dispatch({ jsonrpc: "2.0", method: "custom" })).resolves.toBeUndefined();
    expect(handler).not.toHaveBeenCalled();
  });

  it("passes id and params to the handler", async () => {
    const handler = vi.fn(() => ({ ok: true }));
    const dispatcher = createDispatcher({ custom: handler });
    const response = await dispatcher.dispatch({ jsonrpc: "2.0", id: "a1", method: "custom", params: { x: 1 } });

    expect(response).toEqual({ jsonrpc: "2.0", id: "a1", result: { ok: true } });
    expect(handler).toHaveBeenCalledWith("a1", { x: 1 }, expect.objectContaining({ logger: silentLogger }));
  });

  it("answers null when a handler returns nothing", async () => {
    const dispatcher = createDispatcher({ quiet: () => undefined });
    await expect(dispatcher.dispatch({ jsonrpc: "2.0", id: 1, method: "quiet" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: null,
    });
  });

  it("keeps the code of a BridgeRpcError", async () => {
    const dispatcher = createDispatcher({
      strict: () => {
        throw BridgeRpcError.invalidParams("invalid params: x must be a number");
      },
    });
    await expect(dispatcher.dispatch({ jsonrpc: "2.0", id: 2, method: "strict" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 2,
      error: { code: -32602, message: "invalid params: x must be a number" },
    });
  });

  it("turns other handler failures into internal errors", async () => {
    const dispatcher = createDispatcher({
      flaky: async () => {
        throw new Error("kaboom");
      },
    });
    await expect(dispatcher.dispatch({ jsonrpc: "2.0", id: 3, method: "flaky" })).resolves.toEqual({
      jsonrpc: "2.0",
      id: 3,
      error: { code: -32603, message: "internal error: kaboom" },
    });
  });

  it("rejects params of the wrong shape for tools/call", async () => {
    const response = await createDispatcher().dispatch({ jsonrpc: "2.0", id: 4, method: "tools/call", params: "oops" });
    expect(response).toMatchObject({ id: 4, error: { code: -32602 } });
    expect(response && "error" in response ? response.error.message : "").toMatch(/^invalid params: /);
  });

  it("rejects tool arguments that have no structured form", async () => {
    const response = await createDispatcher().dispatch({
      jsonrpc: "2.0",
      id: 5,
      method: "tools/call",
      params: { name: "echo", arguments: { ratio: Number.NaN } },
    });
    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 5,
      error: { code: -32602, message: "invalid arguments: arguments.ratio: unsupported number NaN" },
    });
  });

  it("treats null arguments as no arguments", async () => {
    const backend = new FakeBackend({
      toolCall: { case: "toolCall", value: { success: true } },
    });
    const dispatcher = new Dispatcher({ backend, logger: silentLogger });
    const response = await dispatcher.dispatch({
      jsonrpc: "2.0",
      id: 6,
      method: "tools/call",
      params: { name: "noop", arguments: null },
    });

    expect(response).toEqual({ jsonrpc: "2.0", id: 6, result: { content: [{ type: "text", text: "" }], isError: false } });
    const sent = backend.requests[0]?.request;
    expect(sent?.case === "toolCall" ? sent.value.arguments : "other").toBeUndefined();
  });

  it("requires a prompt name", async () => {
    const response = await createDispatcher().dispatch({ jsonrpc: "2.0", id: 7, method: "prompts/get", params: {} });
    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: -32602, message: "missing required parameter: name" },
    });
  });
});
