import { PassThrough, Writable } from "node:stream";
import pino from "pino";
import { BridgeBackend } from "../../src/bridge/backends/base.js";
import type { BackendRequest, BackendResponse, BackendResponseBody } from "../../src/protocols/backend/types.js";

export const silentLogger = pino({ level: "silent" });

type Reply = BackendResponseBody | Error | ((request: BackendRequest) => Promise<BackendResponseBody>);

/** In-process backend: records requests and answers from a per-case script. */
export class FakeBackend extends BridgeBackend {
  readonly requests: BackendRequest[] = [];
  closed = false;

  constructor(private readonly replies: Partial<Record<BackendRequest["request"]["case"], Reply>> = {}) {
    super();
  }

  async send(request: BackendRequest): Promise<BackendResponse> {
    this.requests.push(request);
    const reply = this.replies[request.request.case];
    if (reply === undefined) throw new Error(`no reply scripted for ${request.request.case}`);
    if (reply instanceof Error) throw reply;
    const body = typeof reply === "function" ? await reply(request) : reply;
    return { requestId: request.requestId, response: body };
  }

  close(): void {
    this.closed = true;
  }
}

/** Writable that keeps every chunk, split into lines on demand. */
export function createOutput() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      chunks.push(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
      cb();
    },
  });
  return {
    output,
    raw: () => chunks.join(""),
    lines: () => chunks.join("").split("\n").filter(Boolean),
    messages: (): unknown[] =>
      chunks
        .join("")
        .split("\n")
        .filter(Boolean)
        .map((line) => JSON.parse(line) as unknown),
  };
}

/** Input stream pre-filled with the given lines and then ended. */
export function inputOf(...lines: string[]): PassThrough {
  const input = new PassThrough();
  for (const line of lines) input.write(line + "\n");
  input.end();
  return input;
}

export function request(id: string | number | undefined, method: string, params?: unknown): string {
  return JSON.stringify({ jsonrpc: "2.0", ...(id !== undefined && { id }), method, ...(params !== undefined && { params }) });
}

export async function waitFor(check: () => boolean, timeoutMs = 1000): Promise<void> {
  const started = Date.now();
  while (!check()) {
    if (Date.now() - started > timeoutMs) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
