import { spawn } from "node:child_process";
import { createConnection, type Socket } from "node:net";
import { createInterface, type Interface } from "node:readline";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../../shared/constants.js";
import { BackendStartError, errorMessage } from "../../shared/errors.js";
import { log } from "../../shared/logging.js";
import type { BackendRequest, BackendResponse } from "../../protocols/backend/types.js";
import { WireDecodeError, decodeResponse, encodeRequest } from "../../protocols/backend/wire.js";
import { BridgeBackend } from "./base.js";

export interface LineBackendStreams {
  /** Stream the backend reads requests from. */
  writable: NodeJS.WritableStream;
  /** Stream the backend writes replies to. */
  readable: NodeJS.ReadableStream;
  /** Tear down the underlying process or socket. */
  dispose?: () => void;
}

export interface LineBackendOptions {
  requestTimeoutMs?: number;
}

interface Pending {
  resolve: (value: BackendResponse) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Backend reached over newline-delimited JSON, one request or reply per line,
 * correlated by `requestId`.
 */
export class LineBackend extends BridgeBackend {
  private readonly rl: Interface;
  private readonly pending = new Map<string, Pending>();
  private readonly requestTimeoutMs: number;
  private closed = false;
  private disposed = false;

  constructor(
    private readonly streams: LineBackendStreams,
    options: LineBackendOptions = {}
  ) {
    super();
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.rl = createInterface({ input: streams.readable, crlfDelay: Infinity });
    this.rl.on("line", (line) => this.onLine(line));
    this.rl.on("close", () => {
      this.closed = true;
      this.rejectAll(new Error("backend closed"));
    });
  }

  /** Remove a pending call and stop its timer. */
  private take(id: string): Pending | undefined {
    const pending = this.pending.get(id);
    if (!pending) return undefined;
    clearTimeout(pending.timer);
    this.pending.delete(id);
    return pending;
  }

  private onLine(line: string): void {
    if (!line.trim()) return;
    let reply: BackendResponse;
    try {
      reply = decodeResponse(line);
    } catch (err) {
      // A reply that names a waiting call fails that call instead of letting it time out.
      if (err instanceof WireDecodeError && err.requestId !== undefined) {
        const pending = this.take(err.requestId);
        if (pending) {
          pending.reject(err);
          return;
        }
      }
      log.warn({ line: line.slice(0, 200) }, `Dropping backend line: ${errorMessage(err)}`);
      return;
    }
    const pending = this.take(reply.requestId);
    if (!pending) {
      log.debug({ requestId: reply.requestId }, "Reply for unknown request id");
      return;
    }
    if (reply.response?.case === "error") {
      const { code, message } = reply.response.value;
      pending.reject(new Error(code ? `${code}: ${message}` : message));
      return;
    }
    pending.resolve(reply);
  }

  private rejectAll(err: Error): void {
    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(err);
      this.pending.delete(id);
    }
  }

  send(request: BackendRequest): Promise<BackendResponse> {
    const id = request.requestId;
    if (this.closed) {
      return Promise.reject(new Error("backend closed"));
    }
    if (this.pending.has(id)) {
      return Promise.reject(new Error(`request ${id} already in flight`));
    }
    const promise = new Promise<BackendResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`backend request timeout: ${id}`));
      }, this.requestTimeoutMs);
      this.pending.set(id, { resolve, reject, timer });
    });
    this.streams.writable.write(encodeRequest(request) + "\n", (err) => {
      if (err) this.take(id)?.reject(err);
    });
    return promise;
  }

  override close(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.closed = true;
    this.rejectAll(new Error("backend closed"));
    this.rl.close();
    this.streams.dispose?.();
  }
}

/** Spawn the backend as a child process speaking line JSON on stdin/stdout. */
export function spawnLineBackend(
  command: string,
  args: string[] = [],
  options: LineBackendOptions = {}
): LineBackend {
  log.debug(`Spawning backend: ${command} ${args.join(" ")}`);
  const proc = spawn(command, args, {
    cwd: process.cwd(),
    stdio: ["pipe", "pipe", "pipe"],
  });
  proc.stderr.on("data", (chunk: Buffer | string) => {
    log.warn(typeof chunk === "string" ? chunk : chunk.toString("utf8"));
  });
  proc.stdin.on("error", (err) => {
    log.warn({ err }, "Backend stdin error");
  });
  proc.on("error", (err) => {
    log.error({ err }, `Backend process failed: ${command}`);
  });
  proc.on("close", (code, signal) => {
    log.debug({ code, signal }, "Backend process exited");
  });
  return new LineBackend(
    { writable: proc.stdin, readable: proc.stdout, dispose: () => proc.kill() },
    options
  );
}

/** Connect to a backend listening for line JSON over TCP. */
export async function connectLineBackend(
  host: string,
  port: number,
  options: LineBackendOptions = {}
): Promise<LineBackend> {
  const socket = await new Promise<Socket>((resolve, reject) => {
    const s = createConnection({ host, port });
    s.once("connect", () => resolve(s));
    s.once("error", (err) =>
      reject(new BackendStartError(`connect to backend at ${host}:${port}: ${err.message}`))
    );
  });
  socket.on("error", (err) => {
    log.warn({ err }, "Backend socket error");
  });
  return new LineBackend(
    { writable: socket, readable: socket, dispose: () => socket.destroy() },
    options
  );
}
