/**
 * Bridge stdio mode: newline-delimited JSON-RPC on input/output, one request
 * per line, processed strictly in arrival order. stderr = logs only.
 */

import { createInterface } from "node:readline";
import type { Logger } from "pino";
import { MAX_LINE_BYTES, NOTIFICATION_PREFIX } from "../shared/constants.js";
import { getLogger } from "../shared/logging.js";
import { Mutex } from "../shared/mutex.js";
import { parseFailureResponse, parseRequestLine, serializeResponse } from "../protocols/jsonrpc/codec.js";
import type { JsonRpcResponse } from "../protocols/jsonrpc/types.js";
import type { BridgeBackend } from "./backends/base.js";
import { Dispatcher } from "./dispatcher.js";
import type { HandlerTable } from "./handlers/index.js";

export interface StdioBridgeOptions {
  backend: BridgeBackend;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Longest accepted line in bytes. Defaults to 10 MiB. */
  maxLineBytes?: number;
  /** Added to (or overriding) the built-in method table. */
  extraHandlers?: HandlerTable;
  logger?: Logger;
}

export class LineTooLongError extends Error {
  constructor(readonly bytes: number, readonly limit: number) {
    super(`input line of ${bytes} bytes exceeds limit of ${limit} bytes`);
    this.name = "LineTooLongError";
  }
}

/** Owned output stream. Each response line is written under the lock. */
export class OutputSink {
  private readonly lock = new Mutex();

  constructor(private readonly output: NodeJS.WritableStream) {}

  write(response: JsonRpcResponse): Promise<void> {
    return this.lock.runExclusive(async () => {
      const line = serializeResponse(response);
      await new Promise<void>((resolve, reject) => {
        this.output.write(line, (err) => (err ? reject(err) : resolve()));
      });
    });
  }
}

export class StdioBridge {
  private readonly input: NodeJS.ReadableStream;
  private readonly sink: OutputSink;
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;
  private readonly maxLineBytes: number;

  constructor(options: StdioBridgeOptions) {
    this.input = options.input;
    this.sink = new OutputSink(options.output);
    this.logger = options.logger ?? getLogger();
    this.maxLineBytes = options.maxLineBytes ?? MAX_LINE_BYTES;
    this.dispatcher = new Dispatcher(
      { backend: options.backend, logger: this.logger },
      options.extraHandlers
    );
  }

  /**
   * Read-dispatch-write until the input ends or `signal` aborts. An abort
   * never interrupts a request already being handled; its response is still
   * written. Rejects on input stream faults, over-long lines and responses
   * that cannot be serialized.
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;

    const rl = createInterface({ input: this.input, crlfDelay: Infinity });
    let inputError: Error | undefined;
    const stop = () => rl.close();
    const onInputError = (err: Error) => {
      inputError = err;
      rl.close();
    };
    signal?.addEventListener("abort", stop, { once: true });
    this.input.on("error", onInputError);

    try {
      for await (const raw of rl) {
        if (signal?.aborted) break;
        const bytes = Buffer.byteLength(raw, "utf8");
        if (bytes > this.maxLineBytes) {
          throw new LineTooLongError(bytes, this.maxLineBytes);
        }
        const line = raw.trim();
        if (!line) continue;

        const response = await this.handleLine(line);
        if (response) {
          await this.sink.write(response);
        }
      }
    } finally {
      signal?.removeEventListener("abort", stop);
      this.input.off("error", onInputError);
      rl.close();
    }

    if (inputError) throw inputError;
    if (signal?.aborted) this.logger.debug("Stdio loop cancelled");
  }

  private async handleLine(line: string): Promise<JsonRpcResponse | undefined> {
    const parsed = parseRequestLine(line);
    if (!parsed.ok) {
      const { kind, method, message } = parsed.failure;
      if (method?.startsWith(NOTIFICATION_PREFIX)) {
        this.logger.debug({ kind }, `notification: ${method}`);
        return undefined;
      }
      this.logger.warn({ kind }, message);
      return parseFailureResponse(parsed.failure);
    }
    return this.dispatcher.dispatch(parsed.request);
  }
}
