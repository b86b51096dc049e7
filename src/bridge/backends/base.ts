import type { BackendRequest, BackendResponse } from "../../protocols/backend/types.js";

/**
 * Abstract base for bridge backends.
 * One `send` is one request/response round trip; transport failures reject.
 */
export abstract class BridgeBackend {
  /** Send a structured request to the backend and resolve with its reply. */
  abstract send(request: BackendRequest): Promise<BackendResponse>;

  /** Release the connection and reject anything still in flight. */
  abstract close(): void;
}
