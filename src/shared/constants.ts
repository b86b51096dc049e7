/** MCP protocol revision advertised during `initialize`. */
export const PROTOCOL_VERSION = "2024-11-05";

export const SERVER_NAME = "toolbridge";
export const VERSION = "0.1.0";

/** Caller identity attached to every backend tool call. */
export const CALLER_ID = "transport.stdio";

/** Longest input line accepted by the stdio loop (10 MiB). */
export const MAX_LINE_BYTES = 10 * 1024 * 1024;

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export const NOTIFICATION_PREFIX = "notifications/";
