import { type } from "arktype";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import type { LogFormat, LogLevel } from "./shared/logging.js";
import { parseBackendSpec, type BackendSpec } from "./bridge/router.js";

/** Raw options as commander hands them over. */
export interface CliOptions {
  backend?: string;
  requestTimeout?: string;
  verbose?: boolean;
  logLevel?: string;
  logFormat?: string;
}

export interface BridgeConfig {
  backend: BackendSpec;
  requestTimeoutMs: number;
  logLevel: LogLevel;
  logFormat: LogFormat;
}

const RawConfigSchema = type({
  backend: "string > 0",
  requestTimeout: "string.integer.parse",
  logLevel: "'error' | 'warn' | 'info' | 'debug' | 'silent'",
  logFormat: "'text' | 'json' | 'plain'",
});

/** Flags win over environment, environment over defaults. */
export function resolveConfig(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const raw = {
    backend: opts.backend ?? getEnv("BACKEND", env) ?? "",
    requestTimeout: opts.requestTimeout ?? getEnv("REQUEST_TIMEOUT", env) ?? String(DEFAULT_REQUEST_TIMEOUT_MS),
    logLevel: opts.verbose ? "debug" : (opts.logLevel ?? getEnv("LOG_LEVEL", env) ?? "info"),
    logFormat: opts.logFormat ?? getEnv("LOG_FORMAT", env) ?? "text",
  };

  const out = RawConfigSchema(raw);
  if (out instanceof type.errors) {
    throw new Error(`Invalid configuration: ${out.summary}`);
  }
  if (out.requestTimeout <= 0) {
    throw new Error(`Invalid request timeout: ${raw.requestTimeout}`);
  }
  const backend = parseBackendSpec(out.backend);
  if (!backend) {
    throw new Error(`Invalid backend: ${out.backend} (expected exec:<command> or tcp:<host:port>)`);
  }
  return {
    backend,
    requestTimeoutMs: out.requestTimeout,
    logLevel: out.logLevel,
    logFormat: out.logFormat,
  };
}
