import { Writable } from "node:stream";
import pino from "pino";
import pinoPretty from "pino-pretty";
import { getEnv } from "./env.js";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "silent"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

const LOGGER_NAME = "toolbridge";

const SECRET_NAME = "[A-Za-z0-9_]*(?:TOKEN|SECRET|PASSWORD|API_KEY)";

/**
 * Masks secret-looking values in log text: `NAME_TOKEN=value` assignments
 * (backend environment), `--token value` / `--api-key=value` flags (backend
 * argv) and `"password":"value"` JSON members.
 */
export function redactSecrets(input: string): string {
  return input
    .replace(new RegExp(`\\b(${SECRET_NAME})=[^\\s"]+`, "gi"), (_match, name: string) => `${name}=[REDACTED]`)
    .replace(
      /(--(?:[a-z0-9]+-)*(?:token|secret|password|api-key))([= ])[^\s"]+/gi,
      (_match, flag: string, sep: string) => `${flag}${sep}[REDACTED]`
    )
    .replace(
      new RegExp(`"(${SECRET_NAME})"\\s*:\\s*"[^"]*"`, "gi"),
      (_match, name: string) => `"${name}":"[REDACTED]"`
    );
}

export function isLogLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isLogFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

// stdout carries protocol frames, so every destination below ends on stderr.
function redactingStderr(): Writable {
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      const s = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      process.stderr.write(redactSecrets(s));
      cb();
    },
  });
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        let msg: unknown;
        try {
          msg = (JSON.parse(line) as { msg?: unknown }).msg;
        } catch {
          msg = line;
        }
        if (typeof msg === "string") {
          process.stderr.write(redactSecrets(msg) + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: pino.Logger | null = null;

export function initLogger(level = "info", format: LogFormat = "text"): pino.Logger {
  const logLevel = isLogLevel(level) ? level : "info";
  const options = { level: logLevel, name: LOGGER_NAME };
  if (format === "plain") {
    rootLogger = pino(options, plainMessageStderr());
  } else if (format === "text") {
    rootLogger = pino(options, pinoPretty({ colorize: true, destination: redactingStderr() }));
  } else {
    rootLogger = pino(options, redactingStderr());
  }
  return rootLogger;
}

export function getLogger(): pino.Logger {
  return rootLogger ?? initLogger(getEnv("LOG_LEVEL") ?? "info", "plain");
}

export const log = {
  info: (...args: Parameters<pino.Logger["info"]>) => getLogger().info(...args),
  warn: (...args: Parameters<pino.Logger["warn"]>) => getLogger().warn(...args),
  error: (...args: Parameters<pino.Logger["error"]>) => getLogger().error(...args),
  debug: (...args: Parameters<pino.Logger["debug"]>) => getLogger().debug(...args),
};
