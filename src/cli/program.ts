import { Command } from "commander";
import type { CliOptions } from "../config.js";
import { getPackageJsonVersion } from "./utils.js";
import { runBridge } from "./commands/bridge.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("toolbridge")
    .description("Serve MCP over stdio, backed by a structured tool backend")
    .version(getPackageJsonVersion())
    .option("--backend <specifier>", "Backend (exec:<command> or tcp:<host:port>)")
    .option("--request-timeout <ms>", "Per-request backend timeout in milliseconds")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level: error, warn, info, debug or silent")
    .option("--log-format <format>", "Log format: text, json or plain")
    .action((opts: CliOptions) => runBridge(opts));

  return program;
}
