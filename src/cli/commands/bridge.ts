import { openBackend, type BridgeBackend } from "../../bridge/backends/index.js";
import { LineTooLongError, StdioBridge } from "../../bridge/stdio.js";
import { resolveConfig, type CliOptions } from "../../config.js";
import { EXIT, errorMessage, exit } from "../../shared/errors.js";
import { initLogger } from "../../shared/logging.js";

export async function runBridge(opts: CliOptions): Promise<void> {
  const config = resolveConfig(opts);
  const logger = initLogger(config.logLevel, config.logFormat);

  let backend: BridgeBackend;
  try {
    backend = await openBackend(config.backend, { requestTimeoutMs: config.requestTimeoutMs });
  } catch (err) {
    exit(EXIT.BACKEND_FAILURE, `Backend unavailable: ${errorMessage(err)}`);
  }
  logger.info({ backend: config.backend.type }, "Bridge ready on stdio");

  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  const bridge = new StdioBridge({
    backend,
    input: process.stdin,
    output: process.stdout,
    logger,
  });

  try {
    await bridge.run(controller.signal);
    logger.info("Bridge stopped");
  } catch (err) {
    if (err instanceof LineTooLongError) {
      exit(EXIT.INVALID_ARGS, err.message);
    }
    throw err;
  } finally {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    backend.close();
    process.stdin.destroy();
  }
}
