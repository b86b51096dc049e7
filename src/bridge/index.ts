export { StdioBridge, OutputSink, LineTooLongError, type StdioBridgeOptions } from "./stdio.js";
export { Dispatcher, type Route } from "./dispatcher.js";
export {
  BridgeBackend,
  LineBackend,
  openBackend,
  spawnLineBackend,
  connectLineBackend,
  type LineBackendOptions,
  type LineBackendStreams,
} from "./backends/index.js";
export { parseBackendSpec, type BackendSpec } from "./router.js";
export { DEFAULT_HANDLERS, type HandlerContext, type HandlerTable, type MethodHandler } from "./handlers/index.js";
export type * from "../protocols/backend/types.js";
export { BridgeRpcError } from "../shared/errors.js";
