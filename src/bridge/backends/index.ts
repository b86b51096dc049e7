export { BridgeBackend } from "./base.js";
export {
  LineBackend,
  spawnLineBackend,
  connectLineBackend,
  type LineBackendOptions,
  type LineBackendStreams,
} from "./line.js";

import type { BackendSpec } from "../router.js";
import type { BridgeBackend } from "./base.js";
import { connectLineBackend, spawnLineBackend, type LineBackendOptions } from "./line.js";

export async function openBackend(spec: BackendSpec, options: LineBackendOptions = {}): Promise<BridgeBackend> {
  switch (spec.type) {
    case "exec":
      return spawnLineBackend(spec.command, spec.args, options);
    case "tcp":
      return connectLineBackend(spec.host, spec.port, options);
  }
}
