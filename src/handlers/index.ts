import { HandlerRegistry } from "../dispatch/registry.js";
import { registerDefaultHandlers } from "./defaults.js";
import { registerArchHandlers } from "./recipes/arch.js";
import { registerDebianHandlers } from "./recipes/debian.js";
import { registerFreebsdHandlers } from "./recipes/freebsd.js";
import { registerRhelHandlers } from "./recipes/rhel.js";
import { registerSuseHandlers } from "./recipes/suse.js";

/** Registry with the default handlers and every bundled recipe. */
export function createDefaultRegistry(): HandlerRegistry {
  const registry = new HandlerRegistry();
  registerDefaultHandlers(registry);
  registerDebianHandlers(registry);
  registerRhelHandlers(registry);
  registerSuseHandlers(registry);
  registerArchHandlers(registry);
  registerFreebsdHandlers(registry);
  return registry;
}
