import type { Handler } from "../types/phase.js";
import { logger } from "../logger.js";
import type { HandlerKey } from "./candidates.js";
import { formatHandlerName } from "./candidates.js";

/**
 * Explicit handler table. Recipes register under the same names the candidate
 * generator produces, so lookup is a plain map probe.
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, Handler>();

  register(name: string, handler: Handler): this {
    if (this.handlers.has(name)) {
      logger.warn({ handler: name }, "Duplicate handler registration; overwriting");
    }
    this.handlers.set(name, handler);
    return this;
  }

  registerFor(key: HandlerKey, handler: Handler): this {
    return this.register(formatHandlerName(key), handler);
  }

  get(name: string): Handler | undefined {
    return this.handlers.get(name);
  }
}
