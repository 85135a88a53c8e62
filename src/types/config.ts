import type { z } from "zod";
import type { configSchema } from "../config/schema.js";

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** Full run configuration. Built once at startup and never mutated afterwards. */
export type BootstrapConfig = DeepReadonly<z.infer<typeof configSchema>>;

/** Any subset of the configuration, as read from a defaults file, the environment or flags. */
export type ConfigOverrides = {
  [S in keyof BootstrapConfig]?: { -readonly [K in keyof BootstrapConfig[S]]?: BootstrapConfig[S][K] };
};
