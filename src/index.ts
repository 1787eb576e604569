/**
 * @fileoverview Public entry point of venvboot.
 *
 * The CLI in `main.ts` is a thin wrapper around {@link EnvironmentBootstrapper};
 * the pieces it is built from are exported for scripting the same sequence.
 */

export { ConfigManager } from "./config-manager.js";
export { Logger } from "./logger.js";
export * from "./errors.js";
export * from "./constants.js";
export type * from "./types.js";

export * from "./core/index.js";
export { isResetFlag } from "./utils/cli-helpers.js";
