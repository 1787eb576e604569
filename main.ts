#!/usr/bin/env node

import { ConfigManager } from "./src/config-manager.js";
import { EnvironmentBootstrapper } from "./src/core/bootstrapper.js";
import { Logger } from "./src/logger.js";
import { errorMessage, exitCodeFor } from "./src/utils/cli-helpers.js";

// Usage: venvboot [--reset | -r]
// Only the first argument is inspected; anything else is ignored.
const args = process.argv.slice(2);

try {
  const config = await ConfigManager.getInstance().load();
  const { shellExitCode } = await new EnvironmentBootstrapper(config).run(args);
  process.exitCode = shellExitCode;
} catch (error) {
  Logger.error(`Error: ${errorMessage(error)}`);
  process.exitCode = exitCodeFor(error);
}
