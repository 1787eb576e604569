/**
 * @fileoverview Orchestrates a complete bootstrap run.
 *
 * A run is a fixed sequence: optional reset, create-if-absent, activate,
 * upgrade pip, install the manifest, then hand the terminal to a shell
 * running inside the environment. The first failing step ends the run;
 * nothing is retried or rolled back.
 *
 * @example
 * ```typescript
 * import { EnvironmentBootstrapper } from './bootstrapper.js';
 *
 * const config = await ConfigManager.getInstance().load();
 * const result = await new EnvironmentBootstrapper(config).run(process.argv.slice(2));
 * process.exitCode = result.shellExitCode;
 * ```
 */

import { Logger } from "../logger.js";
import { BOOTSTRAP_STEPS } from "../constants.js";
import { isResetFlag } from "../utils/cli-helpers.js";
import { activate } from "./activation.js";
import { ProcessRunner } from "./command-runner.js";
import { EnvironmentDirectory } from "./environment-directory.js";
import type { ResetConfirmation } from "./environment-directory.js";
import { PackageInstaller } from "./package-installer.js";
import { InquirerPrompter } from "./prompter.js";
import { ShellLauncher, resolveShell } from "./shell-launcher.js";
import type { CommandRunner } from "./command-runner.js";
import type { Prompter } from "./prompter.js";
import type { ActivatedEnvironment, BootstrapConfig, BootstrapResult } from "../types.js";

export interface BootstrapperOptions {
  runner?: CommandRunner;
  prompter?: Prompter;
  /** Working directory the environment and manifest are resolved against */
  cwd?: string;
  /** Session environment the activated one is derived from */
  env?: NodeJS.ProcessEnv;
}

/** Outcome of every step before the shell hand-off. */
export interface PreparedEnvironment {
  reset: boolean;
  created: boolean;
  environment: ActivatedEnvironment;
}

/**
 * Brings the environment directory into a known-good state and opens an
 * interactive shell inside it.
 *
 * Collaborators default to the real ones: child processes through
 * {@link ProcessRunner} and prompts through inquirer. Tests pass their own.
 */
export class EnvironmentBootstrapper {
  private readonly runner: CommandRunner;
  private readonly prompter: Prompter;
  private readonly cwd: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly directory: EnvironmentDirectory;

  constructor(
    private readonly config: BootstrapConfig,
    options: BootstrapperOptions = {},
  ) {
    this.runner = options.runner ?? new ProcessRunner();
    this.prompter = options.prompter ?? new InquirerPrompter();
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env ?? process.env;
    this.directory = new EnvironmentDirectory(config.envDir, this.cwd);
  }

  getDirectory(): EnvironmentDirectory {
    return this.directory;
  }

  /**
   * Runs every step up to, but not including, the shell hand-off.
   *
   * Only `args[0]` is looked at: `--reset` or `-r` deletes the directory
   * first, anything else counts as no flag.
   *
   * @throws {BootstrapError} from the first step that fails
   */
  async prepare(args: readonly string[]): Promise<PreparedEnvironment> {
    let reset = false;
    if (isResetFlag(args[0])) {
      reset = await this.directory.reset(this.resetConfirmation());
    }

    Logger.step(1, BOOTSTRAP_STEPS, `Preparing virtual environment ${this.config.envDir}...`);
    const created = await this.directory.ensureCreated(this.runner, this.config.python);
    if (!created) {
      Logger.info(`Using existing virtual environment ${this.config.envDir}`);
    }

    Logger.step(2, BOOTSTRAP_STEPS, "Activating virtual environment...");
    const environment = await activate(this.directory, this.env);

    const installer = new PackageInstaller(this.runner, environment, this.cwd);

    Logger.step(3, BOOTSTRAP_STEPS, "Upgrading pip...");
    await installer.upgradeInstaller();

    Logger.step(4, BOOTSTRAP_STEPS, `Installing dependencies from ${this.config.manifest}...`);
    await installer.installManifest(this.config.manifest);

    return { reset, created, environment };
  }

  /**
   * Performs the complete bootstrap and returns once the interactive shell
   * has exited.
   *
   * @throws {BootstrapError} from the first step that fails; the shell is
   * never launched in that case
   */
  async run(args: readonly string[]): Promise<BootstrapResult> {
    const { reset, created, environment } = await this.prepare(args);

    const shell = resolveShell(this.config.shell, this.env);
    Logger.step(5, BOOTSTRAP_STEPS, `Launching ${shell} with ${this.config.envDir} active...`);
    Logger.success("Virtual environment ready. Exit the shell to leave it.");
    const shellExitCode = await new ShellLauncher(this.runner, shell, this.cwd).launch(environment);

    return { reset, created, shellExitCode };
  }

  private resetConfirmation(): ResetConfirmation | undefined {
    if (!this.config.confirmReset) return undefined;
    return () =>
      this.prompter.confirm(
        `Delete the existing virtual environment at ${this.config.envDir}?`,
        false,
      );
  }
}
