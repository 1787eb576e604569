import { FALLBACK_SHELL, IS_WINDOWS } from "../constants.js";
import type { ActivatedEnvironment } from "../types.js";
import type { CommandRunner } from "./command-runner.js";

export function resolveShell(configured: string | undefined, env: NodeJS.ProcessEnv): string {
  if (configured) return configured;
  if (env.SHELL) return env.SHELL;
  if (IS_WINDOWS && env.COMSPEC) return env.COMSPEC;
  return FALLBACK_SHELL;
}

export class ShellLauncher {
  constructor(
    private readonly runner: CommandRunner,
    private readonly shell: string,
    private readonly cwd: string = process.cwd(),
  ) {}

  /** Hands the terminal to the shell and resolves with its exit status once it ends. */
  launch(environment: ActivatedEnvironment): Promise<number> {
    return this.runner.runInteractive({
      command: this.shell,
      args: [],
      cwd: this.cwd,
      env: environment.env,
    });
  }
}
