import { access } from "node:fs/promises";
import path from "node:path";
import { ManifestNotFoundError } from "../errors.js";
import type { ActivatedEnvironment } from "../types.js";
import type { CommandRunner } from "./command-runner.js";

/**
 * Drives pip through the environment's own interpreter, so the installer
 * that runs is always the one inside the activated environment.
 */
export class PackageInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly environment: ActivatedEnvironment,
    private readonly cwd: string = process.cwd(),
  ) {}

  private pip(args: string[]): Promise<void> {
    return this.runner.run({
      command: this.environment.python,
      args: ["-m", "pip", ...args],
      cwd: this.cwd,
      env: this.environment.env,
    });
  }

  upgradeInstaller(): Promise<void> {
    return this.pip(["install", "--upgrade", "pip"]);
  }

  async installManifest(manifest: string): Promise<void> {
    try {
      await access(path.resolve(this.cwd, manifest));
    } catch {
      throw new ManifestNotFoundError(manifest);
    }
    await this.pip(["install", "-r", manifest]);
  }
}
