/**
 * @fileoverview Lifecycle of the virtual environment directory.
 *
 * The directory is either absent or present; this module moves it between
 * the two states. A reset deletes it, creation runs `python -m venv`. Any
 * failure along the way propagates unchanged, and a deletion that fails
 * halfway leaves whatever it did not get to.
 *
 * @module EnvironmentDirectory
 */

import { rm, stat } from "node:fs/promises";
import path from "node:path";
import { Logger } from "../logger.js";
import { isNotFound } from "../errors.js";
import { ENV_BIN_DIR, ENV_PYTHON, MESSAGES } from "../constants.js";
import type { CommandRunner } from "./command-runner.js";

/** Asked before an existing directory is deleted; `true` lets the reset go ahead. */
export type ResetConfirmation = (root: string) => Promise<boolean>;

export class EnvironmentDirectory {
  /** Absolute path of the environment */
  readonly root: string;

  constructor(readonly name: string, readonly cwd: string = process.cwd()) {
    this.root = path.resolve(cwd, name);
  }

  get binDir(): string {
    return path.join(this.root, ENV_BIN_DIR);
  }

  get interpreter(): string {
    return path.join(this.binDir, ENV_PYTHON);
  }

  async exists(): Promise<boolean> {
    try {
      return (await stat(this.root)).isDirectory();
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /**
   * Deletes the directory if it exists. Resetting a missing directory is a
   * no-op that still succeeds.
   *
   * @returns whether anything was deleted
   */
  async reset(confirm?: ResetConfirmation): Promise<boolean> {
    if (!(await this.exists())) {
      Logger.info(MESSAGES.nothingToReset);
      return false;
    }

    if (confirm && !(await confirm(this.root))) {
      Logger.warn(`Keeping existing virtual environment at ${this.name}`);
      return false;
    }

    Logger.info(MESSAGES.resetting);
    await rm(this.root, { recursive: true, force: true });
    Logger.info(MESSAGES.resetDone);
    return true;
  }

  /**
   * Creates the environment with `<python> -m venv` unless the directory is
   * already there.
   *
   * @returns whether the environment was created by this call
   */
  async ensureCreated(runner: CommandRunner, python: string): Promise<boolean> {
    if (await this.exists()) return false;

    await runner.run({
      command: python,
      args: ["-m", "venv", this.root],
      cwd: this.cwd,
    });
    return true;
  }
}
