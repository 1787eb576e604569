/**
 * @fileoverview Runs the external tools a bootstrap run depends on.
 *
 * Every command inherits the terminal, so whatever the interpreter, pip or
 * the shell print reaches the user unchanged. Failures surface as
 * {@link CommandFailedError} carrying the command's own exit status.
 *
 * @module CommandRunner
 */

import { spawn as nodeSpawn } from "node:child_process";
import type { SpawnOptions } from "node:child_process";
import { constants } from "node:os";
import { CommandFailedError } from "../errors.js";
import { IS_WINDOWS } from "../constants.js";
import type { CommandSpec } from "../types.js";

export interface CommandRunner {
  /** Runs a command to completion; rejects unless it exits with 0. */
  run(spec: CommandSpec): Promise<void>;
  /** Runs a command attached to the terminal and resolves with its exit status. */
  runInteractive(spec: CommandSpec): Promise<number>;
}

/** The part of a `ChildProcess` the runner listens to. */
export interface SpawnedProcess {
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

/** Exit status used when the executable cannot be found, as POSIX shells do. */
export const COMMAND_NOT_FOUND = 127;

const FORWARDED_SIGNALS: NodeJS.Signals[] = IS_WINDOWS ? ["SIGINT"] : ["SIGINT", "SIGQUIT"];

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

/**
 * Maps a child's `close` event to a shell-style exit status: the code when
 * it exited, `128 + signal number` when a signal killed it.
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) {
    const entry = Object.entries(constants.signals).find(([name]) => name === signal);
    const number: number = entry?.[1] ?? 0;
    return 128 + number;
  }
  return 1;
}

function spawnErrorStatus(err: Error): number {
  return "code" in err && err.code === "ENOENT" ? COMMAND_NOT_FOUND : 1;
}

export class ProcessRunner implements CommandRunner {
  constructor(private readonly spawn: SpawnFunction = nodeSpawn) {}

  run(spec: CommandSpec): Promise<void> {
    return this.wait(spec).then((status) => {
      if (status !== 0) {
        throw new CommandFailedError(formatCommand(spec), status);
      }
    });
  }

  async runInteractive(spec: CommandSpec): Promise<number> {
    // The terminal delivers job-control signals to us as well as to the
    // child; only the child should react to them.
    const ignore = (): void => {};
    for (const signal of FORWARDED_SIGNALS) process.on(signal, ignore);
    try {
      return await this.wait(spec);
    } finally {
      for (const signal of FORWARDED_SIGNALS) process.off(signal, ignore);
    }
  }

  private wait(spec: CommandSpec): Promise<number> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const child = this.spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: spec.env ?? process.env,
        stdio: "inherit",
      });

      child.on("error", (err) => {
        if (settled) return;
        settled = true;
        reject(new CommandFailedError(formatCommand(spec), spawnErrorStatus(err)));
      });

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        resolve(exitStatus(code, signal));
      });
    });
  }
}
