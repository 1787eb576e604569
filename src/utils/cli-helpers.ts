import { RESET_FLAGS } from "../constants.js";
import { BootstrapError } from "../errors.js";

/**
 * Whether the first command-line argument asks for a reset
 */
export function isResetFlag(arg: string | undefined): boolean {
  return arg !== undefined && RESET_FLAGS.includes(arg);
}

/**
 * Exit status for an error that ended a run
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof BootstrapError ? error.exitCode : 1;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
