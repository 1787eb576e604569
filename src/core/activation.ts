import { access } from "node:fs/promises";
import path from "node:path";
import { ActivationError } from "../errors.js";
import { IS_WINDOWS } from "../constants.js";
import type { ActivatedEnvironment } from "../types.js";
import type { EnvironmentDirectory } from "./environment-directory.js";

/** Windows keeps the search path under whatever casing the system chose. */
function pathKey(env: Record<string, string>): string {
  if (!IS_WINDOWS) return "PATH";
  return Object.keys(env).find((key) => key.toUpperCase() === "PATH") ?? "Path";
}

/**
 * The session environment the venv's `activate` script would produce: the
 * env's binaries first on the search path, `VIRTUAL_ENV` pointing at it and
 * no `PYTHONHOME` to pull in a system installation.
 */
export function activatedEnv(
  directory: EnvironmentDirectory,
  baseEnv: NodeJS.ProcessEnv,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) env[key] = value;
  }

  const key = pathKey(env);
  const current = env[key];
  env[key] = current ? `${directory.binDir}${path.delimiter}${current}` : directory.binDir;

  env.VIRTUAL_ENV = directory.root;
  env.VIRTUAL_ENV_PROMPT = path.basename(directory.root);
  delete env.PYTHONHOME;

  return env;
}

export async function activate(
  directory: EnvironmentDirectory,
  baseEnv: NodeJS.ProcessEnv = process.env,
): Promise<ActivatedEnvironment> {
  try {
    await access(directory.interpreter);
  } catch {
    throw new ActivationError(directory.name);
  }

  return {
    root: directory.root,
    binDir: directory.binDir,
    python: directory.interpreter,
    env: activatedEnv(directory, baseEnv),
  };
}
