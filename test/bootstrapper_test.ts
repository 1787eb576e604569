import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { EnvironmentBootstrapper } from "../src/core/bootstrapper.js";
import type { Prompter } from "../src/core/prompter.js";
import { ActivationError, ManifestNotFoundError } from "../src/errors.js";
import { ENV_BIN_DIR, ENV_PYTHON, MESSAGES } from "../src/constants.js";
import { Logger } from "../src/logger.js";
import type { BootstrapConfig } from "../src/types.js";
import { FakeRunner } from "./helpers/fake-runner.js";
import { createWorkspace, removeWorkspace, seedEnvironment } from "./helpers/workspace.js";

const SESSION_ENV = {
  PATH: "/usr/local/bin:/usr/bin",
  SHELL: "/bin/bash",
  PYTHONHOME: "/opt/python",
};

let cwd: string;

function config(overrides: Partial<BootstrapConfig> = {}): BootstrapConfig {
  return {
    envDir: "myenv",
    manifest: "requirements.txt",
    python: "python3",
    confirmReset: false,
    ...overrides,
  };
}

function bootstrapper(runner: FakeRunner, overrides: Partial<BootstrapConfig> = {}, prompter?: Prompter) {
  return new EnvironmentBootstrapper(config(overrides), { runner, prompter, cwd, env: SESSION_ENV });
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

beforeEach(async () => {
  cwd = await createWorkspace();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeWorkspace(cwd);
});

test("Bootstrapper - empty directory with an empty manifest", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const runner = new FakeRunner();

  const result = await bootstrapper(runner).run([]);

  const root = path.join(cwd, "myenv");
  const python = path.join(root, ENV_BIN_DIR, ENV_PYTHON);
  expect(result).toEqual({ reset: false, created: true, shellExitCode: 0 });
  expect(runner.commandLines()).toEqual([
    `python3 -m venv ${root}`,
    `${python} -m pip install --upgrade pip`,
    `${python} -m pip install -r requirements.txt`,
  ]);
  expect(await exists(python)).toBe(true);

  expect(runner.interactive).toHaveLength(1);
  const [shell] = runner.interactive;
  expect(shell?.command).toBe("/bin/bash");
  expect(shell?.args).toEqual([]);
  expect(shell?.env?.VIRTUAL_ENV).toBe(root);
  expect(shell?.env?.PATH).toBe(`${path.join(root, ENV_BIN_DIR)}:/usr/local/bin:/usr/bin`);
});

test("Bootstrapper - pip runs with the activated environment", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "requests==2.31.0\n");
  const runner = new FakeRunner();

  await bootstrapper(runner).run([]);

  const [, upgrade, install] = runner.calls;
  expect(upgrade?.env?.VIRTUAL_ENV).toBe(path.join(cwd, "myenv"));
  expect(upgrade?.env?.PYTHONHOME).toBeUndefined();
  expect(install?.cwd).toBe(cwd);
});

test("Bootstrapper - reset without a directory reports and still creates it", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const info = vi.spyOn(Logger, "info");
  const runner = new FakeRunner();

  const result = await bootstrapper(runner).run(["--reset"]);

  expect(info).toHaveBeenCalledWith(MESSAGES.nothingToReset);
  expect(result.reset).toBe(false);
  expect(result.created).toBe(true);
  expect(await exists(path.join(cwd, "myenv", ENV_BIN_DIR, ENV_PYTHON))).toBe(true);
});

test("Bootstrapper - reset replaces an existing directory", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const marker = await seedEnvironment(cwd);
  const info = vi.spyOn(Logger, "info");
  const runner = new FakeRunner();

  const result = await bootstrapper(runner).run(["-r"]);

  expect(info).toHaveBeenCalledWith(MESSAGES.resetting);
  expect(info).toHaveBeenCalledWith(MESSAGES.resetDone);
  expect(result.reset).toBe(true);
  expect(result.created).toBe(true);
  expect(await exists(marker)).toBe(false);
  expect(await exists(path.join(cwd, "myenv", ENV_BIN_DIR, ENV_PYTHON))).toBe(true);
});

test("Bootstrapper - a second run reuses the directory", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const first = new FakeRunner();
  const second = new FakeRunner();

  await bootstrapper(first).run([]);
  const result = await bootstrapper(second).run([]);

  expect(result.created).toBe(false);
  expect(second.commandLines().some((line) => line.includes("-m venv"))).toBe(false);
  expect(second.calls).toHaveLength(2);
  expect(await exists(path.join(cwd, "myenv"))).toBe(true);
});

test("Bootstrapper - only the first argument is inspected", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const marker = await seedEnvironment(cwd);

  const unknown = await bootstrapper(new FakeRunner()).run(["--verbose"]);
  const late = await bootstrapper(new FakeRunner()).run(["shell", "--reset"]);

  expect(unknown.reset).toBe(false);
  expect(late.reset).toBe(false);
  expect(await exists(marker)).toBe(true);
});

test("Bootstrapper - missing manifest halts before the shell", async () => {
  const runner = new FakeRunner();

  await expect(bootstrapper(runner).run([])).rejects.toBeInstanceOf(ManifestNotFoundError);

  expect(runner.calls).toHaveLength(2);
  expect(runner.interactive).toHaveLength(0);
});

test("Bootstrapper - a failing pip upgrade stops the sequence with its exit status", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const runner = new FakeRunner();
  runner.failures.set("--upgrade pip", 3);

  await expect(bootstrapper(runner).run([])).rejects.toMatchObject({ exitCode: 3 });

  expect(runner.calls).toHaveLength(2);
  expect(runner.interactive).toHaveLength(0);
});

test("Bootstrapper - a failing venv creation never reaches activation", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const runner = new FakeRunner();
  runner.failures.set("-m venv", 127);

  await expect(bootstrapper(runner).run([])).rejects.toMatchObject({ exitCode: 127 });

  expect(runner.calls).toHaveLength(1);
  expect(await exists(path.join(cwd, "myenv"))).toBe(false);
});

test("Bootstrapper - a directory without an interpreter cannot be activated", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  await mkdir(path.join(cwd, "myenv"));
  const runner = new FakeRunner();

  await expect(bootstrapper(runner).run([])).rejects.toBeInstanceOf(ActivationError);
  expect(runner.calls).toHaveLength(0);
});

test("Bootstrapper - the shell's exit status is returned", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");

  const result = await bootstrapper(new FakeRunner(42)).run([]);

  expect(result.shellExitCode).toBe(42);
});

test("Bootstrapper - configured names are honoured", async () => {
  await writeFile(path.join(cwd, "deps.txt"), "");
  const runner = new FakeRunner();

  await bootstrapper(runner, { envDir: ".venv", manifest: "deps.txt", shell: "/bin/zsh" }).run([]);

  const root = path.join(cwd, ".venv");
  expect(runner.commandLines()[0]).toBe(`python3 -m venv ${root}`);
  expect(runner.commandLines()[2]).toBe(
    `${path.join(root, ENV_BIN_DIR, ENV_PYTHON)} -m pip install -r deps.txt`,
  );
  expect(runner.interactive[0]?.command).toBe("/bin/zsh");
  expect(runner.interactive[0]?.env?.VIRTUAL_ENV_PROMPT).toBe(".venv");
});

test("Bootstrapper - a declined reset keeps the environment", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const marker = await seedEnvironment(cwd);
  const prompter: Prompter = { confirm: vi.fn(async () => false) };
  const runner = new FakeRunner();

  const result = await bootstrapper(runner, { confirmReset: true }, prompter).run(["--reset"]);

  expect(prompter.confirm).toHaveBeenCalledWith(
    "Delete the existing virtual environment at myenv?",
    false,
  );
  expect(result).toEqual({ reset: false, created: false, shellExitCode: 0 });
  expect(await exists(marker)).toBe(true);
});

test("Bootstrapper - a confirmed reset deletes the environment", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  const marker = await seedEnvironment(cwd);
  const prompter: Prompter = { confirm: vi.fn(async () => true) };

  const result = await bootstrapper(new FakeRunner(), { confirmReset: true }, prompter).run(["-r"]);

  expect(result.reset).toBe(true);
  expect(await exists(marker)).toBe(false);
});

test("Bootstrapper - without confirmReset no prompt is shown", async () => {
  await writeFile(path.join(cwd, "requirements.txt"), "");
  await seedEnvironment(cwd);
  const prompter: Prompter = { confirm: vi.fn(async () => false) };

  const result = await bootstrapper(new FakeRunner(), {}, prompter).run(["--reset"]);

  expect(prompter.confirm).not.toHaveBeenCalled();
  expect(result.reset).toBe(true);
});
