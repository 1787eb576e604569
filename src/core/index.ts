export { EnvironmentBootstrapper } from "./bootstrapper.js";
export type { BootstrapperOptions, PreparedEnvironment } from "./bootstrapper.js";
export { EnvironmentDirectory } from "./environment-directory.js";
export type { ResetConfirmation } from "./environment-directory.js";
export { activate, activatedEnv } from "./activation.js";
export { PackageInstaller } from "./package-installer.js";
export { ShellLauncher, resolveShell } from "./shell-launcher.js";
export { COMMAND_NOT_FOUND, ProcessRunner, exitStatus, formatCommand } from "./command-runner.js";
export type { CommandRunner, SpawnFunction, SpawnedProcess } from "./command-runner.js";
export { InquirerPrompter } from "./prompter.js";
export type { Prompter } from "./prompter.js";
