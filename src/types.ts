export interface BootstrapConfig {
  /** Environment directory, relative to the working directory */
  envDir: string;
  /** Dependency manifest handed to `pip install -r` */
  manifest: string;
  /** Interpreter used to create the environment */
  python: string;
  /** Shell launched at the end; resolved from the session when unset */
  shell?: string;
  /** Ask before deleting an existing environment on reset */
  confirmReset: boolean;
}

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface ActivatedEnvironment {
  /** Absolute path of the environment directory */
  root: string;
  binDir: string;
  python: string;
  /** Full environment for child processes of the activated session */
  env: Record<string, string>;
}

export interface BootstrapResult {
  reset: boolean;
  created: boolean;
  shellExitCode: number;
}
