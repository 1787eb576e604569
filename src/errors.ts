/**
 * Base class for every failure that ends a bootstrap run.
 *
 * `exitCode` is the status the process exits with, so a failing external
 * step hands its own status back to the caller.
 */
export class BootstrapError extends Error {
  constructor(message: string, readonly exitCode: number = 1) {
    super(message);
    this.name = new.target.name;
  }
}

export class CommandFailedError extends BootstrapError {
  constructor(readonly commandLine: string, exitCode: number) {
    super(`Command failed with exit code ${exitCode}: ${commandLine}`, exitCode);
  }
}

export class ActivationError extends BootstrapError {
  constructor(readonly envDir: string) {
    super(`No Python interpreter found in ${envDir}; cannot activate it`);
  }
}

export class ManifestNotFoundError extends BootstrapError {
  constructor(readonly manifest: string) {
    super(`Dependency manifest not found: ${manifest}`);
  }
}

export class ConfigError extends BootstrapError {}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
