export const DEFAULT_ENV_DIR = "myenv";

export const DEFAULT_MANIFEST = "requirements.txt";

export const CONFIG_FILE = ".venvboot.yaml";

export const RESET_FLAGS: readonly string[] = ["--reset", "-r"];

export const IS_WINDOWS = process.platform === "win32";

export const DEFAULT_PYTHON = IS_WINDOWS ? "python" : "python3";

export const FALLBACK_SHELL = "/bin/sh";

// Layout that `python -m venv` produces on each platform
export const ENV_BIN_DIR = IS_WINDOWS ? "Scripts" : "bin";
export const ENV_PYTHON = IS_WINDOWS ? "python.exe" : "python";

export const BOOTSTRAP_STEPS = 5;

export const MESSAGES = {
  resetting: "Resetting virtual environment directory...",
  resetDone: "Virtual environment directory reset.",
  nothingToReset: "Virtual environment directory does not exist.",
} as const;
