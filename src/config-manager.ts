import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "yaml";
import { Logger } from "./logger.js";
import { ConfigError, isNotFound } from "./errors.js";
import {
  CONFIG_FILE,
  DEFAULT_ENV_DIR,
  DEFAULT_MANIFEST,
  DEFAULT_PYTHON,
} from "./constants.js";
import type { BootstrapConfig } from "./types.js";

const STRING_KEYS = ["envDir", "manifest", "python", "shell"] as const;
const BOOLEAN_KEYS = ["confirmReset"] as const;
const KNOWN_KEYS: readonly string[] = [...STRING_KEYS, ...BOOLEAN_KEYS];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private static instance: ConfigManager;
  private config: BootstrapConfig;

  private constructor() {
    this.config = ConfigManager.defaults();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  static defaults(): BootstrapConfig {
    return {
      envDir: DEFAULT_ENV_DIR,
      manifest: DEFAULT_MANIFEST,
      python: DEFAULT_PYTHON,
      confirmReset: false,
    };
  }

  /**
   * Loads `.venvboot.yaml` from `cwd`. A missing file leaves the defaults
   * in place; a file that cannot be read or validated is fatal.
   */
  async load(cwd: string = process.cwd()): Promise<BootstrapConfig> {
    const file = path.join(cwd, CONFIG_FILE);
    let content: string;
    try {
      content = await readFile(file, "utf8");
    } catch (err) {
      if (isNotFound(err)) {
        this.config = ConfigManager.defaults();
        return this.getConfig();
      }
      throw new ConfigError(
        `Failed to read ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    let loaded: unknown;
    try {
      loaded = parse(content);
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    this.config = this.validateConfig(loaded);
    return this.getConfig();
  }

  private validateConfig(loaded: unknown): BootstrapConfig {
    const config = ConfigManager.defaults();

    // An empty file parses to null
    if (loaded === null || loaded === undefined) return config;

    if (!isRecord(loaded)) {
      throw new ConfigError(`${CONFIG_FILE} must contain a mapping of settings`);
    }

    for (const key of Object.keys(loaded)) {
      if (!KNOWN_KEYS.includes(key)) {
        Logger.warn(`Ignoring unknown setting "${key}" in ${CONFIG_FILE}`);
      }
    }

    for (const key of STRING_KEYS) {
      const value = loaded[key];
      if (value === undefined) continue;
      if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(`"${key}" in ${CONFIG_FILE} must be a non-empty string`);
      }
      config[key] = value;
    }

    for (const key of BOOLEAN_KEYS) {
      const value = loaded[key];
      if (value === undefined) continue;
      if (typeof value !== "boolean") {
        throw new ConfigError(`"${key}" in ${CONFIG_FILE} must be true or false`);
      }
      config[key] = value;
    }

    return config;
  }

  getConfig(): BootstrapConfig {
    return { ...this.config };
  }
}
