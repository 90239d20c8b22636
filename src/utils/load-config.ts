/**
 * Configuration Loader
 * Loads and merges settings from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { ConfigError, FetcherConfig, PartialFetcherConfig } from "../types";
import {
  FetcherConfigSchema,
  PartialFetcherConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Get the OS-specific config directory, resolved from the current environment
 * - Linux: $XDG_CONFIG_HOME/volume-fetcher or ~/.config/volume-fetcher
 * - macOS: ~/Library/Preferences/volume-fetcher
 * - Windows: %APPDATA%\volume-fetcher
 */
function getConfigDirectory(): string {
  return envPaths("volume-fetcher", { suffix: "" }).config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<FetcherConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return FetcherConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial config file with Zod validation
 * Throws if the file is unreadable or invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialFetcherConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialFetcherConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: FetcherConfig,
  override: PartialFetcherConfig,
): FetcherConfig {
  return {
    jobsFile: override.jobsFile ?? base.jobsFile,
    http: { ...base.http, ...override.http },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: FetcherConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Invalid user or custom files are reported in `errors` and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
