import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  PartialPipelineSettings,
  PipelineSettings,
} from "../types";
import {
  PipelineSettingsSchema,
  PartialPipelineSettingsSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("minegraph", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default settings with Zod validation
 */
export async function loadDefaultConfig(): Promise<PipelineSettings> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return PipelineSettingsSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialPipelineSettings> {
  const content = await readFile(configPath, "utf-8");
  return PartialPipelineSettingsSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: PipelineSettings,
  override: PartialPipelineSettings,
): PipelineSettings {
  return {
    container: { ...base.container, ...override.container },
    images: { ...base.images, ...override.images },
    mounts: { ...base.mounts, ...override.mounts },
    files: { ...base.files, ...override.files },
    repeatMasker: { ...base.repeatMasker, ...override.repeatMasker },
    defaults: { ...base.defaults, ...override.defaults },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: PipelineSettings;
  errors: ConfigError[];
}

/**
 * Load and merge settings
 * Priority: custom path > user config > default config
 * A layer that fails to load or validate is skipped and reported in `errors`
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
