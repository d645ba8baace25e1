/**
 * Configuration Loader
 * Layers the bundled defaults, the user config and a --config file
 */

import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import envPaths from "env-paths";
import type {
  ReplaceConfig,
  PartialReplaceConfig,
  ConfigError,
} from "../types";
import {
  ReplaceConfigSchema,
  PartialReplaceConfigSchema,
} from "../types";

const DEFAULT_CONFIG_URL = new URL("../config/default.json", import.meta.url);

/**
 * Location of the user config (XDG config dir on Linux, e.g.
 * ~/.config/batrepl/config.json)
 */
export function getUserConfigPath(): string {
  return join(envPaths("batrepl", { suffix: "" }).config, "config.json");
}

export async function loadDefaultConfig(): Promise<ReplaceConfig> {
  const content = await readFile(DEFAULT_CONFIG_URL, "utf-8");
  return ReplaceConfigSchema.parse(JSON.parse(content));
}

async function readConfigLayer(path: string): Promise<PartialReplaceConfig> {
  const content = await readFile(path, "utf-8");
  return PartialReplaceConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: ReplaceConfig,
  override: PartialReplaceConfig,
): ReplaceConfig {
  return {
    source: override.source ?? base.source,
    target: override.target ?? base.target,
    table: { ...base.table, ...override.table },
    files: { ...base.files, ...override.files },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ReplaceConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration: defaults, then the user config when it
 * exists, then `custom`. A layer that fails to read or validate is
 * reported in `errors` and left out.
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  const userConfigPath = getUserConfigPath();
  const layers = [
    ...(existsSync(userConfigPath) ? [userConfigPath] : []),
    ...(custom ? [custom] : []),
  ];

  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  for (const layer of layers) {
    try {
      config = mergeConfig(config, await readConfigLayer(layer));
    } catch (error) {
      errors.push({ path: layer, error });
    }
  }

  return { config, errors };
}
