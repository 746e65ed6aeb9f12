/**
 * Configuration file loading
 */

import { readFile, stat } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { BackhaulConfig } from "../types";
import { errorMessage } from "../utils/errors";
import { DEFAULT_CONFIG, deepMerge, environmentDefaults } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "backhaul.config.yaml",
  "backhaul.config.yml",
  "backhaul.config.json",
];

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Load and parse a config file
 */
export async function loadConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<BackhaulConfig> {
  const absolutePath = path.resolve(configPath);

  if (!(await fileExists(absolutePath))) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  const ext = path.extname(absolutePath).toLowerCase();

  const parsed = parseConfigContent(content, ext);

  return buildConfig(parsed, absolutePath, env);
}

/**
 * Apply defaults and environment values, validate, and resolve paths
 */
export function buildConfig(
  parsed: unknown,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): BackhaulConfig {
  const withEnv = deepMerge(DEFAULT_CONFIG, environmentDefaults(env));
  const merged = deepMerge(withEnv, parsed);

  validateConfig(merged);

  return resolvePaths(merged, configPath);
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (await fileExists(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<BackhaulConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = await findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create backhaul.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
