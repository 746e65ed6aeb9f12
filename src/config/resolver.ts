/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { BackhaulConfig } from "../types";

const IN_MEMORY_DATABASE = ":memory:";

/**
 * Resolve relative paths in config to absolute paths. Returns a copy; nested
 * sections may be shared with the defaults.
 */
export function resolvePaths(config: BackhaulConfig, configPath: string): BackhaulConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const resolve = (value: string) => (path.isAbsolute(value) ? value : path.resolve(configDir, value));

  return {
    ...config,
    database: {
      ...config.database,
      path: config.database.path === IN_MEMORY_DATABASE ? IN_MEMORY_DATABASE : resolve(config.database.path),
    },
    scheduler: { ...config.scheduler, tempDir: resolve(config.scheduler.tempDir) },
  };
}
