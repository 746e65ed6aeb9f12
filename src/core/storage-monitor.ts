/**
 * Periodic connection and capacity check of configured storage
 */

import { getAllStorageConfigs, type StorageCheckUpdate, updateStorageCheck } from "../db";
import { createStorageBackend } from "../storage";
import type { StorageBackend, StorageConfigRecord } from "../types";
import { errorMessage } from "../utils/errors";
import { roundTo } from "../utils/format";
import { createLogger } from "../utils/logger";
import { IntervalLoop } from "./loop";

const log = createLogger("storage-check");

export interface StorageMonitorOptions {
  intervalSeconds: number;
  createBackend?: (config: StorageConfigRecord) => StorageBackend;
  now?: () => Date;
}

export interface StorageCheckResult {
  configId: number;
  ok: boolean;
  error: string | null;
}

function roundGB(value: number | null): number | null {
  return value === null ? null : roundTo(value, 2);
}

export class StorageMonitor {
  private readonly loop: IntervalLoop;
  private readonly createBackend: (config: StorageConfigRecord) => StorageBackend;
  private readonly now: () => Date;

  constructor(private readonly options: StorageMonitorOptions) {
    this.createBackend = options.createBackend ?? ((config) => createStorageBackend(config));
    this.now = options.now ?? (() => new Date());
    this.loop = new IntervalLoop("storage check", options.intervalSeconds * 1000, async () => {
      await this.checkAll();
    });
  }

  start(): void {
    this.loop.start();
    log.info(`Storage check started (every ${this.options.intervalSeconds}s)`);
  }

  stop(): void {
    this.loop.stop();
  }

  async checkAll(): Promise<StorageCheckResult[]> {
    const results: StorageCheckResult[] = [];
    for (const config of getAllStorageConfigs()) {
      results.push(await this.check(config));
    }
    return results;
  }

  /**
   * Test one config and record the outcome on it
   */
  async check(config: StorageConfigRecord): Promise<StorageCheckResult> {
    const update: StorageCheckUpdate = {
      last_check: this.now().toISOString(),
      free_space_gb: null,
      total_space_gb: null,
      used_space_gb: null,
      connection_error: null,
    };

    try {
      const backend = this.createBackend(config);
      const connection = await backend.testConnection();
      if (connection.ok) {
        const space = await backend.spaceInfo();
        update.free_space_gb = roundGB(space.freeGB);
        update.total_space_gb = roundGB(space.totalGB);
        update.used_space_gb = roundGB(space.usedGB);
      } else {
        update.connection_error = connection.error ?? "Connection failed";
      }
    } catch (err) {
      update.connection_error = errorMessage(err);
    }

    updateStorageCheck(config.id, update);

    if (update.connection_error) {
      log.warn(`Storage ${config.name} (${config.storage_type}) check failed: ${update.connection_error}`);
    } else {
      log.debug(`Storage ${config.name} is reachable`);
    }

    return { configId: config.id, ok: update.connection_error === null, error: update.connection_error };
  }
}
