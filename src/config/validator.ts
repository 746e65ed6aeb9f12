/**
 * Configuration validation
 */

import type { BackhaulConfig } from "../types";
import { isLogLevel } from "../utils/logger";
import { isPlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function section(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = c[name];
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requireString(obj: Record<string, unknown>, key: string, label: string): void {
  const value = obj[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${label}.${key} must be a non-empty string`);
  }
}

function optionalString(obj: Record<string, unknown>, key: string, label: string): void {
  if (obj[key] !== undefined && typeof obj[key] !== "string") {
    throw new ConfigError(`${label}.${key} must be a string`);
  }
}

function requirePositiveInteger(obj: Record<string, unknown>, key: string, label: string): void {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label}.${key} must be a positive integer`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  database: (c) => {
    requireString(section(c, "database"), "path", "database");
  },

  security: (c) => {
    optionalString(section(c, "security"), "encryptionKey", "security");
  },

  scheduler: (c) => {
    const scheduler = section(c, "scheduler");
    requirePositiveInteger(scheduler, "resyncIntervalSeconds", "scheduler");
    requireString(scheduler, "tempDir", "scheduler");
    if (typeof scheduler.backupNamespace !== "string") {
      throw new ConfigError("scheduler.backupNamespace must be a string");
    }
    if (scheduler.backupNamespace.includes("..")) {
      throw new ConfigError("scheduler.backupNamespace must not contain '..'");
    }
  },

  agents: (c) => {
    const agents = section(c, "agents");
    requirePositiveInteger(agents, "pollIntervalSeconds", "agents");
    requirePositiveInteger(agents, "requestTimeoutSeconds", "agents");
  },

  reports: (c) => {
    requirePositiveInteger(section(c, "reports"), "checkIntervalSeconds", "reports");
  },

  storageCheck: (c) => {
    requirePositiveInteger(section(c, "storageCheck"), "intervalSeconds", "storageCheck");
  },

  notifications: (c) => {
    const notifications = section(c, "notifications");
    if (typeof notifications.enabled !== "boolean") {
      throw new ConfigError("notifications.enabled must be a boolean");
    }
    optionalString(notifications, "username", "notifications");
    optionalString(notifications, "iconUrl", "notifications");
    if (notifications.enabled) {
      requireString(notifications, "webhookUrl", "notifications");
      const url = notifications.webhookUrl;
      if (typeof url === "string" && !/^https?:\/\//.test(url)) {
        throw new ConfigError("notifications.webhookUrl must be an http(s) URL");
      }
    }
    if (notifications.timeoutSeconds !== undefined) {
      requirePositiveInteger(notifications, "timeoutSeconds", "notifications");
    }
  },

  tools: (c) => {
    const tools = section(c, "tools");
    requireString(tools, "dump", "tools");
    requireString(tools, "restore", "tools");
    requireString(tools, "sql", "tools");
  },

  logging: (c) => {
    const logging = section(c, "logging");
    if (!isLogLevel(logging.level)) {
      throw new ConfigError("logging.level must be one of debug, info, warn, error");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is BackhaulConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
