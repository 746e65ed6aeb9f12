/**
 * Storage settings validation and legacy config normalization
 */

import { isPlainObject } from "../config/defaults";
import type {
  BackendSettings,
  LegacyObjectConfigRecord,
  StorageConfigRecord,
  StorageType,
} from "../types";
import { ConfigurationError } from "../utils/errors";

/**
 * Storage config after legacy records have been folded into the generic shape
 */
export interface NormalizedStorageConfig {
  /** Null for legacy object-storage records */
  id: number | null;
  name: string;
  storage_type: StorageType;
  config_data: Record<string, unknown>;
}

export type StorageTarget = StorageConfigRecord | LegacyObjectConfigRecord | NormalizedStorageConfig;

// Older rows were written with snake_case keys
const KEY_ALIASES: Record<string, string> = {
  access_key: "accessKey",
  secret_key: "secretKey",
  bucket_name: "bucket",
  use_ssl: "useSsl",
  base_path: "basePath",
  export_path: "exportPath",
  mount_point: "mountPoint",
  private_key: "privateKeyPath",
  private_key_path: "privateKeyPath",
};

export function normalizeStorageTarget(target: StorageTarget): NormalizedStorageConfig {
  if ("storage_type" in target) {
    return {
      id: target.id,
      name: target.name,
      storage_type: target.storage_type,
      config_data: target.config_data,
    };
  }

  return {
    id: null,
    name: target.name,
    storage_type: "object",
    config_data: {
      endpoint: target.endpoint,
      accessKey: target.access_key,
      secretKey: target.secret_key,
      bucket: target.bucket_name,
      region: target.region,
      useSsl: target.use_ssl,
    },
  };
}

function canonicalKeys(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const canonical = KEY_ALIASES[key] ?? key;
    if (result[canonical] === undefined) {
      result[canonical] = value;
    }
  }
  return result;
}

class SettingsReader {
  constructor(
    private readonly type: StorageType,
    private readonly data: Record<string, unknown>,
  ) {}

  required(key: string): string {
    const value = this.data[key];
    if (typeof value !== "string" || value.trim().length === 0) {
      throw new ConfigurationError(`${this.type} storage requires '${key}'`);
    }
    return value;
  }

  optional(key: string): string | undefined {
    const value = this.data[key];
    if (value === undefined || value === null || value === "") return undefined;
    if (typeof value !== "string") {
      throw new ConfigurationError(`${this.type} storage '${key}' must be a string`);
    }
    return value;
  }

  port(key: string): number | undefined {
    const value = this.data[key];
    if (value === undefined || value === null || value === "") return undefined;
    const port = typeof value === "string" ? Number(value) : value;
    if (typeof port !== "number" || !Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigurationError(`${this.type} storage '${key}' must be a valid port`);
    }
    return port;
  }

  flag(key: string): boolean | undefined {
    const value = this.data[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === "boolean") return value;
    if (value === "true" || value === 1) return true;
    if (value === "false" || value === 0) return false;
    throw new ConfigurationError(`${this.type} storage '${key}' must be a boolean`);
  }
}

/**
 * Validate `config_data` for a storage type
 */
export function parseBackendSettings(type: StorageType, configData: unknown): BackendSettings {
  if (!isPlainObject(configData)) {
    throw new ConfigurationError(`${type} storage settings must be an object`);
  }
  const r = new SettingsReader(type, canonicalKeys(configData));

  switch (type) {
    case "object":
      return {
        type,
        settings: {
          endpoint: r.required("endpoint"),
          accessKey: r.required("accessKey"),
          secretKey: r.required("secretKey"),
          bucket: r.required("bucket"),
          region: r.required("region"),
          useSsl: r.flag("useSsl"),
          forcePathStyle: r.flag("forcePathStyle"),
        },
      };
    case "sftp": {
      const password = r.optional("password");
      const privateKeyPath = r.optional("privateKeyPath");
      if (!password && !privateKeyPath) {
        throw new ConfigurationError("sftp storage requires 'password' or 'privateKeyPath'");
      }
      return {
        type,
        settings: {
          host: r.required("host"),
          port: r.port("port"),
          username: r.required("username"),
          password,
          privateKeyPath,
          basePath: r.required("basePath"),
        },
      };
    }
    case "nfs":
      return {
        type,
        settings: {
          server: r.required("server"),
          exportPath: r.required("exportPath"),
          mountPoint: r.optional("mountPoint"),
          options: r.optional("options"),
          basePath: r.optional("basePath"),
        },
      };
    case "local":
      return { type, settings: { basePath: r.required("basePath") } };
  }
}
