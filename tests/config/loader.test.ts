import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  buildConfig,
  ConfigError,
  DEFAULT_CONFIG,
  deepMerge,
  environmentDefaults,
  findConfigFile,
  loadConfig,
  parseConfigContent,
  validateConfig,
} from "../../src/config";

describe("config loader", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "backhaul-config-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("parseConfigContent", () => {
    test("parses YAML", () => {
      expect(parseConfigContent('version: "1.0"\nlogging:\n  level: debug\n', ".yaml")).toEqual({
        version: "1.0",
        logging: { level: "debug" },
      });
    });

    test("parses JSON", () => {
      expect(parseConfigContent('{"version":"1.0"}', ".json")).toEqual({ version: "1.0" });
    });

    test("rejects malformed content", () => {
      expect(() => parseConfigContent("{not json", ".json")).toThrow(ConfigError);
      expect(() => parseConfigContent("a: [1, 2", ".yml")).toThrow(ConfigError);
    });

    test("rejects unknown extensions", () => {
      expect(() => parseConfigContent("", ".toml")).toThrow("Unsupported config file format: .toml");
    });
  });

  describe("deepMerge", () => {
    test("merges nested objects and keeps untouched keys", () => {
      const result = deepMerge({ a: { x: 1, y: 2 }, b: 1 }, { a: { y: 3 } });
      expect(result).toEqual({ a: { x: 1, y: 3 }, b: 1 });
    });

    test("replaces arrays and ignores undefined", () => {
      const result = deepMerge({ list: [1, 2], keep: "yes" }, { list: [3], keep: undefined });
      expect(result).toEqual({ list: [3], keep: "yes" });
    });
  });

  describe("environmentDefaults", () => {
    test("reads the encryption key and webhook URL", () => {
      expect(
        environmentDefaults({
          BACKHAUL_ENCRYPTION_KEY: "test-key",
          BACKHAUL_WEBHOOK_URL: "https://hooks.example.test/abc",
        }),
      ).toEqual({
        security: { encryptionKey: "test-key" },
        notifications: { webhookUrl: "https://hooks.example.test/abc" },
      });
    });

    test("is empty without variables", () => {
      expect(environmentDefaults({})).toEqual({});
    });
  });

  describe("buildConfig", () => {
    test("applies defaults", () => {
      const config = buildConfig({ version: "1.0" }, path.join(tempDir, "backhaul.config.yaml"), {});

      expect(config.scheduler.resyncIntervalSeconds).toBe(300);
      expect(config.scheduler.backupNamespace).toBe("backups");
      expect(config.agents).toEqual({ pollIntervalSeconds: 60, requestTimeoutSeconds: 30 });
      expect(config.reports.checkIntervalSeconds).toBe(60);
      expect(config.storageCheck.intervalSeconds).toBe(86400);
      expect(config.tools).toEqual({ dump: "pg_dump", restore: "pg_restore", sql: "psql" });
      expect(config.notifications.enabled).toBe(false);
    });

    test("resolves relative paths against the config directory", () => {
      const config = buildConfig(
        { version: "1.0", database: { path: "./state/app.db" }, scheduler: { tempDir: "tmp" } },
        path.join(tempDir, "backhaul.config.yaml"),
        {},
      );

      expect(config.database.path).toBe(path.join(tempDir, "state/app.db"));
      expect(config.scheduler.tempDir).toBe(path.join(tempDir, "tmp"));
    });

    test("keeps an in-memory database path", () => {
      const config = buildConfig({ version: "1.0", database: { path: ":memory:" } }, "/etc/backhaul.yaml", {});
      expect(config.database.path).toBe(":memory:");
    });

    test("does not alter the defaults", () => {
      buildConfig({ version: "1.0" }, path.join(tempDir, "backhaul.config.yaml"), {});
      expect(DEFAULT_CONFIG.database.path).toBe("./data/backhaul.db");
    });

    test("file values win over the environment", () => {
      const config = buildConfig(
        { version: "1.0", security: { encryptionKey: "from-file" } },
        "/etc/backhaul.yaml",
        { BACKHAUL_ENCRYPTION_KEY: "from-env" },
      );
      expect(config.security.encryptionKey).toBe("from-file");
    });

    test("requires a version", () => {
      expect(() => buildConfig({}, "/etc/backhaul.yaml", {})).toThrow("Config must have a 'version' field");
    });
  });

  describe("validateConfig", () => {
    const valid = () => deepMerge(DEFAULT_CONFIG, { version: "1.0" });

    test("accepts the defaults", () => {
      expect(() => validateConfig(valid())).not.toThrow();
    });

    test("requires a webhook URL when notifications are enabled", () => {
      const config = deepMerge(valid(), { notifications: { enabled: true } });
      expect(() => validateConfig(config)).toThrow("notifications.webhookUrl must be a non-empty string");
    });

    test("rejects a non-http webhook URL", () => {
      const config = deepMerge(valid(), { notifications: { enabled: true, webhookUrl: "ftp://x" } });
      expect(() => validateConfig(config)).toThrow("notifications.webhookUrl must be an http(s) URL");
    });

    test("rejects non-positive intervals", () => {
      const config = deepMerge(valid(), { agents: { pollIntervalSeconds: 0 } });
      expect(() => validateConfig(config)).toThrow("agents.pollIntervalSeconds must be a positive integer");
    });

    test("rejects parent references in the backup namespace", () => {
      const config = deepMerge(valid(), { scheduler: { backupNamespace: "../elsewhere" } });
      expect(() => validateConfig(config)).toThrow("scheduler.backupNamespace must not contain '..'");
    });

    test("rejects unknown log levels", () => {
      const config = deepMerge(valid(), { logging: { level: "trace" } });
      expect(() => validateConfig(config)).toThrow(ConfigError);
    });
  });

  describe("files", () => {
    test("loadConfig reads a YAML file", async () => {
      const configPath = path.join(tempDir, "backhaul.config.yaml");
      await writeFile(
        configPath,
        `version: "1.0"
database:
  path: ./backhaul.db
notifications:
  enabled: true
  webhookUrl: https://hooks.example.test/abc
`,
      );

      const config = await loadConfig(configPath, {});

      expect(config.database.path).toBe(path.join(tempDir, "backhaul.db"));
      expect(config.notifications.webhookUrl).toBe("https://hooks.example.test/abc");
      expect(config.notifications.username).toBe("Backup Server");
    });

    test("loadConfig fails for a missing file", async () => {
      await expect(loadConfig(path.join(tempDir, "missing.yaml"), {})).rejects.toThrow("Config file not found");
    });

    test("findConfigFile looks for known names in order", async () => {
      expect(await findConfigFile(tempDir)).toBeNull();

      await writeFile(path.join(tempDir, "backhaul.config.json"), "{}");
      expect(await findConfigFile(tempDir)).toBe(path.join(tempDir, "backhaul.config.json"));

      await writeFile(path.join(tempDir, "backhaul.config.yaml"), "");
      expect(await findConfigFile(tempDir)).toBe(path.join(tempDir, "backhaul.config.yaml"));
    });

    test("findConfigFile ignores directories with a config name", async () => {
      await mkdir(path.join(tempDir, "backhaul.config.yml"));
      expect(await findConfigFile(tempDir)).toBeNull();
    });
  });
});
