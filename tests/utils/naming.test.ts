import { describe, expect, test } from "vitest";
import {
  artifactPrefix,
  artifactRemotePath,
  extensionForFormat,
  formatTimestamp,
  generateArtifactName,
  jobIdForTask,
  sanitizeName,
} from "../../src/utils/naming";
import { stripLeadingSlash, stripPrefix } from "../../src/utils/path";

describe("naming utilities", () => {
  describe("extensionForFormat", () => {
    test("maps dump formats to extensions", () => {
      expect(extensionForFormat("custom")).toBe("dump");
      expect(extensionForFormat("plain")).toBe("sql");
      expect(extensionForFormat("tar")).toBe("tar");
    });
  });

  describe("sanitizeName", () => {
    test("replaces path separators", () => {
      expect(sanitizeName("team/orders\\eu")).toBe("team_orders_eu");
    });

    test("keeps other characters", () => {
      expect(sanitizeName("orders-2024.main")).toBe("orders-2024.main");
    });
  });

  describe("formatTimestamp", () => {
    test("uses UTC digits only", () => {
      expect(formatTimestamp(new Date("2024-03-07T04:05:06.789Z"))).toBe("20240307040506");
    });
  });

  describe("generateArtifactName", () => {
    test("combines database, timestamp and extension", () => {
      const date = new Date("2024-01-15T02:00:00Z");
      expect(generateArtifactName("orders", "custom", date)).toBe("orders_20240115020000.dump");
      expect(generateArtifactName("a/b", "plain", date)).toBe("a_b_20240115020000.sql");
    });
  });

  describe("remote paths", () => {
    test("artifactPrefix joins namespace and database folder", () => {
      expect(artifactPrefix("backups", "orders")).toBe("backups/orders");
      expect(artifactPrefix("backups/", "orders")).toBe("backups/orders");
      expect(artifactPrefix("", "orders")).toBe("orders");
    });

    test("artifactRemotePath appends the filename", () => {
      expect(artifactRemotePath("backups", "orders", "orders_20240115020000.dump")).toBe(
        "backups/orders/orders_20240115020000.dump",
      );
    });

    test("jobIdForTask", () => {
      expect(jobIdForTask(12)).toBe("db-task-12");
    });
  });

  describe("path helpers", () => {
    test("stripLeadingSlash", () => {
      expect(stripLeadingSlash("//a/b")).toBe("a/b");
    });

    test("stripPrefix only removes a matching prefix", () => {
      expect(stripPrefix("backups/orders", "backups/")).toBe("orders");
      expect(stripPrefix("other/orders", "backups/")).toBe("other/orders");
    });
  });
});
